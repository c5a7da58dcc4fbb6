import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { aggregateScores } from "@/lib/grading/aggregator";
import { CsvResultsSink, resultRow, summaryRows, toCsvLine } from "@/lib/grading/results-sink";
import { makeResult, withTempDir } from "./helpers";

const HEADER_LINE =
  "section,category,sub_category,score,weight,weighted_score,evidence,reasoning,improvements";

describe("toCsvLine", () => {
  it("quotes cells containing commas or quotes", () => {
    expect(toCsvLine(["plain", "a, b", 'say "hi"'])).toBe('plain,"a, b","say ""hi"""');
  });

  it("writes numbers and empty cells", () => {
    expect(toCsvLine(["x", 1.5, null, "y"])).toBe("x,1.5,,y");
  });
});

describe("resultRow", () => {
  it("computes the weighted score", () => {
    expect(resultRow(makeResult(3))).toEqual([
      "Technical",
      "Risk",
      "Schedule",
      3,
      0.5,
      1.5,
      "",
      "ok",
      "",
    ]);
  });

  it("leaves score cells empty for a failed unit", () => {
    const row = resultRow(makeResult(null));
    expect(row[3]).toBeNull();
    expect(row[5]).toBeNull();
    expect(row[7]).toBe("Could not parse response");
  });
});

describe("summaryRows", () => {
  it("starts with a blank row and ends with the overall", () => {
    const rows = summaryRows(aggregateScores([makeResult(4), makeResult(2, { subCategory: "Technical" })]));

    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual([]);
    expect(rows[1][0]).toBe("SECTION: Technical");
    expect(rows[1][7]).toBe("2 scored, 0 failed");
    expect(rows[2]).toEqual(["OVERALL", "", "", 3, "", "", "", "satisfactory", ""]);
  });
});

describe("CsvResultsSink", () => {
  it("writes the header on open", async () => {
    await withTempDir(async (dir) => {
      const sink = new CsvResultsSink(path.join(dir, "out", "results.csv"));
      await sink.open();

      expect(await readFile(sink.filePath, "utf-8")).toBe(`${HEADER_LINE}\n`);
    });
  });

  it("truncates an existing file", async () => {
    await withTempDir(async (dir) => {
      const filePath = path.join(dir, "results.csv");
      await writeFile(filePath, "stale\n");

      await new CsvResultsSink(filePath).open();

      expect(await readFile(filePath, "utf-8")).toBe(`${HEADER_LINE}\n`);
    });
  });

  it("appends one line per result in call order", async () => {
    await withTempDir(async (dir) => {
      const sink = new CsvResultsSink(path.join(dir, "results.csv"));
      await sink.open();

      await Promise.all([
        sink.append({ ...makeResult(3), evidence: "Gantt chart, p.4" }),
        sink.append(makeResult(null, { subCategory: "Technical" })),
      ]);

      const lines = (await readFile(sink.filePath, "utf-8")).split("\n");
      expect(lines[1]).toBe('Technical,Risk,Schedule,3,0.5,1.5,"Gantt chart, p.4",ok,');
      expect(lines[2]).toBe("Technical,Risk,Technical,,0.5,,,Could not parse response,");
      expect(lines).toHaveLength(4);
    });
  });

  it("appends the summary block after the rows", async () => {
    await withTempDir(async (dir) => {
      const sink = new CsvResultsSink(path.join(dir, "results.csv"));
      await sink.open();
      const result = makeResult(4);

      await sink.append(result);
      await sink.appendSummary(aggregateScores([result]));

      const lines = (await readFile(sink.filePath, "utf-8")).trimEnd().split("\n");
      expect(lines[2]).toBe("");
      expect(lines[lines.length - 1]).toBe("OVERALL,,,4,,,,superior,");
    });
  });
});
