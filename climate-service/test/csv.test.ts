import { describe, expect, it } from "vitest";
import { parseCsv, parseCsvRecords } from "../src/csv.js";

describe("parseCsv", () => {
  it("handles quoted separators, doubled quotes and CRLF", () => {
    expect(parseCsv("a,\"b,c\",\"d \"\"e\"\"\"\r\n\r\n1,2,3\n")).toEqual([
      ["a", "b,c", "d \"e\""],
      ["1", "2", "3"]
    ]);
  });

  it("keeps a final row without a newline", () => {
    expect(parseCsv("x,y")).toEqual([["x", "y"]]);
    expect(parseCsv("")).toEqual([]);
  });
});

describe("parseCsvRecords", () => {
  it("keys rows by the trimmed header and fills short rows", () => {
    expect(parseCsvRecords(" A , B\n1\n")).toEqual({
      header: ["A", "B"],
      records: [{ A: "1", B: "" }]
    });
  });
});
