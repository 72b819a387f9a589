import { describe, expect, it } from "vitest";
import { FileNameFilter, matchesPattern, parsePattern } from "../src/storage/patterns.js";

describe("caret patterns", () => {
  it("parses each notation once", () => {
    expect(parsePattern("^.bam")).toEqual({ kind: "suffix", text: ".bam" });
    expect(parsePattern("hepg2^")).toEqual({ kind: "prefix", text: "hepg2" });
    expect(parsePattern("^R1^")).toEqual({ kind: "infix", text: "R1" });
    expect(parsePattern("I1")).toEqual({ kind: "contains", text: "I1" });
  });

  it("requires a separator in front of an infix", () => {
    const r1 = parsePattern("^R1^");
    expect(matchesPattern("sample_R1.fastq.gz", r1)).toBe(true);
    expect(matchesPattern("sample-R1.fastq.gz", r1)).toBe(true);
    expect(matchesPattern("R1sample.fastq", r1)).toBe(false);
  });

  it("needs every include and no exclude to match", () => {
    const filter = new FileNameFilter(["^.gz", "^R1^"], ["I1"]);
    expect(filter.select(["s_R1.fastq.gz", "s_R2.fastq.gz", "s_I1_R1.fastq.gz", "s_R1.fastq"])).toEqual([
      "s_R1.fastq.gz"
    ]);
  });

  it("accepts everything with empty lists", () => {
    expect(new FileNameFilter().select(["a", "b.txt"])).toEqual(["a", "b.txt"]);
  });
});
