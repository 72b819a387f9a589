import { describe, expect, it } from "vitest";
import { fileFolder, fileOnly, filePathValueOf, joinPath, multiplePaths, singlePath } from "../src/core/filePath.js";
import { fileTypesMatch, inferFileType } from "../src/core/fileType.js";

describe("inferFileType", () => {
  it("treats registered compound suffixes as one type", () => {
    expect(inferFileType("sample.fastq.gz")).toBe("fastq.gz");
    expect(inferFileType("s3://reads/SAMPLE_R1.FASTQ.GZ")).toBe("FASTQ.GZ");
    expect(inferFileType("sample.bam")).toBe("bam");
    expect(inferFileType("calls.vcf.gz")).toBe("gz");
    expect(inferFileType("calls.vcf.gz", ["VCF.GZ"])).toBe("vcf.gz");
  });

  it("needs a base name in front of a compound suffix", () => {
    expect(inferFileType("fastq.gz")).toBe("gz");
  });

  it("returns an empty type for folders and extensionless names", () => {
    expect(inferFileType("s3://bucket/run_folder/")).toBe("");
    expect(inferFileType("/data/v1.2/README")).toBe("");
  });

  it("inspects only the first path of a list", () => {
    expect(inferFileType(multiplePaths(["a_R1.fastq.gz", "a_R2.bam"]))).toBe("fastq.gz");
  });

  it("compares types case-insensitively", () => {
    expect(fileTypesMatch("fastq.gz", "FASTQ.GZ")).toBe(true);
    expect(fileTypesMatch("bam", "sam")).toBe(false);
  });
});

describe("file paths", () => {
  it("splits folder and file name", () => {
    expect(fileOnly("s3://fastq/my.fastq")).toBe("my.fastq");
    expect(fileFolder("s3://fastq/my.fastq")).toBe("s3://fastq/");
    expect(fileFolder("/data/bcl_out")).toBe("/data/bcl_out/");
    expect(fileFolder("/data/bcl_out//")).toBe("/data/bcl_out/");
  });

  it("joins without normalizing the scheme", () => {
    expect(joinPath("s3://align", "my.sam")).toBe("s3://align/my.sam");
    expect(joinPath("/work/out/", "")).toBe("/work/out/");
  });

  it("builds single or multiple values from a list", () => {
    expect(filePathValueOf([])).toBeNull();
    expect(filePathValueOf(["a.bam"])).toEqual(singlePath("a.bam"));
    expect(filePathValueOf(["r1.fq", "r2.fq"])).toEqual({ kind: "multiple", paths: ["r1.fq", "r2.fq"] });
  });
});
