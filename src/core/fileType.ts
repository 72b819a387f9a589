import { fileOnly, firstPath, type FilePathValue } from "./filePath.js";

/** Two-segment suffixes that name a single file type. */
export const DEFAULT_COMPOUND_FILE_TYPES: readonly string[] = ["FASTQ.GZ"];

export function canonicalFileType(fileType: string): string {
  return fileType.trim().toUpperCase();
}

export function fileTypesMatch(a: string, b: string): boolean {
  return canonicalFileType(a) === canonicalFileType(b);
}

/**
 * Infers a file type from the extension of a file name, keeping the original casing.
 * For a list of paths only the first one is inspected.
 *
 *   inferFileType("sample.fastq.gz") === "fastq.gz"
 *   inferFileType("sample.bam")      === "bam"
 *   inferFileType("s3://bucket/dir/") === ""
 */
export function inferFileType(
  value: string | FilePathValue,
  compoundTypes: readonly string[] = DEFAULT_COMPOUND_FILE_TYPES
): string {
  const path = typeof value === "string" ? value : firstPath(value);
  const name = fileOnly(path);
  if (!name.includes(".")) return "";

  const segments = name.split(".");
  const upper = name.toUpperCase();
  for (const compound of compoundTypes) {
    const c = canonicalFileType(compound);
    if (!c) continue;
    const width = c.split(".").length;
    if (upper.endsWith(`.${c}`) && segments.length > width) {
      return segments.slice(-width).join(".");
    }
  }
  return segments[segments.length - 1] ?? "";
}
