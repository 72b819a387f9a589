/**
 * Caret-delimited file name patterns used when listing folders:
 *
 *   "^.bam"   name ends with ".bam"
 *   "hepg2^"  name starts with "hepg2"
 *   "^R1^"    "R1" follows one of "_", "-", "." (e.g. sample_R1.fastq.gz)
 *   "I1"      name contains "I1"
 */
export type FilePattern =
  | { kind: "suffix"; text: string }
  | { kind: "prefix"; text: string }
  | { kind: "infix"; text: string }
  | { kind: "contains"; text: string };

const INFIX_SEPARATORS = ["_", "-", "."] as const;

export function parsePattern(raw: string): FilePattern {
  const starts = raw.startsWith("^");
  const ends = raw.endsWith("^");
  if (starts && ends && raw.length >= 2) return { kind: "infix", text: raw.slice(1, -1) };
  if (starts) return { kind: "suffix", text: raw.slice(1) };
  if (ends) return { kind: "prefix", text: raw.slice(0, -1) };
  return { kind: "contains", text: raw };
}

export function matchesPattern(name: string, pattern: FilePattern): boolean {
  switch (pattern.kind) {
    case "suffix":
      return name.endsWith(pattern.text);
    case "prefix":
      return name.startsWith(pattern.text);
    case "infix":
      return INFIX_SEPARATORS.some((sep) => name.includes(`${sep}${pattern.text}`));
    case "contains":
      return name.includes(pattern.text);
  }
}

export class FileNameFilter {
  private readonly include: FilePattern[];
  private readonly exclude: FilePattern[];

  constructor(include: readonly string[] = [], exclude: readonly string[] = []) {
    this.include = include.map(parsePattern);
    this.exclude = exclude.map(parsePattern);
  }

  /** Every include pattern must match; no exclude pattern may. Empty lists constrain nothing. */
  accepts(name: string): boolean {
    if (!this.include.every((p) => matchesPattern(name, p))) return false;
    return !this.exclude.some((p) => matchesPattern(name, p));
  }

  select(names: readonly string[]): string[] {
    return names.filter((n) => this.accepts(n));
  }
}
