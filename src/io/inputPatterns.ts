import { ConfigurationError } from "../core/errors.js";
import { fileOnly } from "../core/filePath.js";
import type { StorageTransfer } from "../storage/types.js";
import type { IODescriptor } from "./ioDescriptor.js";

/**
 * Input entries may select files from a folder instead of naming them:
 *
 *   /dir/*       every file in /dir
 *   /dir/*.bam   files containing ".bam"
 *   /dir/^fastq  files ending with "fastq"
 *   /dir/R1^     files starting with "R1"
 */
export function isInputPattern(entry: string): boolean {
  const name = fileOnly(entry);
  return name.includes("*") || name.includes("^");
}

export async function expandInputPatterns(
  descriptor: IODescriptor,
  transfer: StorageTransfer,
  signal?: AbortSignal
): Promise<IODescriptor> {
  if (!descriptor.primaryInputs.some(isInputPattern)) return descriptor;

  const expanded: string[] = [];
  for (const entry of descriptor.primaryInputs) {
    if (!isInputPattern(entry)) {
      expanded.push(entry);
      continue;
    }
    const slash = entry.lastIndexOf("/");
    const dir = entry.slice(0, slash + 1);
    const pattern = entry.slice(slash + 1);
    const text = pattern.includes("^") ? pattern : pattern.split("*").join("");
    const include = text === "" ? [] : [text];
    const matches = await transfer.listFiles(dir, { include, signal });
    if (matches.length === 0) throw new ConfigurationError(`input pattern ${entry} matched no files`);
    expanded.push(...matches);
  }
  return Object.freeze({ ...descriptor, primaryInputs: Object.freeze(expanded) });
}
