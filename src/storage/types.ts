import type { FilePathValue } from "../core/filePath.js";
import { firstPath } from "../core/filePath.js";

export type Filesystem = "object_store" | "local";

export const OBJECT_STORE_SCHEME = "s3://";

export interface TransferOptions {
  /** Overrides the filesystem inferred from the path prefix. */
  filesystem?: Filesystem;
  /** Computes the resulting paths without touching any storage. */
  mock?: boolean;
  signal?: AbortSignal;
}

export interface ListOptions {
  filesystem?: Filesystem;
  include?: readonly string[];
  exclude?: readonly string[];
  signal?: AbortSignal;
}

export interface StorageTransfer {
  /** Returns local paths in the order of `remote`. */
  downloadFiles(remote: FilePathValue, destDir: string, opts?: TransferOptions): Promise<FilePathValue>;
  downloadFolder(remote: string, destDir: string, opts?: TransferOptions): Promise<string>;
  uploadFolder(localDir: string, remoteDir: string, opts?: TransferOptions): Promise<string>;
  /** Direct children of `dir` (files only), as full paths, filtered by caret patterns. */
  listFiles(dir: string, opts?: ListOptions): Promise<string[]>;
}

export function inferFilesystem(value: string | FilePathValue): Filesystem {
  const p = typeof value === "string" ? value : firstPath(value);
  return p.trimStart().startsWith(OBJECT_STORE_SCHEME) ? "object_store" : "local";
}
