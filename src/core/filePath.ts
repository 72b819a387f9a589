/**
 * A slot value is either one path or an ordered list of paths (e.g. paired-end reads).
 * Order is significant: staged local paths must come back in the order of the remote list.
 */
export type FilePathValue =
  | { kind: "single"; path: string }
  | { kind: "multiple"; paths: readonly string[] };

export function singlePath(path: string): FilePathValue {
  return { kind: "single", path };
}

export function multiplePaths(paths: readonly string[]): FilePathValue {
  return { kind: "multiple", paths: [...paths] };
}

export function filePathValueOf(paths: readonly string[]): FilePathValue | null {
  const [first] = paths;
  if (first === undefined) return null;
  return paths.length === 1 ? singlePath(first) : multiplePaths(paths);
}

export function toPathList(value: FilePathValue): string[] {
  return value.kind === "single" ? [value.path] : [...value.paths];
}

export function firstPath(value: FilePathValue): string {
  return value.kind === "single" ? value.path : value.paths[0] ?? "";
}

export function mapPaths(value: FilePathValue, fn: (path: string) => string): FilePathValue {
  return value.kind === "single" ? singlePath(fn(value.path)) : multiplePaths(value.paths.map(fn));
}

export function fileOnly(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx === -1 ? path : path.slice(idx + 1);
}

/**
 * Folder part of a path, always with exactly one trailing "/".
 * A final segment without "." is taken to be a folder name already.
 *
 *   fileFolder("s3://fastq/my.fastq") === "s3://fastq/"
 *   fileFolder("/data/bcl_out")        === "/data/bcl_out/"
 */
export function fileFolder(path: string): string {
  const name = fileOnly(path);
  if (name.includes(".")) return path.slice(0, path.length - name.length);
  return path.replace(/\/+$/, "") + "/";
}

// Joins without normalizing, so "s3://" schemes survive. An empty name yields the folder itself.
export function joinPath(dir: string, name: string): string {
  if (name === "") return dir;
  if (dir === "") return name;
  return dir.endsWith("/") ? `${dir}${name}` : `${dir}/${name}`;
}
