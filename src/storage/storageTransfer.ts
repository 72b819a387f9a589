import { promises as fs } from "fs";
import path from "path";
import { AbortedError, TransferError, errorMessage } from "../core/errors.js";
import { fileFolder, fileOnly, joinPath, mapPaths, toPathList, type FilePathValue } from "../core/filePath.js";
import type { ObjectStoreClient } from "./objectStore.js";
import { parseObjectUri } from "./objectStore.js";
import { FileNameFilter } from "./patterns.js";
import { inferFilesystem, type Filesystem, type ListOptions, type StorageTransfer, type TransferOptions } from "./types.js";

export interface TransferEvent {
  op: "download_files" | "download_folder" | "upload_folder" | "list_files";
  source: string;
  dest: string;
  mock: boolean;
}

export interface StorageTransferDeps {
  objectStore: ObjectStoreClient | null;
  timeoutMs?: number;
  onTransfer?: (event: TransferEvent) => void;
}

async function listLocalFilesRecursive(root: string): Promise<string[]> {
  const out: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const e of entries) {
      const full = path.join(dir, e.name);
      if (e.isDirectory()) await walk(full);
      else if (e.isFile()) out.push(full);
    }
  };
  await walk(root);
  return out;
}

function withTrailingSlash(p: string): string {
  return p.endsWith("/") ? p : `${p}/`;
}

/**
 * Moves files between the local disk and an object store (s3:// paths).
 * Every call is bounded by `timeoutMs` and by the caller's AbortSignal.
 */
export class DefaultStorageTransfer implements StorageTransfer {
  private readonly timeoutMs: number;

  constructor(private readonly deps: StorageTransferDeps) {
    this.timeoutMs = deps.timeoutMs ?? 3_600_000;
  }

  private requireObjectStore(uri: string): ObjectStoreClient {
    if (!this.deps.objectStore) {
      throw new TransferError(`no object store configured for ${uri}`);
    }
    return this.deps.objectStore;
  }

  private async bounded<T>(label: string, outer: AbortSignal | undefined, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = outer ? AbortSignal.any([outer, timeout]) : timeout;
    try {
      signal.throwIfAborted();
      return await fn(signal);
    } catch (e) {
      if (timeout.aborted) throw new AbortedError(`${label} timed out after ${this.timeoutMs}ms`, { cause: e });
      if (outer?.aborted) throw new AbortedError(`${label} aborted`, { cause: e });
      if (e instanceof TransferError) throw e;
      throw new TransferError(`${label} failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  private filesystemFor(p: string, opts: { filesystem?: Filesystem }): Filesystem {
    return opts.filesystem ?? inferFilesystem(p);
  }

  async downloadFiles(remote: FilePathValue, destDir: string, opts: TransferOptions = {}): Promise<FilePathValue> {
    const local = mapPaths(remote, (p) => joinPath(destDir, fileOnly(p)));
    const mock = opts.mock ?? false;
    this.deps.onTransfer?.({ op: "download_files", source: toPathList(remote).join(","), dest: destDir, mock });
    if (mock) return local;

    const sources = toPathList(remote);
    const targets = toPathList(local);
    await this.bounded(`download of ${sources.join(",")}`, opts.signal, async (signal) => {
      await fs.mkdir(destDir, { recursive: true });
      for (let i = 0; i < sources.length; i++) {
        const src = sources[i];
        const dst = targets[i];
        if (src === undefined || dst === undefined) continue;
        signal.throwIfAborted();
        if (this.filesystemFor(src, opts) === "object_store") {
          await this.requireObjectStore(src).getObject(parseObjectUri(src), dst, signal);
        } else {
          await fs.copyFile(src, dst);
        }
      }
    });
    return local;
  }

  /**
   * Copies the contents of a folder into `destDir`. When `remote` names a file, its containing
   * folder is copied (a reference plus its index files) and the local path of that file is returned.
   */
  async downloadFolder(remote: string, destDir: string, opts: TransferOptions = {}): Promise<string> {
    const name = fileOnly(remote);
    const namesFile = name.includes(".");
    const source = namesFile ? fileFolder(remote) : remote;
    const result = namesFile ? joinPath(destDir, name) : destDir;
    const mock = opts.mock ?? false;
    this.deps.onTransfer?.({ op: "download_folder", source, dest: destDir, mock });
    if (mock) return result;

    await this.bounded(`folder download of ${source}`, opts.signal, async (signal) => {
      await fs.mkdir(destDir, { recursive: true });
      if (this.filesystemFor(source, opts) === "object_store") {
        const store = this.requireObjectStore(source);
        const prefix = parseObjectUri(withTrailingSlash(source));
        const keys = await store.listObjects(prefix, signal);
        for (const key of keys) {
          if (key.endsWith("/")) continue;
          const rel = key.slice(prefix.key.length);
          signal.throwIfAborted();
          await store.getObject({ bucket: prefix.bucket, key }, path.join(destDir, ...rel.split("/")), signal);
        }
      } else {
        await fs.cp(source, destDir, { recursive: true });
      }
    });
    return result;
  }

  async uploadFolder(localDir: string, remoteDir: string, opts: TransferOptions = {}): Promise<string> {
    const mock = opts.mock ?? false;
    this.deps.onTransfer?.({ op: "upload_folder", source: localDir, dest: remoteDir, mock });
    if (mock) return remoteDir;

    await this.bounded(`upload of ${localDir} to ${remoteDir}`, opts.signal, async (signal) => {
      if (this.filesystemFor(remoteDir, opts) === "object_store") {
        const store = this.requireObjectStore(remoteDir);
        const prefix = parseObjectUri(withTrailingSlash(remoteDir));
        for (const file of await listLocalFilesRecursive(localDir)) {
          const rel = path.relative(localDir, file).split(path.sep).join("/");
          signal.throwIfAborted();
          await store.putObject({ bucket: prefix.bucket, key: `${prefix.key}${rel}` }, file, signal);
        }
      } else {
        await fs.mkdir(remoteDir, { recursive: true });
        await fs.cp(localDir, remoteDir, { recursive: true });
      }
    });
    return remoteDir;
  }

  async listFiles(dir: string, opts: ListOptions = {}): Promise<string[]> {
    const filter = new FileNameFilter(opts.include, opts.exclude);
    this.deps.onTransfer?.({ op: "list_files", source: dir, dest: "", mock: false });

    const names = await this.bounded(`listing of ${dir}`, opts.signal, async (signal) => {
      if (this.filesystemFor(dir, opts) === "object_store") {
        const prefix = parseObjectUri(withTrailingSlash(dir));
        const keys = await this.requireObjectStore(dir).listObjects(prefix, signal);
        return keys.map((k) => k.slice(prefix.key.length)).filter((rel) => rel.length > 0 && !rel.includes("/"));
      }
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries.filter((e) => e.isFile()).map((e) => e.name);
    });

    return filter
      .select(names)
      .sort()
      .map((n) => joinPath(dir, n));
  }
}
