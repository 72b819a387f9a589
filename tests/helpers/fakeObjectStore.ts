import { promises as fs } from "fs";
import path from "path";
import type { ObjectLocation, ObjectStoreClient } from "../../src/storage/objectStore.js";

/** In-process object store keyed by bucket and key. */
export class FakeObjectStore implements ObjectStoreClient {
  private readonly objects = new Map<string, Buffer>();
  readonly downloads: Array<{ key: string; dest: string }> = [];
  readonly uploads: Array<{ bucket: string; key: string }> = [];

  put(bucket: string, key: string, content: string): void {
    this.objects.set(`${bucket}/${key}`, Buffer.from(content, "utf8"));
  }

  read(bucket: string, key: string): string | null {
    return this.objects.get(`${bucket}/${key}`)?.toString("utf8") ?? null;
  }

  async getObject(loc: ObjectLocation, destPath: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const body = this.objects.get(`${loc.bucket}/${loc.key}`);
    if (!body) throw new Error(`NoSuchKey: ${loc.bucket}/${loc.key}`);
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.writeFile(destPath, body);
    this.downloads.push({ key: loc.key, dest: destPath });
  }

  async listObjects(prefix: ObjectLocation, signal?: AbortSignal): Promise<string[]> {
    signal?.throwIfAborted();
    const bucketPrefix = `${prefix.bucket}/`;
    return [...this.objects.keys()]
      .filter((id) => id.startsWith(bucketPrefix))
      .map((id) => id.slice(bucketPrefix.length))
      .filter((key) => key.startsWith(prefix.key))
      .sort();
  }

  async putObject(loc: ObjectLocation, sourcePath: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.objects.set(`${loc.bucket}/${loc.key}`, await fs.readFile(sourcePath));
    this.uploads.push({ bucket: loc.bucket, key: loc.key });
  }
}
