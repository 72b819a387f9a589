import { createReadStream, createWriteStream, promises as fs } from "fs";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { GetObjectCommand, ListObjectsV2Command, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { ObjectStoreConfig } from "../config/settings.js";
import { TransferError } from "../core/errors.js";
import { OBJECT_STORE_SCHEME } from "./types.js";

export interface ObjectLocation {
  bucket: string;
  key: string;
}

export function parseObjectUri(uri: string): ObjectLocation {
  const trimmed = uri.trim();
  if (!trimmed.startsWith(OBJECT_STORE_SCHEME)) {
    throw new TransferError(`not an object store uri: ${uri}`);
  }
  const rest = trimmed.slice(OBJECT_STORE_SCHEME.length);
  const slash = rest.indexOf("/");
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const key = slash === -1 ? "" : rest.slice(slash + 1);
  if (!bucket) throw new TransferError(`object store uri has no bucket: ${uri}`);
  return { bucket, key };
}

export function formatObjectUri(loc: ObjectLocation): string {
  return `${OBJECT_STORE_SCHEME}${loc.bucket}/${loc.key}`;
}

/** The object store operations the transfer layer needs. */
export interface ObjectStoreClient {
  getObject(loc: ObjectLocation, destPath: string, signal?: AbortSignal): Promise<void>;
  /** All keys under `prefix.key`, recursively. */
  listObjects(prefix: ObjectLocation, signal?: AbortSignal): Promise<string[]>;
  putObject(loc: ObjectLocation, sourcePath: string, signal?: AbortSignal): Promise<void>;
}

export class S3ObjectStore implements ObjectStoreClient {
  constructor(
    private readonly client: S3Client,
    private readonly serverSideEncryption: "AES256" | "aws:kms" | null = "AES256"
  ) {}

  static fromConfig(config: ObjectStoreConfig): S3ObjectStore {
    const client = new S3Client({
      region: config.region ?? process.env.AWS_REGION ?? "us-east-1",
      ...(config.endpoint ? { endpoint: config.endpoint } : {}),
      ...(config.force_path_style !== undefined ? { forcePathStyle: config.force_path_style } : {})
    });
    const sse = config.server_side_encryption ?? "AES256";
    return new S3ObjectStore(client, sse === "none" ? null : sse);
  }

  async getObject(loc: ObjectLocation, destPath: string, signal?: AbortSignal): Promise<void> {
    const { Body } = await this.client.send(new GetObjectCommand({ Bucket: loc.bucket, Key: loc.key }), {
      abortSignal: signal
    });
    if (!(Body instanceof Readable)) {
      throw new TransferError(`unexpected object body for ${formatObjectUri(loc)}`);
    }
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await pipeline(Body, createWriteStream(destPath), { signal });
  }

  async listObjects(prefix: ObjectLocation, signal?: AbortSignal): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const page = await this.client.send(
        new ListObjectsV2Command({ Bucket: prefix.bucket, Prefix: prefix.key, ContinuationToken: continuationToken }),
        { abortSignal: signal }
      );
      for (const obj of page.Contents ?? []) {
        if (obj.Key) keys.push(obj.Key);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
    return keys;
  }

  async putObject(loc: ObjectLocation, sourcePath: string, signal?: AbortSignal): Promise<void> {
    const st = await fs.stat(sourcePath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: loc.bucket,
        Key: loc.key,
        Body: createReadStream(sourcePath),
        ContentLength: st.size,
        ...(this.serverSideEncryption ? { ServerSideEncryption: this.serverSideEncryption } : {})
      }),
      { abortSignal: signal }
    );
  }
}
