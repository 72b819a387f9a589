import type { StorageTransfer } from "../storage/types.js";

export interface UploadOutcome {
  uploaded: boolean;
  remote: string;
}

/** Uploads the whole local output folder once. Mock and dry-run runs upload nothing. */
export async function uploadOutput(
  transfer: StorageTransfer,
  localOutDir: string,
  remoteOutDir: string,
  opts: { mock?: boolean; dryRun?: boolean; signal?: AbortSignal } = {}
): Promise<UploadOutcome> {
  if (opts.mock || opts.dryRun) return { uploaded: false, remote: remoteOutDir };
  const remote = await transfer.uploadFolder(localOutDir, remoteOutDir, { signal: opts.signal });
  return { uploaded: true, remote };
}
