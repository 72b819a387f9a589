import { promises as fs } from "fs";
import path from "path";
import { ConfigurationError } from "../core/errors.js";

export interface JobWorkspace {
  rootDir: string;
  /** Staged inputs. */
  inDir: string;
  /** Program outputs and the run log; uploaded as a whole. */
  outDir: string;
  /** IO request and other job bookkeeping. */
  metaDir: string;
}

const SUBDIRS = ["in", "out", "meta"] as const;

// Directories end with "/" so joined command-line paths read the same for local and object-store folders.
export async function createJobWorkspace(workingDir: string, jobId: string): Promise<JobWorkspace> {
  const base = path.resolve(workingDir);
  const root = path.join(base, jobId);
  const rel = path.relative(base, root);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new ConfigurationError(`job id escapes the working directory: ${JSON.stringify(jobId)}`);
  }

  const [inDir, outDir, metaDir] = await Promise.all(
    SUBDIRS.map(async (sub) => {
      const dir = path.join(root, sub);
      await fs.mkdir(dir, { recursive: true });
      return `${dir}/`;
    })
  );
  if (inDir === undefined || outDir === undefined || metaDir === undefined) {
    throw new Error("workspace layout is incomplete");
  }

  return { rootDir: root, inDir, outDir, metaDir };
}
