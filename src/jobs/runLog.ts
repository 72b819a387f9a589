import { promises as fs } from "fs";
import path from "path";
import type { JsonObject } from "../core/json.js";
import type { JobEvent, JobState } from "./jobRun.js";

export interface RunLogRecord {
  job_id: string;
  module_name: string;
  state: JobState;
  program_name: string | null;
  program_subname: string | null;
  program_version: string | null;
  module_version: string | null;
  sample_id: string | null;
  template_hash: string | null;
  settings_hash: string | null;
  dry_run: boolean;
  mock: boolean;
  /** The attempted command, also on failure. */
  command: string | null;
  exit_code: number | null;
  error: string | null;
  unresolved: string[];
  remote_output: string | null;
  started_at: string;
  finished_at: string;
  events: JobEvent[];
}

export function runLogFileName(moduleName: string, jobId: string): string {
  return `${moduleName}.${jobId}.job.log`;
}

export async function writeRunLog(outDir: string, record: RunLogRecord): Promise<string> {
  const file = path.join(outDir, runLogFileName(record.module_name, record.job_id));
  await fs.mkdir(outDir, { recursive: true });
  await fs.writeFile(file, JSON.stringify(record, null, 2) + "\n", "utf8");
  return file;
}

export function runLogSummary(record: RunLogRecord): JsonObject {
  return {
    job_id: record.job_id,
    module_name: record.module_name,
    state: record.state,
    dry_run: record.dry_run,
    command: record.command,
    exit_code: record.exit_code,
    error: record.error,
    unresolved: record.unresolved,
    remote_output: record.remote_output
  };
}
