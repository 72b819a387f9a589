export interface ExecutionResources {
  /** 0 disables the limit. */
  timeoutSeconds: number;
  signal?: AbortSignal;
}

export interface ExecutionResult {
  /** null when the process was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
  timedOut: boolean;
  aborted: boolean;
}

export interface ProcessSpec {
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** When set, stdout is written to this file instead of being captured. */
  stdoutPath?: string;
}

export interface RunnerBackend {
  execute(spec: ProcessSpec, resources: ExecutionResources): Promise<ExecutionResult>;
}
