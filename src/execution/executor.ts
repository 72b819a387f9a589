import { ExecutionError, errorMessage } from "../core/errors.js";
import { fileOnly } from "../core/filePath.js";
import type { JsonObject } from "../core/json.js";
import { DEFAULT_DRY_RUN_MARKER } from "../config/settings.js";
import type { AssembledCommand } from "../module/argumentAssembler.js";
import type { ExecutionResult, RunnerBackend } from "./backends/types.js";

export type CommandInput = AssembledCommand | readonly string[] | string;

export type ExecutionOutcome =
  | { kind: "dry_run"; tokens: string[]; text: string }
  | { kind: "executed"; tokens: string[]; text: string; result: ExecutionResult; stdoutPath: string | null };

export type ExecutionEventSink = (kind: string, message: string, data: JsonObject | null) => void;

export interface ExecuteOptions {
  dryRunMarker?: string;
  /** stdout goes to this file when its name has an extension. */
  outputFile?: string | null;
  cwd?: string;
  timeoutSeconds?: number;
  signal?: AbortSignal;
  onEvent?: ExecutionEventSink;
}

export function commandTokens(command: CommandInput): string[] {
  if (typeof command === "string") return command.split(" ").filter((t) => t !== "");
  if ("tokens" in command) return [...command.tokens];
  return [...command];
}

export function isDryRunCommand(command: CommandInput, marker: string = DEFAULT_DRY_RUN_MARKER): boolean {
  return commandTokens(command).includes(marker);
}

function stdoutTarget(outputFile: string | null | undefined): string | null {
  if (!outputFile) return null;
  return fileOnly(outputFile).includes(".") ? outputFile : null;
}

/** Runs an assembled command, or only records it when it carries the dry-run marker. No retries. */
export async function executeCommand(
  command: CommandInput,
  runner: RunnerBackend,
  opts: ExecuteOptions = {}
): Promise<ExecutionOutcome> {
  const tokens = commandTokens(command);
  const text = tokens.join(" ");

  if (isDryRunCommand(tokens, opts.dryRunMarker)) {
    opts.onEvent?.("execution.dry_run", `DRYRUN - NOTHING SUBMITTED: ${text}`, null);
    return { kind: "dry_run", tokens, text };
  }

  if (tokens.length === 0) throw new ExecutionError("program execution failed: empty command", null);

  const stdoutPath = stdoutTarget(opts.outputFile);
  opts.onEvent?.("execution.started", text, { stdout_path: stdoutPath });

  let result: ExecutionResult;
  try {
    result = await runner.execute(
      { argv: tokens, ...(opts.cwd ? { cwd: opts.cwd } : {}), ...(stdoutPath ? { stdoutPath } : {}) },
      { timeoutSeconds: opts.timeoutSeconds ?? 0, signal: opts.signal }
    );
  } catch (e) {
    throw new ExecutionError(`program execution failed: ${errorMessage(e)}`, null, "", { cause: e });
  }

  if (result.timedOut) {
    throw new ExecutionError(`program execution timed out after ${opts.timeoutSeconds ?? 0}s`, result.exitCode, result.stderr);
  }
  if (result.aborted) {
    throw new ExecutionError("program execution aborted", result.exitCode, result.stderr);
  }
  if (result.exitCode !== 0) {
    throw new ExecutionError(
      `program execution failed (exit ${result.exitCode === null ? "signal" : result.exitCode})`,
      result.exitCode,
      result.stderr
    );
  }

  opts.onEvent?.("execution.finished", `exit ${result.exitCode}`, {
    started_at: result.startedAt,
    finished_at: result.finishedAt
  });
  return { kind: "executed", tokens, text, result, stdoutPath };
}
