import { promises as fs } from "fs";
import type { EngineSettings } from "../config/settings.js";
import { ConfigurationError, ExecutionError, errorMessage } from "../core/errors.js";
import { fileFolder, fileOnly, firstPath, singlePath, toPathList } from "../core/filePath.js";
import { isSafeJobId, newJobId } from "../core/ids.js";
import { positionToNumber } from "../core/position.js";
import type { RunnerBackend } from "../execution/backends/types.js";
import { executeCommand } from "../execution/executor.js";
import { uploadOutput } from "../execution/outputStager.js";
import { createJobWorkspace } from "../execution/workspace.js";
import { buildIoDescriptor } from "../io/ioDescriptor.js";
import { parseIoRequest } from "../io/ioRequest.js";
import { expandInputPatterns } from "../io/inputPatterns.js";
import {
  buildCommand,
  stageModuleInstance,
  toAssembledCommand,
  type AssembledCommand
} from "../module/argumentAssembler.js";
import type { ModuleInstance, StagedBinding } from "../module/moduleInstance.js";
import { createModuleInstance } from "../module/slotMatcher.js";
import type { StorageTransfer } from "../storage/types.js";
import { assertModuleName, type TemplateStore } from "../templates/templateStore.js";
import { JobRun, type JobEventSink, type JobState } from "./jobRun.js";
import { writeRunLog, type RunLogRecord } from "./runLog.js";

const IO_REQUEST_SUFFIX = ".io.json";

/** `<module>.<jobId>.io.json` names the job; anything else gets a fresh id. */
export function jobIdFromRunArgumentsPath(runArguments: string): string | null {
  const name = fileOnly(runArguments);
  if (!name.endsWith(IO_REQUEST_SUFFIX)) return null;
  const stem = name.slice(0, -IO_REQUEST_SUFFIX.length);
  const dot = stem.indexOf(".");
  if (dot === -1) return null;
  const id = stem.slice(dot + 1);
  return id !== "" && isSafeJobId(id) ? id : null;
}

export interface ModuleJobParams {
  moduleName: string;
  /** Path (local or s3://) of the IO request document. */
  runArguments: string;
  workingDir: string;
  jobId?: string;
  mock?: boolean;
  signal?: AbortSignal;
}

export interface ModuleJobDeps {
  settings: EngineSettings;
  transfer: StorageTransfer;
  templates: TemplateStore;
  runner: RunnerBackend;
  sink?: JobEventSink;
}

export interface ModuleJobResult {
  jobId: string;
  state: JobState;
  dryRun: boolean;
  command: AssembledCommand;
  uploaded: boolean;
  remoteOutput: string;
  runLogPath: string;
  workspaceDir: string;
  unresolved: string[];
}

// The tool writes its result to stdout when the primary output is a file slot kept off the command line.
function stdoutFileFor(staged: readonly StagedBinding[]): string | null {
  const out = staged.find((b) => b.category === "primary_output");
  if (!out || out.slot.kind !== "file" || out.slot.position.kind !== "suppressed") return null;
  return firstPath(out.local);
}

async function readIoRequest(path: string): Promise<unknown> {
  const raw = await fs.readFile(path, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (e) {
    throw new ConfigurationError(`io request is not valid JSON: ${path}`, { cause: e });
  }
}

/**
 * Runs one module job: template and IO request in, staged inputs, assembled command,
 * execution (or a dry-run record), run log and output upload.
 */
export async function runModuleJob(params: ModuleJobParams, deps: ModuleJobDeps): Promise<ModuleJobResult> {
  assertModuleName(params.moduleName);
  const jobId = params.jobId ?? jobIdFromRunArgumentsPath(params.runArguments) ?? newJobId();
  if (!isSafeJobId(jobId)) throw new ConfigurationError(`invalid job id: ${JSON.stringify(jobId)}`);

  const { settings, transfer, templates, runner } = deps;
  const mock = params.mock ?? settings.transferMock();
  const signal = params.signal;
  const dryRunMarker = settings.dryRunMarker();
  const workspace = await createJobWorkspace(params.workingDir, jobId);
  const run = new JobRun(jobId, params.moduleName, deps.sink);
  const startedAt = new Date().toISOString();

  let instance: ModuleInstance | null = null;
  let templateHash: string | null = null;
  let command: AssembledCommand | null = null;
  let remoteOutput: string | null = null;
  const unresolved: string[] = [];

  const record = (error: unknown): RunLogRecord => ({
    job_id: jobId,
    module_name: params.moduleName,
    state: run.state,
    program_name: instance?.programName ?? null,
    program_subname: instance?.programSubname ?? null,
    program_version: instance?.programVersion ?? null,
    module_version: instance?.moduleVersion ?? null,
    sample_id: instance?.sampleId ?? null,
    template_hash: templateHash,
    settings_hash: settings.settingsHash,
    dry_run: instance?.dryRun ?? false,
    mock,
    command: command?.text ?? null,
    exit_code: error instanceof ExecutionError ? error.exitCode : null,
    error: error === null ? null : errorMessage(error),
    unresolved,
    remote_output: remoteOutput,
    started_at: startedAt,
    finished_at: new Date().toISOString(),
    events: [...run.eventLog()]
  });

  run.event("job.started", `module=${params.moduleName}`, {
    run_arguments: params.runArguments,
    workspace: workspace.rootDir,
    mock
  });

  try {
    const localRequest = await transfer.downloadFiles(singlePath(params.runArguments), workspace.metaDir, { signal });
    const request = parseIoRequest(await readIoRequest(firstPath(localRequest)), params.runArguments);

    const fetched = await templates.fetchTemplate(params.moduleName, signal);
    templateHash = fetched.templateHash;
    const descriptor = await expandInputPatterns(
      buildIoDescriptor(request, { defaults: fetched.template.defaults }),
      transfer,
      signal
    );

    const resolved = createModuleInstance(fetched.template, descriptor, {
      moduleName: params.moduleName,
      compoundFileTypes: settings.compoundFileTypes(),
      onUnresolved: (err) => {
        unresolved.push(err.remotePath);
        run.event("slot.unresolved", err.message, {
          category: err.category,
          remote_path: err.remotePath,
          file_type: err.fileType
        });
        console.error(`warning: ${err.message}`);
      }
    });
    instance = resolved;
    remoteOutput = resolved.primaryOutput?.remoteDirectory ?? fileFolder(descriptor.primaryOutputs[0] ?? "");
    run.transition("RESOLVED_INSTANCE", {
      template_hash: fetched.templateHash,
      sample_id: resolved.sampleId,
      dry_run: resolved.dryRun
    });

    const staged = await stageModuleInstance(resolved, {
      transfer,
      inputDir: workspace.inDir,
      outputDir: workspace.outDir,
      mock,
      signal,
      onStaged: (b) =>
        run.event("slot.staged", b.category, {
          remote: toPathList(b.remote),
          local: toPathList(b.local),
          position: positionToNumber(b.slot.position)
        })
    });
    run.transition("STAGED");

    const assembled = toAssembledCommand(buildCommand(resolved, staged, { dryRunMarker }));
    command = assembled;
    run.transition("ASSEMBLED", { command: assembled.text });

    const outcome = await executeCommand(assembled, runner, {
      dryRunMarker,
      outputFile: stdoutFileFor(staged),
      cwd: workspace.rootDir,
      timeoutSeconds: settings.executionTimeoutSeconds(),
      signal,
      onEvent: (kind, message, data) => run.event(kind, message, data)
    });

    let uploaded = false;
    if (outcome.kind === "dry_run") {
      run.transition("DRY_RUN_SKIPPED");
      run.transition("DONE");
    } else {
      run.transition("EXECUTED");
      await writeRunLog(workspace.outDir, record(null));
      const upload = await uploadOutput(transfer, workspace.outDir, remoteOutput, { mock, signal });
      uploaded = upload.uploaded;
      run.transition("UPLOADED", { remote: upload.remote, uploaded });
      run.transition("DONE");
    }

    const runLogPath = await writeRunLog(workspace.outDir, record(null));
    return {
      jobId,
      state: run.state,
      dryRun: outcome.kind === "dry_run",
      command: assembled,
      uploaded,
      remoteOutput,
      runLogPath,
      workspaceDir: workspace.rootDir,
      unresolved
    };
  } catch (e) {
    if (!run.isTerminal) run.fail(errorMessage(e));
    // The job's own failure is what callers see; a log write error is only reported.
    await writeRunLog(workspace.outDir, record(e)).catch((logErr: unknown) => {
      console.error(`warning: run log not written for ${jobId}: ${errorMessage(logErr)}`);
    });
    throw e;
  }
}
