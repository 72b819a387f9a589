import { UsageError, parseRunArgs, usage, type RunArgs } from "../src/cli/runArgs.js";
import { runModuleJob } from "../src/jobs/moduleRunner.js";
import { createRuntime, loadSettings } from "../src/runtime.js";

async function main(): Promise<void> {
  let args: RunArgs | null;
  try {
    args = parseRunArgs(process.argv.slice(2));
  } catch (e) {
    if (e instanceof UsageError) {
      process.stderr.write(`${e.message}\n\n${usage()}`);
      process.exitCode = 1;
      return;
    }
    throw e;
  }
  if (!args) {
    process.stdout.write(usage());
    return;
  }

  const settings = await loadSettings(args.config ?? undefined);
  const runtime = createRuntime(settings);

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  process.once("SIGTERM", () => controller.abort());

  const result = await runModuleJob(
    {
      moduleName: args.moduleName,
      runArguments: args.runArguments,
      workingDir: args.workingDir,
      ...(args.mock ? { mock: true } : {}),
      signal: controller.signal
    },
    runtime
  );

  process.stdout.write(
    JSON.stringify(
      {
        job_id: result.jobId,
        state: result.state,
        dry_run: result.dryRun,
        command: result.command.text,
        uploaded: result.uploaded,
        remote_output: result.remoteOutput,
        run_log: result.runLogPath,
        unresolved: result.unresolved
      },
      null,
      2
    ) + "\n"
  );
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
