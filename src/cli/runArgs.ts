export interface RunArgs {
  moduleName: string;
  runArguments: string;
  workingDir: string;
  config: string | null;
  mock: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const FLAGS = new Set(["mock", "help"]);

export function usage(): string {
  return [
    "usage:",
    "  run-module --module_name <module> --run_arguments <path.io.json> --working_dir <dir> [--config <settings.yaml>] [--mock]",
    "",
    "env:",
    "  MODULE_RUNNER_CONFIG (settings file when --config is absent)",
    "  TEMPLATE_ROOT, RUNS_DIR (override the settings file)",
    ""
  ].join("\n");
}

export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new UsageError(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new UsageError(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

/** Returns null for --help. */
export function parseRunArgs(argv: string[]): RunArgs | null {
  const args = parseArgs(argv);
  if (args.help) return null;

  const moduleName = args.module_name;
  const runArguments = args.run_arguments;
  const workingDir = args.working_dir;
  if (typeof moduleName !== "string" || typeof runArguments !== "string" || typeof workingDir !== "string") {
    throw new UsageError("--module_name, --run_arguments and --working_dir are required");
  }
  const config = typeof args.config === "string" ? args.config : null;
  return { moduleName, runArguments, workingDir, config, mock: args.mock === true };
}
