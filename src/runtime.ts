import path from "path";
import { EngineSettings } from "./config/settings.js";
import { LocalProcessRunner } from "./execution/backends/localProcess.js";
import type { RunnerBackend } from "./execution/backends/types.js";
import { S3ObjectStore, type ObjectStoreClient } from "./storage/objectStore.js";
import { DefaultStorageTransfer, type TransferEvent } from "./storage/storageTransfer.js";
import type { StorageTransfer } from "./storage/types.js";
import { TemplateStore } from "./templates/templateStore.js";

export const DEFAULT_CONFIG_PATH = "config/default.config.yaml";

export interface Runtime {
  settings: EngineSettings;
  transfer: StorageTransfer;
  templates: TemplateStore;
  runner: RunnerBackend;
}

/** Settings from `configPath`, MODULE_RUNNER_CONFIG or the default file, with TEMPLATE_ROOT and RUNS_DIR overrides. */
export async function loadSettings(configPath?: string): Promise<EngineSettings> {
  let settings = await EngineSettings.loadFromFile(configPath ?? process.env.MODULE_RUNNER_CONFIG ?? DEFAULT_CONFIG_PATH);
  const templateRoot = process.env.TEMPLATE_ROOT?.trim();
  if (templateRoot) settings = settings.withTemplateRoot(templateRoot);
  const runsDir = process.env.RUNS_DIR?.trim();
  if (runsDir) settings = settings.withRunsDir(runsDir);
  return settings;
}

export function createRuntime(
  settings: EngineSettings,
  opts: {
    objectStore?: ObjectStoreClient | null;
    runner?: RunnerBackend;
    templateCacheDir?: string;
    onTransfer?: (event: TransferEvent) => void;
  } = {}
): Runtime {
  const objectStore = opts.objectStore === undefined ? S3ObjectStore.fromConfig(settings.objectStore()) : opts.objectStore;
  const transfer = new DefaultStorageTransfer({
    objectStore,
    timeoutMs: settings.transferTimeoutMs(),
    ...(opts.onTransfer ? { onTransfer: opts.onTransfer } : {})
  });
  const templates = new TemplateStore({
    templateRoot: settings.templateRoot(),
    transfer,
    cacheDir: opts.templateCacheDir ?? path.join(settings.runsDir(), ".templates")
  });
  return { settings, transfer, templates, runner: opts.runner ?? new LocalProcessRunner() };
}
