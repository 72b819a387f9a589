import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { contentHash, stableJsonStringify, type ContentHash } from "../core/hashing.js";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_COMPOUND_FILE_TYPES } from "../core/fileType.js";

export const DEFAULT_DRY_RUN_MARKER = "-dryrun";

const zObjectStoreConfig = z.object({
  region: z.string().min(1).optional(),
  endpoint: z.string().min(1).optional(),
  force_path_style: z.boolean().optional(),
  server_side_encryption: z.enum(["AES256", "aws:kms", "none"]).optional()
});

export const zEngineConfig = z.object({
  version: z.literal(1),
  template_root: z.string().min(1),
  runs_dir: z.string().min(1).optional(),
  dry_run_marker: z.string().min(1).optional(),
  compound_file_types: z.array(z.string().min(1)).optional(),
  transfer: z
    .object({
      mock: z.boolean().optional(),
      timeout_seconds: z.number().int().min(1).optional(),
      object_store: zObjectStoreConfig.optional()
    })
    .optional(),
  execution: z
    .object({
      timeout_seconds: z.number().int().min(1).optional()
    })
    .optional()
});

export type EngineConfig = z.infer<typeof zEngineConfig>;
export type ObjectStoreConfig = z.infer<typeof zObjectStoreConfig>;

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const m1 = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed);
  if (m1) {
    const varName = m1[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  const m2 = /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m2) {
    const varName = m2[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  return value;
}

function expandConfigEnv(config: EngineConfig): EngineConfig {
  const templateRoot = expandEnvToken(config.template_root);
  if (!templateRoot) {
    throw new ConfigurationError(`template_root references an unset environment variable: ${config.template_root}`);
  }
  const runsDir = config.runs_dir === undefined ? null : expandEnvToken(config.runs_dir);
  const endpoint = config.transfer?.object_store?.endpoint;
  const expandedEndpoint = endpoint === undefined ? null : expandEnvToken(endpoint);

  const out: EngineConfig = { ...config, template_root: templateRoot };
  if (runsDir) out.runs_dir = runsDir;
  else delete out.runs_dir;

  if (config.transfer?.object_store) {
    const objectStore: ObjectStoreConfig = { ...config.transfer.object_store };
    if (expandedEndpoint) objectStore.endpoint = expandedEndpoint;
    else delete objectStore.endpoint;
    out.transfer = { ...config.transfer, object_store: objectStore };
  }
  return out;
}

export function parseEngineConfig(value: unknown, source: string): EngineConfig {
  const parsed = zEngineConfig.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`invalid settings at ${source}: ${issues}`);
  }
  return expandConfigEnv(parsed.data);
}

export class EngineSettings {
  readonly settingsHash: ContentHash;

  constructor(private readonly config: EngineConfig) {
    this.settingsHash = contentHash(stableJsonStringify(config));
  }

  static async loadFromFile(filePath: string): Promise<EngineSettings> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (e) {
      throw new ConfigurationError(`unable to read settings file ${filePath}`, { cause: e });
    }
    let doc: unknown;
    try {
      doc = YAML.parse(raw) as unknown;
    } catch (e) {
      throw new ConfigurationError(`settings file is not valid YAML: ${filePath}`, { cause: e });
    }
    return new EngineSettings(parseEngineConfig(doc, filePath));
  }

  snapshot(): EngineConfig {
    return structuredClone(this.config);
  }

  templateRoot(): string {
    return this.config.template_root;
  }

  runsDir(): string {
    return this.config.runs_dir ?? "var/runs";
  }

  dryRunMarker(): string {
    return this.config.dry_run_marker ?? DEFAULT_DRY_RUN_MARKER;
  }

  compoundFileTypes(): readonly string[] {
    return this.config.compound_file_types ?? DEFAULT_COMPOUND_FILE_TYPES;
  }

  transferMock(): boolean {
    return this.config.transfer?.mock ?? false;
  }

  transferTimeoutMs(): number {
    return (this.config.transfer?.timeout_seconds ?? 3600) * 1000;
  }

  objectStore(): ObjectStoreConfig {
    return this.config.transfer?.object_store ?? {};
  }

  executionTimeoutSeconds(): number {
    return this.config.execution?.timeout_seconds ?? 86_400;
  }

  /** Returns a copy with a different template root, e.g. from TEMPLATE_ROOT. */
  withTemplateRoot(templateRoot: string): EngineSettings {
    return new EngineSettings({ ...this.config, template_root: templateRoot });
  }

  withRunsDir(runsDir: string): EngineSettings {
    return new EngineSettings({ ...this.config, runs_dir: runsDir });
  }
}
