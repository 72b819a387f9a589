import { promises as fs } from "fs";
import path from "path";
import { contentHash, type ContentHash } from "../core/hashing.js";
import { ConfigurationError } from "../core/errors.js";
import { joinPath, singlePath, firstPath } from "../core/filePath.js";
import type { StorageTransfer } from "../storage/types.js";
import { inferFilesystem } from "../storage/types.js";
import { parseTemplate, type Template } from "./template.js";

const MODULE_NAME_RE = /^[A-Za-z0-9_.-]+$/;
export const TEMPLATE_SUFFIX = ".template.json";

export interface FetchedTemplate {
  template: Template;
  templateHash: ContentHash;
  source: string;
}

export interface TemplateStoreOptions {
  /** Local directory or s3:// prefix holding `<module>.template.json` files. */
  templateRoot: string;
  transfer: StorageTransfer;
  /** Where object-store templates are downloaded before parsing. */
  cacheDir: string;
}

export function assertModuleName(moduleName: string): void {
  if (!MODULE_NAME_RE.test(moduleName) || moduleName === "." || moduleName === "..") {
    throw new ConfigurationError(`invalid module name: ${JSON.stringify(moduleName)}`);
  }
}

export class TemplateStore {
  constructor(private readonly opts: TemplateStoreOptions) {}

  templatePath(moduleName: string): string {
    assertModuleName(moduleName);
    const file = `${moduleName}${TEMPLATE_SUFFIX}`;
    return inferFilesystem(this.opts.templateRoot) === "object_store"
      ? joinPath(this.opts.templateRoot, file)
      : path.join(this.opts.templateRoot, file);
  }

  async fetchTemplate(moduleName: string, signal?: AbortSignal): Promise<FetchedTemplate> {
    const source = this.templatePath(moduleName);
    const localPath =
      inferFilesystem(source) === "object_store"
        ? firstPath(await this.opts.transfer.downloadFiles(singlePath(source), this.opts.cacheDir, { signal }))
        : source;

    let raw: string;
    try {
      raw = await fs.readFile(localPath, "utf8");
    } catch (e) {
      throw new ConfigurationError(`template not found for module ${moduleName}: ${source}`, { cause: e });
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw) as unknown;
    } catch (e) {
      throw new ConfigurationError(`template is not valid JSON: ${source}`, { cause: e });
    }

    return {
      template: parseTemplate(doc, source),
      templateHash: contentHash(raw),
      source
    };
  }
}
