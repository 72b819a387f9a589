import { ConfigurationError } from "../core/errors.js";
import { fileFolder, fileOnly, joinPath } from "../core/filePath.js";
import { splitNameList, type TemplateDefaults } from "../templates/template.js";
import { isInputPattern } from "./inputPatterns.js";
import { isDryRunRequested, type IoRequest } from "./ioRequest.js";

export interface IODescriptor {
  readonly sampleId: string;
  readonly primaryInputs: readonly string[];
  readonly primaryOutputs: readonly string[];
  readonly alternateInputs: readonly string[];
  readonly alternateOutputs: readonly string[];
  /** Replaces the template's base arguments when non-empty. */
  readonly baseArgumentsOverride: string;
  readonly options: string;
  readonly dryRun: boolean;
}

export interface BuildIoDescriptorOptions {
  defaults?: TemplateDefaults;
}

/** File name of the first path, up to its first ".". */
export function inferSampleId(paths: readonly string[]): string {
  const [first] = paths;
  if (first === undefined) return "";
  return fileOnly(first).split(".")[0] ?? "";
}

const SAMPLE_ID_TOKEN = "{sample_id}";

function resolveRequired(names: string[], dir: string | undefined, what: "input" | "output"): string[] {
  return names.map((name) => {
    if (name.includes("/")) return name;
    if (dir === undefined || dir === "") {
      throw new ConfigurationError(`${what}dir needs to be specified for ${what} ${name}`);
    }
    return joinPath(dir, name);
  });
}

function resolveOptional(names: string[], dir: string | undefined): string[] {
  return names.map((name) => (name.includes("/") || !dir ? name : joinPath(dir, name)));
}

/**
 * Normalizes a run request into the descriptor the slot matcher consumes.
 * Template defaults supply alternates the request leaves out and name outputs given only as folders.
 */
export function buildIoDescriptor(request: IoRequest, opts: BuildIoDescriptorOptions = {}): IODescriptor {
  const defaults = opts.defaults;

  const inputs = resolveRequired(splitNameList(request.input), request.inputdir, "input");
  if (inputs.length === 0) throw new ConfigurationError("io request has no input");

  const explicitSampleId = request.sampleid ?? request.sample_id;
  const pattern = inputs.find(isInputPattern);
  if (explicitSampleId === undefined && pattern !== undefined) {
    throw new ConfigurationError(`sampleid needs to be specified for input pattern ${pattern}`);
  }
  const sampleId = explicitSampleId ?? inferSampleId(inputs);

  let outputNames = splitNameList(request.output);
  if (outputNames.length === 0) {
    if (!request.outputdir) throw new ConfigurationError("io request has no output and no outputdir");
    outputNames = [fileFolder(request.outputdir)];
  }
  const outputs = resolveRequired(outputNames, request.outputdir, "output").map((out) => {
    if (fileOnly(out).includes(".")) return out;
    const folder = fileFolder(out);
    const named = defaults?.outputFile;
    return named ? joinPath(folder, named.split(SAMPLE_ID_TOKEN).join(sampleId)) : folder;
  });

  const altInputs =
    request.alternate_inputs !== undefined ? splitNameList(request.alternate_inputs) : [...(defaults?.alternateInputs ?? [])];
  const altOutputs =
    request.alternate_outputs !== undefined
      ? splitNameList(request.alternate_outputs)
      : [...(defaults?.alternateOutputs ?? [])];

  return Object.freeze({
    sampleId,
    primaryInputs: Object.freeze(inputs),
    primaryOutputs: Object.freeze(outputs),
    alternateInputs: Object.freeze(resolveOptional(altInputs, request.inputdir)),
    alternateOutputs: Object.freeze(resolveOptional(altOutputs, request.outputdir)),
    baseArgumentsOverride: request.pargs?.trim() ?? "",
    options: request.options ?? "",
    dryRun: isDryRunRequested(request.dryrun)
  });
}
