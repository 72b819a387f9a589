import { flattenArgs, group, leaf, type ArgNode } from "../core/argTree.js";
import { fileOnly, firstPath, joinPath, mapPaths, singlePath, type FilePathValue } from "../core/filePath.js";
import { insertArgument, type Position } from "../core/position.js";
import { DEFAULT_DRY_RUN_MARKER } from "../config/settings.js";
import type { StorageTransfer } from "../storage/types.js";
import type { SlotCategory } from "../templates/template.js";
import type { ModuleInstance, SlotBinding, StagedBinding } from "./moduleInstance.js";

/**
 * Slots are staged and inserted in this order, then the subprogram name and program name go to index 0.
 * Each insertion shifts the indices later insertions see, so the order is part of the command's meaning.
 */
export const SLOT_PROCESSING_ORDER = [
  "primary_input",
  "primary_output",
  "alternate_input",
  "alternate_output"
] as const satisfies readonly SlotCategory[];

const FRONT: Position = { kind: "absolute", index: 0 };

export interface StagingContext {
  transfer: StorageTransfer;
  /** Local directory inputs are downloaded into. */
  inputDir: string;
  /** Local directory the program writes its outputs to. */
  outputDir: string;
  mock?: boolean;
  signal?: AbortSignal;
  onStaged?: (binding: StagedBinding) => void;
}

export interface AssembledCommand {
  tokens: string[];
  /** Tokens joined by single spaces. */
  text: string;
}

export function tokenizeArguments(args: string): string[] {
  const trimmed = args.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

export function orderedBindings(instance: ModuleInstance): SlotBinding[] {
  const out: SlotBinding[] = [];
  for (const category of SLOT_PROCESSING_ORDER) {
    switch (category) {
      case "primary_input":
        if (instance.primaryInput) out.push(instance.primaryInput);
        break;
      case "primary_output":
        if (instance.primaryOutput) out.push(instance.primaryOutput);
        break;
      case "alternate_input":
        out.push(...instance.alternateInputs);
        break;
      case "alternate_output":
        out.push(...instance.alternateOutputs);
        break;
    }
  }
  return out;
}

function isInputCategory(category: SlotCategory): boolean {
  return category === "primary_input" || category === "alternate_input";
}

/**
 * Brings every input into `inputDir`, one binding at a time, and maps outputs to paths under `outputDir`.
 * Outputs are not transferred here; the output stager uploads the whole folder after the run.
 */
export async function stageModuleInstance(instance: ModuleInstance, ctx: StagingContext): Promise<StagedBinding[]> {
  const opts = { mock: ctx.mock ?? false, signal: ctx.signal };
  const staged: StagedBinding[] = [];

  for (const binding of orderedBindings(instance)) {
    let local: FilePathValue;
    if (!isInputCategory(binding.category)) {
      local = mapPaths(binding.remote, (p) => joinPath(ctx.outputDir, fileOnly(p)));
    } else if (binding.slot.kind === "folder") {
      local = singlePath(await ctx.transfer.downloadFolder(firstPath(binding.remote), ctx.inputDir, opts));
    } else {
      local = await ctx.transfer.downloadFiles(binding.remote, ctx.inputDir, opts);
    }
    const s: StagedBinding = { ...binding, local };
    staged.push(s);
    ctx.onStaged?.(s);
  }
  return staged;
}

export function slotToken(prefix: string, value: FilePathValue): ArgNode {
  const valueNode = value.kind === "single" ? leaf(value.path) : group(value.paths.map(leaf));
  return prefix === "" ? group([valueNode]) : group([leaf(prefix), valueNode]);
}

function categoryRank(category: SlotCategory): number {
  return SLOT_PROCESSING_ORDER.indexOf(category);
}

/** Pure: the argument list for already staged bindings. */
export function buildCommand(
  instance: ModuleInstance,
  staged: readonly StagedBinding[],
  opts: { dryRunMarker?: string } = {}
): string[] {
  const nodes: ArgNode[] = tokenizeArguments(instance.baseArguments).map(leaf);

  // Stable sort keeps template order within a category.
  const ordered = [...staged].sort((a, b) => categoryRank(a.category) - categoryRank(b.category));
  for (const b of ordered) {
    insertArgument(nodes, slotToken(b.slot.prefix, b.local), b.slot.position);
  }
  insertArgument(nodes, leaf(instance.programSubname), FRONT);
  insertArgument(nodes, leaf(instance.programName), FRONT);

  const tokens = flattenArgs(nodes);
  if (instance.dryRun) tokens.push(opts.dryRunMarker ?? DEFAULT_DRY_RUN_MARKER);
  return tokens;
}

export function toAssembledCommand(tokens: string[]): AssembledCommand {
  return { tokens, text: tokens.join(" ") };
}

export async function assembleModuleCommand(
  instance: ModuleInstance,
  ctx: StagingContext & { dryRunMarker?: string }
): Promise<AssembledCommand & { staged: StagedBinding[] }> {
  const staged = await stageModuleInstance(instance, ctx);
  const tokens = buildCommand(instance, staged, { dryRunMarker: ctx.dryRunMarker });
  return { ...toAssembledCommand(tokens), staged };
}
