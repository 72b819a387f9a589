import { ResolutionError } from "../core/errors.js";
import { fileFolder, filePathValueOf, firstPath, singlePath, type FilePathValue } from "../core/filePath.js";
import { DEFAULT_COMPOUND_FILE_TYPES, fileTypesMatch, inferFileType } from "../core/fileType.js";
import type { IODescriptor } from "../io/ioDescriptor.js";
import { slotsFor, type Slot, type SlotCategory, type Template } from "../templates/template.js";
import type { ModuleInstance, SlotBinding } from "./moduleInstance.js";

export interface CreateModuleInstanceOptions {
  moduleName: string;
  compoundFileTypes?: readonly string[];
  onUnresolved?: (error: ResolutionError) => void;
}

/** First slot, in template order, whose file type matches the value's inferred type. */
export function matchSlot(
  value: string | FilePathValue,
  slots: readonly Slot[],
  compoundFileTypes: readonly string[] = DEFAULT_COMPOUND_FILE_TYPES
): Slot | null {
  const fileType = inferFileType(value, compoundFileTypes);
  return slots.find((s) => fileTypesMatch(s.fileType, fileType)) ?? null;
}

function bind(slot: Slot, category: SlotCategory, remote: FilePathValue): SlotBinding {
  return { slot, category, remote, remoteDirectory: fileFolder(firstPath(remote)) };
}

export function createModuleInstance(
  template: Template,
  io: IODescriptor,
  opts: CreateModuleInstanceOptions
): ModuleInstance {
  const compound = opts.compoundFileTypes ?? DEFAULT_COMPOUND_FILE_TYPES;
  const unresolved: ResolutionError[] = [];

  const miss = (category: SlotCategory, remote: string): void => {
    const fileType = inferFileType(remote, compound);
    const err = new ResolutionError(
      `no ${category} slot of ${opts.moduleName} accepts file type ${JSON.stringify(fileType)}: ${remote}`,
      category,
      remote,
      fileType
    );
    unresolved.push(err);
    opts.onUnresolved?.(err);
  };

  const primary = (category: "primary_input" | "primary_output", paths: readonly string[]): SlotBinding | null => {
    const value = filePathValueOf(paths);
    if (!value) return null;
    const slot = matchSlot(value, slotsFor(template, category), compound);
    if (!slot) {
      miss(category, firstPath(value));
      return null;
    }
    return bind(slot, category, value);
  };

  const alternates = (
    category: "alternate_input" | "alternate_output",
    paths: readonly string[]
  ): SlotBinding[] => {
    const slots = slotsFor(template, category);
    const bound: SlotBinding[] = [];
    for (const slot of slots) {
      for (const p of paths) {
        if (fileTypesMatch(slot.fileType, inferFileType(p, compound))) bound.push(bind(slot, category, singlePath(p)));
      }
    }
    for (const p of paths) {
      if (!matchSlot(p, slots, compound)) miss(category, p);
    }
    return bound;
  };

  const primaryInput = primary("primary_input", io.primaryInputs);
  const primaryOutput = primary("primary_output", io.primaryOutputs);
  const alternateInputs = alternates("alternate_input", io.alternateInputs);
  const alternateOutputs = alternates("alternate_output", io.alternateOutputs);

  return Object.freeze({
    moduleName: opts.moduleName,
    programName: template.programName,
    programSubname: template.programSubname,
    programVersion: template.programVersion,
    moduleVersion: template.moduleVersion,
    primaryInput,
    primaryOutput,
    alternateInputs: Object.freeze(alternateInputs),
    alternateOutputs: Object.freeze(alternateOutputs),
    baseArguments: io.baseArgumentsOverride !== "" ? io.baseArgumentsOverride : template.baseArguments,
    options: io.options !== "" ? io.options : template.options,
    sampleId: io.sampleId,
    dryRun: io.dryRun,
    unresolved: Object.freeze(unresolved)
  });
}
