import type { ResolutionError } from "../core/errors.js";
import type { FilePathValue } from "../core/filePath.js";
import type { Slot, SlotCategory } from "../templates/template.js";

export interface SlotBinding {
  slot: Slot;
  category: SlotCategory;
  /** Remote path(s) as supplied, in order. */
  remote: FilePathValue;
  remoteDirectory: string;
}

export interface ModuleInstance {
  moduleName: string;
  programName: string;
  programSubname: string;
  programVersion: string;
  moduleVersion: string;
  primaryInput: SlotBinding | null;
  primaryOutput: SlotBinding | null;
  alternateInputs: readonly SlotBinding[];
  alternateOutputs: readonly SlotBinding[];
  baseArguments: string;
  options: string;
  sampleId: string;
  dryRun: boolean;
  /** Supplied files that matched no slot. They are left off the command line. */
  unresolved: readonly ResolutionError[];
}

/** A binding after staging: `local` holds the path(s) that go on the command line. */
export interface StagedBinding extends SlotBinding {
  local: FilePathValue;
}
