import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";
import { canonicalFileType } from "../core/fileType.js";
import { parsePosition, type Position } from "../core/position.js";

export type SlotKind = "file" | "folder";

export type SlotCategory = "primary_input" | "primary_output" | "alternate_input" | "alternate_output";

export interface Slot {
  fileType: string;
  kind: SlotKind;
  position: Position;
  prefix: string;
}

export interface TemplateDefaults {
  outputFile: string | null;
  alternateInputs: readonly string[];
  alternateOutputs: readonly string[];
}

export interface Template {
  programName: string;
  programSubname: string;
  programVersion: string;
  moduleVersion: string;
  baseArguments: string;
  options: string;
  inputSlots: readonly Slot[];
  outputSlots: readonly Slot[];
  alternateInputSlots: readonly Slot[];
  alternateOutputSlots: readonly Slot[];
  defaults: TemplateDefaults;
}

const zSlotKind = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(["file", "folder"]));

const zInputSlot = z.object({
  input_type: zSlotKind,
  input_file_type: z.string().default(""),
  input_position: z.number(),
  input_prefix: z.string().default("")
});

const zOutputSlot = z.object({
  output_type: zSlotKind,
  output_file_type: z.string().default(""),
  output_position: z.number(),
  output_prefix: z.string().default("")
});

// Defaults list entries may be given as a comma-separated string or an array.
const zNameList = z.union([z.string(), z.array(z.string())]);

export const zTemplateDocument = z.object({
  program_name: z.string().min(1),
  program_subname: z.string().default(""),
  program_version: z.string(),
  module_version: z.string(),
  program_arguments: z.string().default(""),
  program_input: z.array(zInputSlot),
  program_output: z.array(zOutputSlot),
  alternate_inputs: z.array(zInputSlot),
  alternate_outputs: z.array(zOutputSlot),
  options: z.string().optional(),
  defaults: z
    .object({
      output_file: z.string().optional(),
      alternate_inputs: zNameList.optional(),
      alternate_outputs: zNameList.optional()
    })
    .optional()
});

export type TemplateDocument = z.infer<typeof zTemplateDocument>;

export function splitNameList(value: string | readonly string[] | undefined): string[] {
  if (value === undefined) return [];
  const parts = typeof value === "string" ? value.split(",") : value;
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

function slotFrom(fileType: string, kind: SlotKind, position: number, prefix: string, where: string): Slot {
  try {
    return Object.freeze({ fileType: canonicalFileType(fileType), kind, position: parsePosition(position), prefix });
  } catch (e) {
    if (e instanceof ConfigurationError) throw new ConfigurationError(`${where}: ${e.message}`);
    throw e;
  }
}

/** Validates a raw template document. Any schema problem is a ConfigurationError. */
export function parseTemplate(doc: unknown, source = "template"): Template {
  const parsed = zTemplateDocument.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`invalid template ${source}: ${issues}`);
  }
  const t = parsed.data;

  const inputs = (list: TemplateDocument["program_input"], key: string): readonly Slot[] =>
    Object.freeze(
      list.map((s, i) => slotFrom(s.input_file_type, s.input_type, s.input_position, s.input_prefix, `${source} ${key}[${i}]`))
    );
  const outputs = (list: TemplateDocument["program_output"], key: string): readonly Slot[] =>
    Object.freeze(
      list.map((s, i) =>
        slotFrom(s.output_file_type, s.output_type, s.output_position, s.output_prefix, `${source} ${key}[${i}]`)
      )
    );

  return Object.freeze({
    programName: t.program_name,
    programSubname: t.program_subname,
    programVersion: t.program_version,
    moduleVersion: t.module_version,
    baseArguments: t.program_arguments,
    options: t.options ?? "",
    inputSlots: inputs(t.program_input, "program_input"),
    outputSlots: outputs(t.program_output, "program_output"),
    alternateInputSlots: inputs(t.alternate_inputs, "alternate_inputs"),
    alternateOutputSlots: outputs(t.alternate_outputs, "alternate_outputs"),
    defaults: Object.freeze({
      outputFile: t.defaults?.output_file ?? null,
      alternateInputs: Object.freeze(splitNameList(t.defaults?.alternate_inputs)),
      alternateOutputs: Object.freeze(splitNameList(t.defaults?.alternate_outputs))
    })
  });
}

export function slotsFor(template: Template, category: SlotCategory): readonly Slot[] {
  switch (category) {
    case "primary_input":
      return template.inputSlots;
    case "primary_output":
      return template.outputSlots;
    case "alternate_input":
      return template.alternateInputSlots;
    case "alternate_output":
      return template.alternateOutputSlots;
  }
}

/** Lower-cased file types a template accepts for one slot list, in template order. */
export function slotFileTypes(template: Template, category: SlotCategory): string[] {
  return slotsFor(template, category)
    .map((s) => s.fileType.toLowerCase())
    .filter((t) => t.length > 0);
}
