import { parseTemplate, type Template } from "../../src/templates/template.js";

type SlotDoc = { kind: "file" | "folder"; fileType: string; position: number; prefix: string };

const inSlot = (s: SlotDoc) => ({
  input_type: s.kind,
  input_file_type: s.fileType,
  input_position: s.position,
  input_prefix: s.prefix
});
const outSlot = (s: SlotDoc) => ({
  output_type: s.kind,
  output_file_type: s.fileType,
  output_position: s.position,
  output_prefix: s.prefix
});

export function makeTemplate(spec: {
  name?: string;
  subname?: string;
  args?: string;
  inputs?: SlotDoc[];
  outputs?: SlotDoc[];
  altInputs?: SlotDoc[];
  altOutputs?: SlotDoc[];
  options?: string;
}): Template {
  return parseTemplate(
    {
      program_name: spec.name ?? "bwa",
      program_subname: spec.subname ?? "mem",
      program_version: "0.7.17",
      module_version: "1.0.0",
      program_arguments: spec.args ?? "-S -t 4",
      program_input: (spec.inputs ?? []).map(inSlot),
      program_output: (spec.outputs ?? []).map(outSlot),
      alternate_inputs: (spec.altInputs ?? []).map(inSlot),
      alternate_outputs: (spec.altOutputs ?? []).map(outSlot),
      ...(spec.options !== undefined ? { options: spec.options } : {})
    },
    "test"
  );
}

/** FASTQ in at -1, SAM out at 0 with -o, FASTA alternate at -2, BED alternate at 0 with -L. */
export function alignTemplate(): Template {
  return makeTemplate({
    inputs: [{ kind: "file", fileType: "FASTQ", position: -1, prefix: "" }],
    outputs: [{ kind: "file", fileType: "SAM", position: 0, prefix: "-o" }],
    altInputs: [
      { kind: "file", fileType: "FASTA", position: -2, prefix: "" },
      { kind: "file", fileType: "BED", position: 0, prefix: "-L" }
    ]
  });
}
