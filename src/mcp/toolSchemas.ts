import * as z from "zod/v4";

export const zModuleName = z.string().regex(/^[A-Za-z0-9_.-]+$/, "invalid module_name");

export const zTemplateGetInput = z.object({
  module_name: zModuleName
});

export const zTemplateGetOutput = z.object({
  module_name: z.string(),
  template_hash: z.string(),
  program_name: z.string(),
  program_subname: z.string(),
  program_version: z.string(),
  module_version: z.string(),
  program_arguments: z.string(),
  input_file_types: z.array(z.string()),
  output_file_types: z.array(z.string()),
  alternate_input_file_types: z.array(z.string()),
  alternate_output_file_types: z.array(z.string())
});

export const zModuleAssembleInput = z.object({
  module_name: zModuleName,
  run_arguments: z.record(z.string(), z.unknown())
});

export const zModuleAssembleOutput = z.object({
  command: z.string(),
  tokens: z.array(z.string()),
  dry_run: z.boolean(),
  unresolved: z.array(z.string())
});

export const zModuleRunInput = z.object({
  module_name: zModuleName,
  run_arguments_path: z.string().min(1),
  mock: z.boolean().optional()
});

export const zModuleRunOutput = z.object({
  job_id: z.string(),
  state: z.string(),
  dry_run: z.boolean(),
  command: z.string(),
  uploaded: z.boolean(),
  remote_output: z.string(),
  run_log: z.string(),
  unresolved: z.array(z.string())
});
