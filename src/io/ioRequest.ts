import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";

// File lists may be a comma-separated string or an array of paths.
const zPathList = z.union([z.string(), z.array(z.string())]);

export const zIoRequest = z.object({
  program_name: z.string().optional(),
  program_subname: z.string().optional(),
  input: zPathList,
  output: zPathList.optional(),
  inputdir: z.string().optional(),
  outputdir: z.string().optional(),
  alternate_inputs: zPathList.optional(),
  alternate_outputs: zPathList.optional(),
  pargs: z.string().optional(),
  options: z.string().optional(),
  // true, "true" or "" (the presence marker) request a dry run.
  dryrun: z.union([z.boolean(), z.string()]).optional(),
  sampleid: z.string().optional(),
  sample_id: z.string().optional()
});

export type IoRequest = z.infer<typeof zIoRequest>;

export function parseIoRequest(value: unknown, source = "io request"): IoRequest {
  const parsed = zIoRequest.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`invalid ${source}: ${issues}`);
  }
  return parsed.data;
}

export function isDryRunRequested(value: IoRequest["dryrun"]): boolean {
  if (value === undefined) return false;
  if (typeof value === "boolean") return value;
  const text = value.trim().toLowerCase();
  return text === "" || text === "true";
}
