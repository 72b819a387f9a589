import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import path from "path";
import { ConfigurationError } from "../core/errors.js";
import { buildIoDescriptor } from "../io/ioDescriptor.js";
import { parseIoRequest } from "../io/ioRequest.js";
import { expandInputPatterns } from "../io/inputPatterns.js";
import type { JobEventSink } from "../jobs/jobRun.js";
import { runModuleJob } from "../jobs/moduleRunner.js";
import { assembleModuleCommand } from "../module/argumentAssembler.js";
import { createModuleInstance } from "../module/slotMatcher.js";
import type { Runtime } from "../runtime.js";
import { slotFileTypes } from "../templates/template.js";
import {
  zModuleAssembleInput,
  zModuleAssembleOutput,
  zModuleRunInput,
  zModuleRunOutput,
  zTemplateGetInput,
  zTemplateGetOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  runtime: Runtime;
  /** Working directory for jobs started through module_run. */
  runsDir: string;
  sink?: JobEventSink;
}

function toMcpError(e: unknown): unknown {
  if (e instanceof ConfigurationError) return new McpError(ErrorCode.InvalidParams, e.message);
  return e;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "ngs-module-runner-gateway",
    version: "0.1.0"
  });
  const { runtime } = deps;

  mcp.registerTool(
    "template_get",
    {
      description: "Fetch a module template and list the file types its slots accept.",
      inputSchema: zTemplateGetInput,
      outputSchema: zTemplateGetOutput
    },
    async (args) => {
      try {
        const { template, templateHash } = await runtime.templates.fetchTemplate(args.module_name);
        const structured = {
          module_name: args.module_name,
          template_hash: templateHash,
          program_name: template.programName,
          program_subname: template.programSubname,
          program_version: template.programVersion,
          module_version: template.moduleVersion,
          program_arguments: template.baseArguments,
          input_file_types: slotFileTypes(template, "primary_input"),
          output_file_types: slotFileTypes(template, "primary_output"),
          alternate_input_file_types: slotFileTypes(template, "alternate_input"),
          alternate_output_file_types: slotFileTypes(template, "alternate_output")
        };
        return {
          content: [{ type: "text", text: `${args.module_name}: ${template.programName} ${template.programVersion}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "module_assemble",
    {
      description: "Assemble the command line for an inline IO request without staging files or running anything.",
      inputSchema: zModuleAssembleInput,
      outputSchema: zModuleAssembleOutput
    },
    async (args) => {
      try {
        const request = parseIoRequest(args.run_arguments, "run_arguments");
        const { template } = await runtime.templates.fetchTemplate(args.module_name);
        const descriptor = await expandInputPatterns(
          buildIoDescriptor(request, { defaults: template.defaults }),
          runtime.transfer
        );
        const unresolved: string[] = [];
        const instance = createModuleInstance(template, descriptor, {
          moduleName: args.module_name,
          compoundFileTypes: runtime.settings.compoundFileTypes(),
          onUnresolved: (err) => unresolved.push(err.remotePath)
        });
        const previewRoot = path.resolve(deps.runsDir, "preview");
        const assembled = await assembleModuleCommand(instance, {
          transfer: runtime.transfer,
          inputDir: `${path.join(previewRoot, "in")}/`,
          outputDir: `${path.join(previewRoot, "out")}/`,
          mock: true,
          dryRunMarker: runtime.settings.dryRunMarker()
        });
        return {
          content: [{ type: "text", text: assembled.text }],
          structuredContent: {
            command: assembled.text,
            tokens: assembled.tokens,
            dry_run: instance.dryRun,
            unresolved
          }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "module_run",
    {
      description: "Run a module job from a stored IO request (<module>.<job_id>.io.json).",
      inputSchema: zModuleRunInput,
      outputSchema: zModuleRunOutput
    },
    async (args) => {
      try {
        const result = await runModuleJob(
          {
            moduleName: args.module_name,
            runArguments: args.run_arguments_path,
            workingDir: deps.runsDir,
            ...(args.mock !== undefined ? { mock: args.mock } : {})
          },
          { ...runtime, ...(deps.sink ? { sink: deps.sink } : {}) }
        );
        return {
          content: [{ type: "text", text: `${result.jobId} ${result.state}: ${result.command.text}` }],
          structuredContent: {
            job_id: result.jobId,
            state: result.state,
            dry_run: result.dryRun,
            command: result.command.text,
            uploaded: result.uploaded,
            remote_output: result.remoteOutput,
            run_log: result.runLogPath,
            unresolved: result.unresolved
          }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
