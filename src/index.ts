import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { createRuntime, loadSettings } from "./runtime.js";

async function main(): Promise<void> {
  const settings = await loadSettings();
  const runtime = createRuntime(settings);

  const server = createGatewayServer({ runtime, runsDir: settings.runsDir() });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`module runner gateway ready (templates: ${settings.templateRoot()})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
