#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createTrackingClient, loadConfigFromFile } from "./config/config.js";
import { createTrackingServer } from "./mcp/trackingServer.js";

async function main(): Promise<void> {
  const configPath = process.env.TRACKING_CONFIG_PATH ?? "config/default.tracking.yaml";

  const config = await loadConfigFromFile(configPath);
  const client = createTrackingClient(config);

  const server = createTrackingServer({ client, config });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`mlflow-tracking-mcp ready (tracking server ${client.baseUrl})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
