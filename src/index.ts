#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { consoleOutput } from "./core/sessionOutput.js";
import { createTrackerServer } from "./mcp/trackerServer.js";
import { bootstrapSession } from "./tracker.js";

async function main(): Promise<void> {
  const configPath = process.env.TRACKER_CONFIG_PATH ?? "config/default.tracker.yaml";

  // Startup notices go to stderr; stdout is the protocol channel.
  const { config, runtime, session } = await bootstrapSession(configPath, consoleOutput);

  const server = createTrackerServer({ config, runtime, session });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`rpkg-tracker ready (R ${runtime.rVersion}, project ${config.projectDir})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
