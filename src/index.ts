#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { GridConfig } from "./config/config.js";
import { openLedger } from "./db/bootstrap.js";
import { SystemSgeClient, findMissingCommands } from "./execution/sge/client.js";
import { createCommandRunner } from "./execution/sge/command.js";
import { StderrEventSink } from "./logging/jobLog.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { PostgresJobStore } from "./store/jobStore.js";
import { NodeTaskSerializer } from "./tasks/serializer.js";

async function main(): Promise<void> {
  const configPath = process.env.GRIDPOOL_CONFIG ?? "config/default.gridpool.yaml";
  const schemaPath = process.env.GRIDPOOL_SCHEMA ?? "db/schema.sql";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const config = await GridConfig.loadFromFile(configPath);

  const ledger = await openLedger({ databaseUrl: process.env.DATABASE_URL, schemaPath, autoSchema });
  if (ledger.inMemory) {
    console.error("gridpool: DATABASE_URL not set; job ledger is in memory");
  }
  const store = new PostgresJobStore(ledger.db);

  const commands = config.sgeCommands();
  const missing = await findMissingCommands(commands);
  if (missing.length) {
    console.error(`gridpool: scheduler commands not found on PATH: ${missing.join(", ")}`);
  }

  const client = new SystemSgeClient({ commands, runner: createCommandRunner(config.maxCaptureBytes()) });
  const serializer = new NodeTaskSerializer(config.executorOptions());
  const sinks = [new StderrEventSink(config.logLevel())];

  const server = createGatewayServer({ config, store, client, serializer, sinks });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("gridpool gateway ready");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
