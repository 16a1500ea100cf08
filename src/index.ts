import type * as pg from "pg";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { PipelineSettings } from "./config/settings.js";
import { createDb, createMemoryPool, createPgPool } from "./db/connection.js";
import { applySqlFile } from "./db/bootstrap.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { PostgresStore } from "./store/postgresStore.js";

function createPool(): pg.Pool {
  const url = process.env.DATABASE_URL;
  return url ? createPgPool(url) : createMemoryPool();
}

async function main(): Promise<void> {
  const configPath = process.env.PIPELINE_CONFIG_PATH ?? "config/default.pipeline.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const settings = await PipelineSettings.loadFromFile(configPath);
  if (process.env.DATABASE_URL) {
    const instanceId = settings.runtimeInstanceId();
    if (!instanceId) {
      throw new Error(`config runtime.instance_id is required when DATABASE_URL is set (to avoid pass_id collisions)`);
    }
  }
  const pool = createPool();
  if (!process.env.DATABASE_URL || autoSchema) {
    await applySqlFile(pool, "db/schema.sql");
  }

  const store = new PostgresStore(createDb(pool));
  const server = createGatewayServer({ settings, store });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`lanealign gateway ready (config ${settings.configHash})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
