import type { JsonObject } from "../core/json.js";

export function envSnapshot(): JsonObject {
  return {
    node: process.version,
    mode: process.env.DATABASE_URL ? "postgres" : "pg-mem",
    config_path: process.env.PIPELINE_CONFIG_PATH ?? "config/default.pipeline.yaml",
    lsf_envdir: process.env.LSF_ENVDIR ?? null
  };
}
