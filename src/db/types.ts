import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface GenerationPassesTable {
  pass_id: string;
  tool_name: string;
  contract_version: string;
  id_run: number;
  params_hash: string;
  config_hash: string;
  canonical_params: Json;
  status: string;
  job_name_root: OptionalNullable<string>;
  job_id: OptionalNullable<string>;
  manifest_path: OptionalNullable<string>;
  requested_by: OptionalNullable<string>;
  environment: JsonNullable;
  error: OptionalNullable<string>;
  result_json: JsonNullable;
  log_text: OptionalNullable<string>;
  created_at: Generated<string>;
  started_at: OptionalNullable<string>;
  finished_at: OptionalNullable<string>;
}

export interface PassEventsTable {
  event_id: Generated<string>;
  pass_id: string;
  ts: Generated<string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface PassTasksTable {
  pass_id: string;
  job_index: number;
  position: number;
  tag_index: OptionalNullable<number>;
  label: string;
  template: string;
  command_sha256: string;
  decision: Json;
}

export interface DB {
  generation_passes: GenerationPassesTable;
  pass_events: PassEventsTable;
  pass_tasks: PassTasksTable;
}
