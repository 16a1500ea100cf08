import type { PassId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type PassStatus = "running" | "planned" | "submitted" | "empty" | "failed" | "blocked";

export interface PassRecord {
  passId: PassId;
  toolName: string;
  contractVersion: string;
  idRun: number;
  paramsHash: `sha256:${string}`;
  configHash: `sha256:${string}`;
  canonicalParams: JsonObject;
  status: PassStatus;
  jobNameRoot: string | null;
  jobId: string | null;
  manifestPath: string | null;
  requestedBy: string | null;
  environment: JsonObject | null;
  error: string | null;
  resultJson: JsonObject | null;
  logText: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export interface PassTaskRecord {
  jobIndex: number;
  position: number;
  tagIndex: number | null;
  label: string;
  template: string;
  commandSha256: `sha256:${string}`;
  decision: JsonObject;
}

export interface PassEventRecord {
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}
