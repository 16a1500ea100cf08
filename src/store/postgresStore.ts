import type { Kysely, Selectable } from "kysely";
import type { PassId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { PassEventRecord, PassRecord, PassStatus, PassTaskRecord } from "../core/pass.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function jsonObjectOrNull(value: unknown): JsonObject | null {
  if (value === null || value === undefined || typeof value !== "object" || Array.isArray(value)) return null;
  return value as JsonObject;
}

const PASS_STATUSES: ReadonlySet<string> = new Set<PassStatus>(["running", "planned", "submitted", "empty", "failed", "blocked"]);

function isPassStatus(value: string): value is PassStatus {
  return PASS_STATUSES.has(value);
}

function toPassStatus(value: string): PassStatus {
  if (!isPassStatus(value)) throw new Error(`unknown pass status in store: ${value}`);
  return value;
}

export type PassPatch = Partial<
  Pick<
    PassRecord,
    "status" | "startedAt" | "finishedAt" | "error" | "resultJson" | "logText" | "jobNameRoot" | "jobId" | "manifestPath"
  >
>;

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createPass(input: {
    passId: PassId;
    toolName: string;
    contractVersion: string;
    idRun: number;
    paramsHash: `sha256:${string}`;
    configHash: `sha256:${string}`;
    canonicalParams: JsonObject;
    status: PassStatus;
    requestedBy: string | null;
    environment: JsonObject | null;
  }): Promise<PassRecord> {
    await this.db
      .insertInto("generation_passes")
      .values({
        pass_id: input.passId,
        tool_name: input.toolName,
        contract_version: input.contractVersion,
        id_run: input.idRun,
        params_hash: input.paramsHash,
        config_hash: input.configHash,
        canonical_params: input.canonicalParams,
        status: input.status,
        requested_by: input.requestedBy,
        environment: input.environment ?? null
      })
      .onConflict((oc) => oc.column("pass_id").doNothing())
      .execute();

    const row = await this.db
      .selectFrom("generation_passes")
      .selectAll()
      .where("pass_id", "=", input.passId)
      .executeTakeFirstOrThrow();

    return this.mapPass(row);
  }

  async getPass(passId: PassId): Promise<PassRecord | null> {
    const row = await this.db
      .selectFrom("generation_passes")
      .selectAll()
      .where("pass_id", "=", passId)
      .executeTakeFirst();
    return row ? this.mapPass(row) : null;
  }

  async updatePass(passId: PassId, patch: PassPatch): Promise<void> {
    const updates: Record<string, unknown> = {};
    if (patch.status) updates.status = patch.status;
    if (patch.startedAt !== undefined) updates.started_at = patch.startedAt;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;
    if (patch.error !== undefined) updates.error = patch.error;
    if (patch.resultJson !== undefined) updates.result_json = patch.resultJson;
    if (patch.logText !== undefined) updates.log_text = patch.logText;
    if (patch.jobNameRoot !== undefined) updates.job_name_root = patch.jobNameRoot;
    if (patch.jobId !== undefined) updates.job_id = patch.jobId;
    if (patch.manifestPath !== undefined) updates.manifest_path = patch.manifestPath;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("generation_passes").set(updates).where("pass_id", "=", passId).execute();
  }

  async addPassEvent(passId: PassId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("pass_events")
      .values({
        pass_id: passId,
        kind,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listPassEvents(passId: PassId): Promise<PassEventRecord[]> {
    const rows = await this.db
      .selectFrom("pass_events")
      .selectAll()
      .where("pass_id", "=", passId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({
      ts: toIso((r as unknown as { ts: unknown }).ts),
      kind: r.kind,
      message: r.message,
      data: jsonObjectOrNull(r.data)
    }));
  }

  // A replayed pass id keeps the tasks of its first successful plan.
  async addPassTask(passId: PassId, task: PassTaskRecord): Promise<void> {
    await this.db
      .insertInto("pass_tasks")
      .values({
        pass_id: passId,
        job_index: task.jobIndex,
        position: task.position,
        tag_index: task.tagIndex,
        label: task.label,
        template: task.template,
        command_sha256: task.commandSha256,
        decision: task.decision
      })
      .onConflict((oc) => oc.columns(["pass_id", "job_index"]).doNothing())
      .execute();
  }

  async listPassTasks(passId: PassId): Promise<PassTaskRecord[]> {
    const rows = await this.db
      .selectFrom("pass_tasks")
      .selectAll()
      .where("pass_id", "=", passId)
      .orderBy("job_index", "asc")
      .execute();
    return rows.map((r) => ({
      jobIndex: r.job_index,
      position: r.position,
      tagIndex: r.tag_index,
      label: r.label,
      template: r.template,
      commandSha256: r.command_sha256 as `sha256:${string}`,
      decision: jsonObjectOrNull(r.decision) ?? {}
    }));
  }

  private mapPass(row: Selectable<DB["generation_passes"]>): PassRecord {
    return {
      passId: row.pass_id as PassId,
      toolName: row.tool_name,
      contractVersion: row.contract_version,
      idRun: row.id_run,
      paramsHash: row.params_hash as `sha256:${string}`,
      configHash: row.config_hash as `sha256:${string}`,
      canonicalParams: jsonObjectOrNull(row.canonical_params) ?? {},
      status: toPassStatus(row.status),
      jobNameRoot: row.job_name_root,
      jobId: row.job_id,
      manifestPath: row.manifest_path,
      requestedBy: row.requested_by,
      environment: jsonObjectOrNull(row.environment),
      error: row.error,
      resultJson: jsonObjectOrNull(row.result_json),
      logText: row.log_text,
      createdAt: toIso((row as unknown as { created_at: unknown }).created_at),
      startedAt: toIsoOrNull((row as unknown as { started_at: unknown }).started_at),
      finishedAt: toIsoOrNull((row as unknown as { finished_at: unknown }).finished_at)
    };
  }
}
