import type { PassEventSink } from "../core/diagnostics.js";
import type { PassId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { PassStatus, PassTaskRecord } from "../core/pass.js";
import type { PostgresStore } from "../store/postgresStore.js";

export type PassOutcome = Extract<PassStatus, "planned" | "submitted" | "empty">;

export interface PassHandles {
  jobNameRoot?: string | null;
  jobId?: string | null;
  manifestPath?: string | null;
}

/**
 * One recorded invocation of a generation tool. Every event goes to the
 * store as it happens and into the log text written when the pass finishes.
 */
export class GenerationRun implements PassEventSink {
  readonly passId: PassId;
  private readonly logLines: string[] = [];

  constructor(
    private readonly deps: { store: PostgresStore },
    private readonly info: {
      passId: PassId;
      toolName: string;
      contractVersion: string;
      idRun: number;
      paramsHash: `sha256:${string}`;
      canonicalParams: JsonObject;
      configHash: `sha256:${string}`;
      requestedBy: string | null;
      environment: JsonObject | null;
    }
  ) {
    this.passId = info.passId;
  }

  async start(): Promise<void> {
    await this.deps.store.createPass({
      passId: this.passId,
      toolName: this.info.toolName,
      contractVersion: this.info.contractVersion,
      idRun: this.info.idRun,
      paramsHash: this.info.paramsHash,
      configHash: this.info.configHash,
      canonicalParams: this.info.canonicalParams,
      status: "running",
      requestedBy: this.info.requestedBy,
      environment: this.info.environment
    });

    const now = new Date().toISOString();
    await this.deps.store.updatePass(this.passId, { status: "running", startedAt: now, finishedAt: null, error: null });
    await this.event("pass.started", `tool=${this.info.toolName} id_run=${this.info.idRun}`, {
      now,
      params_hash: this.info.paramsHash,
      config_hash: this.info.configHash
    });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    const line = JSON.stringify({ ts: new Date().toISOString(), kind, message, data });
    this.logLines.push(line);
    await this.deps.store.addPassEvent(this.passId, kind, message, data);
  }

  async recordTasks(tasks: PassTaskRecord[]): Promise<void> {
    for (const task of tasks) await this.deps.store.addPassTask(this.passId, task);
  }

  async finishSuccess(status: PassOutcome, result: JsonObject, summary: string, handles: PassHandles = {}): Promise<JsonObject> {
    return this.finish(status, null, summary, result, handles);
  }

  async finishBlocked(reason: string): Promise<void> {
    await this.finish("blocked", reason, `blocked: ${reason}`, null, {});
  }

  async finishFailure(errorMessage: string): Promise<void> {
    await this.finish("failed", errorMessage, `failed: ${errorMessage}`, null, {});
  }

  logText(): string {
    return this.logLines.join("\n") + "\n";
  }

  private async finish(
    status: PassStatus,
    error: string | null,
    finalMessage: string,
    result: JsonObject | null,
    handles: PassHandles
  ): Promise<JsonObject> {
    await this.event(`pass.${status}`, finalMessage, error ? { error } : null);

    const resultWithProvenance: JsonObject = {
      ...(result ?? {}),
      pass_id: this.passId,
      status
    };

    await this.deps.store.updatePass(this.passId, {
      ...handles,
      status,
      finishedAt: new Date().toISOString(),
      error,
      logText: this.logText(),
      resultJson: result ? resultWithProvenance : null
    });

    return resultWithProvenance;
  }
}

export function requestedByFromExtra(extra: {
  authInfo?: { clientId: string; extra?: Record<string, unknown> } | undefined;
  sessionId?: string | undefined;
}): string | null {
  const subject = extra.authInfo?.extra?.["subject"];
  const maybeSubject = typeof subject === "string" ? subject : null;
  return maybeSubject ?? extra.authInfo?.clientId ?? extra.sessionId ?? null;
}
