import type { JsonObject } from "./json.js";

export type DiagnosticLevel = "debug" | "info" | "warn" | "error";

export interface Diagnostic {
  level: DiagnosticLevel;
  message: string;
  data?: JsonObject;
}

export interface PassEventSink {
  event(kind: string, message: string, data: JsonObject | null): Promise<void>;
}

export async function emitDiagnostics(sink: PassEventSink, label: string, diagnostics: Diagnostic[]): Promise<void> {
  for (const d of diagnostics) {
    await sink.event(`diagnostic.${d.level}`, `${label} - ${d.message}`, { label, ...(d.data ?? {}) });
  }
}

export class CollectingEventSink implements PassEventSink {
  readonly events: Array<{ kind: string; message: string; data: JsonObject | null }> = [];

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    this.events.push({ kind, message, data });
  }

  kinds(): string[] {
    return this.events.map((e) => e.kind);
  }
}
