import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";

const zLsfConfig = z.object({
  queue: z.string().min(1),
  memory_mb: z.number().int().min(1),
  slots: z.string().regex(/^\d+(,\d+)?$/, "slots must look like 12 or 12,16"),
  hosts: z.number().int().min(1).default(1),
  fs_resource: z.string().min(1).nullable().default(null),
  counter_slots_per_job: z.number().int().min(1).default(4),
  pre_exec: z.string().min(1).nullable().default(null)
});

const zAlignmentConfig = z.object({
  samtools_executable: z.string().min(1).default("samtools1"),
  bwa_executable: z.string().min(1).default("bwa0_6"),
  alignment_filter_jar: z.string().min(1),
  split_bam_by_chromosomes_jar: z.string().min(1),
  // When unset, templates are located relative to the vtfp.pl found on PATH at task run time.
  vtlib_dir: z.string().min(1).nullable().default(null),
  task_exec_command: z.string().min(1).default("lanealign-task-exec")
});

export const zPipelineConfig = z.object({
  version: z.literal(1),
  runtime: z.object({ instance_id: z.string() }).optional(),
  tool_allowlist: z.array(z.string()),
  repository: z.string().min(1),
  lsf: zLsfConfig,
  alignment: zAlignmentConfig
});

export type PipelineConfig = z.output<typeof zPipelineConfig>;
export type PipelineConfigInput = z.input<typeof zPipelineConfig>;
export type LsfConfig = PipelineConfig["lsf"];
export type AlignmentToolsConfig = PipelineConfig["alignment"];

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const m1 = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed);
  if (m1) {
    const varName = m1[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  const m2 = /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m2) {
    const varName = m2[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  return value;
}

function expandConfigEnv(raw: unknown): unknown {
  if (typeof raw === "string") return expandEnvToken(raw);
  if (Array.isArray(raw)) return raw.map((v) => expandConfigEnv(v));
  if (raw && typeof raw === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(raw)) out[k] = expandConfigEnv(v);
    return out;
  }
  return raw;
}

export class PipelineSettings {
  readonly configHash: `sha256:${string}`;
  private readonly config: PipelineConfig;

  constructor(config: PipelineConfigInput) {
    const parsed = zPipelineConfig.safeParse(config);
    if (!parsed.success) {
      throw new Error(`invalid pipeline config: ${z.prettifyError(parsed.error)}`);
    }
    this.config = parsed.data;
    this.configHash = sha256Prefixed(stableJsonStringify(this.config));
  }

  static async loadFromFile(filePath: string): Promise<PipelineSettings> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = YAML.parse(raw) as unknown;
    const expanded = zPipelineConfig.safeParse(expandConfigEnv(parsed));
    if (!expanded.success) {
      throw new Error(`invalid pipeline config at ${filePath}: ${z.prettifyError(expanded.error)}`);
    }
    return new PipelineSettings(expanded.data);
  }

  snapshot(): PipelineConfig {
    return structuredClone(this.config);
  }

  runtimeInstanceId(): string | null {
    const raw = this.config.runtime?.instance_id;
    if (typeof raw !== "string") return null;
    const trimmed = raw.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  repositoryRoot(): string {
    return this.config.repository;
  }

  lsf(): LsfConfig {
    return this.config.lsf;
  }

  alignmentTools(): AlignmentToolsConfig {
    return this.config.alignment;
  }

  assertToolAllowed(toolName: string): void {
    if (!this.config.tool_allowlist.includes(toolName)) {
      throw new McpError(ErrorCode.InvalidRequest, `config denied tool: ${toolName}`);
    }
  }
}
