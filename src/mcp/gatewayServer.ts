import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { promises as fs } from "fs";
import path from "path";
import type { PipelineSettings } from "../config/settings.js";
import { sha256Prefixed } from "../core/canonicalJson.js";
import { DecisionConflictError } from "../core/errors.js";
import type { PassId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { PassStatus, PassTaskRecord } from "../core/pass.js";
import { SamplesheetMetadataProvider } from "../lims/samplesheet.js";
import { RepositoryReferenceResolver, type ReferenceResolver } from "../references/resolver.js";
import { GenerationRun, requestedByFromExtra } from "../runs/generationRun.js";
import { derivePassId } from "../runs/passIdentity.js";
import { formatArraySpec } from "../scheduler/jobIndex.js";
import { LsfSchedulerClient, type SchedulerClient } from "../scheduler/lsf.js";
import { renderSubmission } from "../scheduler/submission.js";
import {
  decisionToJson,
  SeqAlignmentGenerator,
  type GenerationRequest,
  type PlannedTask
} from "../generation/seqAlignment.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { envSnapshot } from "./envSnapshot.js";
import {
  zSeqAlignmentPassGetInput,
  zSeqAlignmentPassGetOutput,
  zSeqAlignmentPlanInput,
  zSeqAlignmentPlanOutput,
  zSeqAlignmentSubmitInput,
  zSeqAlignmentSubmitOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  settings: PipelineSettings;
  store: PostgresStore;
  scheduler?: SchedulerClient;
  resolver?: ReferenceResolver;
}

type RequestExtra = Parameters<typeof requestedByFromExtra>[0];

interface ToolReply {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  structuredContent: JsonObject;
}

interface RunSelectionArgs {
  samplesheet_path: string;
  id_run: number;
  positions?: number[] | undefined;
  input_path: string;
  archive_path: string;
  job_tag?: string | undefined;
}

const CONTRACT_VERSION = "v1";

function taskRecord(task: PlannedTask): PassTaskRecord {
  return {
    jobIndex: task.jobIndex,
    position: task.descriptor.position,
    tagIndex: task.descriptor.tagIndex,
    label: task.command.label,
    template: task.command.template,
    commandSha256: sha256Prefixed(task.command.script),
    decision: decisionToJson(task.decision)
  };
}

function taskJson(task: PassTaskRecord): JsonObject {
  return {
    job_index: task.jobIndex,
    position: task.position,
    tag_index: task.tagIndex,
    label: task.label,
    template: task.template,
    command_sha256: task.commandSha256,
    decision: task.decision
  };
}

async function loadSamplesheet(filePath: string): Promise<{ metadata: SamplesheetMetadataProvider; canonical: JsonObject }> {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, "utf8");
  } catch (e) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `cannot read samplesheet ${resolved}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
  return {
    metadata: SamplesheetMetadataProvider.parseText(raw),
    canonical: { path: resolved, sha256: sha256Prefixed(raw) }
  };
}

function selectionParams(args: RunSelectionArgs, samplesheet: JsonObject): JsonObject {
  const positions = args.positions?.length ? [...new Set(args.positions)].sort((a, b) => a - b) : null;
  return {
    id_run: args.id_run,
    positions,
    input_path: path.resolve(args.input_path),
    archive_path: path.resolve(args.archive_path),
    samplesheet,
    job_tag: args.job_tag ?? null
  };
}

function generationRequest(args: RunSelectionArgs): GenerationRequest {
  const request: GenerationRequest = {
    idRun: args.id_run,
    runPaths: { inputPath: path.resolve(args.input_path), archivePath: path.resolve(args.archive_path) }
  };
  if (args.positions?.length) request.positions = args.positions;
  if (args.job_tag) request.jobTag = args.job_tag;
  return request;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "lanealign-gateway",
    version: "0.1.0"
  });

  const scheduler = deps.scheduler ?? new LsfSchedulerClient();
  const resolver = deps.resolver ?? new RepositoryReferenceResolver(deps.settings.repositoryRoot());

  /**
   * Records the invocation as a generation pass keyed on its canonical
   * parameters. A pass that already finished with one of `replayable` returns
   * its stored result; anything else runs `body` again under the same id.
   */
  async function executePass(
    ctx: {
      toolName: string;
      idRun: number;
      canonicalParams: JsonObject;
      replayable: ReadonlySet<PassStatus>;
      extra: RequestExtra;
    },
    body: (run: GenerationRun) => Promise<ToolReply>
  ): Promise<ToolReply> {
    const { passId, paramsHash } = derivePassId({
      toolName: ctx.toolName,
      contractVersion: CONTRACT_VERSION,
      configHash: deps.settings.configHash,
      canonicalParams: ctx.canonicalParams
    });

    const existing = await deps.store.getPass(passId);
    if (existing && ctx.replayable.has(existing.status) && existing.resultJson) {
      return {
        content: [{ type: "text", text: `Replayed ${ctx.toolName} (${passId})` }],
        structuredContent: existing.resultJson
      };
    }

    const run = new GenerationRun(
      { store: deps.store },
      {
        passId,
        toolName: ctx.toolName,
        contractVersion: CONTRACT_VERSION,
        idRun: ctx.idRun,
        paramsHash,
        canonicalParams: ctx.canonicalParams,
        configHash: deps.settings.configHash,
        requestedBy: requestedByFromExtra(ctx.extra),
        environment: envSnapshot()
      }
    );
    let started = false;

    try {
      await run.start();
      started = true;
      return await body(run);
    } catch (e) {
      if (!started) throw e;
      if (e instanceof DecisionConflictError) {
        await run.event("decision.conflict", e.message, { label: e.label, flags: [...e.flags] });
      }
      if (e instanceof McpError) {
        if (e.code === ErrorCode.InvalidRequest) await run.finishBlocked(e.message);
        else await run.finishFailure(e.message);
        throw e;
      }
      if (e instanceof Error) {
        await run.finishFailure(e.message);
        throw e;
      }
      await run.finishFailure("unknown error");
      throw e;
    }
  }

  mcp.registerTool(
    "seq_alignment_plan",
    {
      description:
        "Decide the alignment analysis for every lane/plex of a run and render the per-task commands, without submitting anything.",
      inputSchema: zSeqAlignmentPlanInput,
      outputSchema: zSeqAlignmentPlanOutput
    },
    async (args, extra) => {
      const toolName = "seq_alignment_plan";
      deps.settings.assertToolAllowed(toolName);
      const { metadata, canonical } = await loadSamplesheet(args.samplesheet_path);

      return executePass(
        {
          toolName,
          idRun: args.id_run,
          canonicalParams: selectionParams(args, canonical),
          replayable: new Set<PassStatus>(["planned", "empty"]),
          extra
        },
        async (run) => {
          const generator = new SeqAlignmentGenerator({
            settings: deps.settings,
            metadata,
            resolver,
            scheduler,
            events: run
          });
          const plan = await generator.plan(generationRequest(args));

          const records = plan.tasks.map(taskRecord);
          await run.recordTasks(records);
          const indices = plan.manifest.indices();
          const status = plan.tasks.length ? "planned" : "empty";

          const structured = await run.finishSuccess(
            status,
            {
              id_run: args.id_run,
              job_name_root: plan.jobNameRoot,
              manifest_root: plan.manifestRoot,
              array_spec: indices.length ? formatArraySpec(indices) : null,
              tasks: plan.tasks.map((t, i) => {
                const record = records[i] ?? taskRecord(t);
                return { ...taskJson(record), command: t.command.script };
              })
            },
            `${plan.tasks.length} task(s) planned`,
            { jobNameRoot: plan.jobNameRoot }
          );

          return {
            content: [{ type: "text", text: `Planned ${plan.tasks.length} task(s) for run ${args.id_run} (${run.passId})` }],
            structuredContent: structured
          };
        }
      );
    }
  );

  mcp.registerTool(
    "seq_alignment_submit",
    {
      description:
        "Plan the alignment array job for a run, submit it held to LSF, write its argument manifest and release it.",
      inputSchema: zSeqAlignmentSubmitInput,
      outputSchema: zSeqAlignmentSubmitOutput
    },
    async (args, extra) => {
      const toolName = "seq_alignment_submit";
      deps.settings.assertToolAllowed(toolName);
      const { metadata, canonical } = await loadSamplesheet(args.samplesheet_path);
      const requiredJobIds = args.required_job_ids ?? [];

      return executePass(
        {
          toolName,
          idRun: args.id_run,
          canonicalParams: {
            ...selectionParams(args, canonical),
            log_dir: args.log_dir ? path.resolve(args.log_dir) : null,
            required_job_ids: [...requiredJobIds]
          },
          replayable: new Set<PassStatus>(["submitted", "empty"]),
          extra
        },
        async (run) => {
          const generator = new SeqAlignmentGenerator({
            settings: deps.settings,
            metadata,
            resolver,
            scheduler,
            events: run
          });
          const request = generationRequest(args);
          if (args.log_dir) request.logDir = path.resolve(args.log_dir);
          if (requiredJobIds.length) request.requiredJobIds = requiredJobIds;

          const result = await generator.generate(request);

          if (result.status === "empty") {
            const structured = await run.finishSuccess(
              "empty",
              {
                id_run: args.id_run,
                job_name_root: result.jobNameRoot,
                job_id: null,
                job_ids: [],
                array_spec: null,
                bsub_command: null,
                manifest_path: null,
                manifest_sha256: null,
                tasks: []
              },
              "nothing to submit",
              { jobNameRoot: result.jobNameRoot }
            );
            return {
              content: [{ type: "text", text: `Nothing to submit for run ${args.id_run} (${run.passId})` }],
              structuredContent: structured
            };
          }

          const records = result.plan.tasks.map(taskRecord);
          await run.recordTasks(records);
          const structured = await run.finishSuccess(
            "submitted",
            {
              id_run: args.id_run,
              job_name_root: result.jobNameRoot,
              job_id: result.jobId,
              job_ids: [...result.jobIds],
              array_spec: result.submission.arraySpec,
              bsub_command: renderSubmission(result.submission),
              manifest_path: result.manifest.path,
              manifest_sha256: result.manifest.sha256,
              tasks: records.map(taskJson)
            },
            `submitted job ${result.jobId}`,
            { jobNameRoot: result.jobNameRoot, jobId: result.jobId, manifestPath: result.manifest.path }
          );

          return {
            content: [{ type: "text", text: `Submitted job ${result.jobId} with ${records.length} task(s) (${run.passId})` }],
            structuredContent: structured
          };
        }
      );
    }
  );

  mcp.registerTool(
    "seq_alignment_pass_get",
    {
      description: "Fetch a recorded generation pass with its tasks and, optionally, its events.",
      inputSchema: zSeqAlignmentPassGetInput,
      outputSchema: zSeqAlignmentPassGetOutput
    },
    async (args) => {
      deps.settings.assertToolAllowed("seq_alignment_pass_get");
      const passId = args.pass_id as PassId;
      const pass = await deps.store.getPass(passId);
      if (!pass) throw new McpError(ErrorCode.InvalidParams, `unknown pass_id: ${args.pass_id}`);

      const tasks = await deps.store.listPassTasks(passId);
      const structured: JsonObject = {
        pass: {
          pass_id: pass.passId,
          tool_name: pass.toolName,
          id_run: pass.idRun,
          status: pass.status,
          params_hash: pass.paramsHash,
          config_hash: pass.configHash,
          job_name_root: pass.jobNameRoot,
          job_id: pass.jobId,
          manifest_path: pass.manifestPath,
          requested_by: pass.requestedBy,
          error: pass.error,
          created_at: pass.createdAt,
          started_at: pass.startedAt,
          finished_at: pass.finishedAt
        },
        result: pass.resultJson,
        tasks: tasks.map(taskJson)
      };
      if (args.include_events) {
        const events = await deps.store.listPassEvents(passId);
        structured.events = events.map((e) => ({ ts: e.ts, kind: e.kind, message: e.message, data: e.data }));
      }

      return {
        content: [{ type: "text", text: `Pass ${pass.passId}: ${pass.status}` }],
        structuredContent: structured
      };
    }
  );

  return mcp;
}
