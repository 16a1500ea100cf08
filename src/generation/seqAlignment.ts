import { promises as fs } from "fs";
import path from "path";
import type { PipelineSettings } from "../config/settings.js";
import { emitDiagnostics, type PassEventSink } from "../core/diagnostics.js";
import { jobNameRoot, newJobTag } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { decideAnalysis, type AnalysisDecision } from "../alignment/decision.js";
import {
  synthesizeAlignmentCommand,
  type HumanSplitReferences,
  type RunPaths,
  type TaskCommand
} from "../alignment/alignmentCommand.js";
import {
  descriptorLabel,
  tagZeroFromLane,
  type LaneOrPlexDescriptor,
  type MetadataProvider,
  type RunContext
} from "../lims/descriptor.js";
import type { ReferenceResolver } from "../references/resolver.js";
import { FixedReferences, resolveDescriptorResources } from "../references/resources.js";
import { ArgumentManifest, writeArgumentManifest, type WrittenManifest } from "../scheduler/argumentStore.js";
import { jobIndexFor, type JobIndex } from "../scheduler/jobIndex.js";
import type { SchedulerClient } from "../scheduler/lsf.js";
import { buildSubmission, renderSubmission, type SubmissionRequest } from "../scheduler/submission.js";

export const STAGE_NAME = "seq_alignment";

export interface GenerationRequest {
  idRun: number;
  // All lanes known to the metadata provider when omitted.
  positions?: number[];
  runPaths: RunPaths;
  logDir?: string;
  requiredJobIds?: string[];
  jobTag?: string;
}

export interface PlannedTask {
  jobIndex: JobIndex;
  descriptor: LaneOrPlexDescriptor;
  decision: AnalysisDecision;
  command: TaskCommand;
}

export interface GenerationPlan {
  jobNameRoot: string;
  manifestRoot: string;
  run: RunContext;
  tasks: PlannedTask[];
  manifest: ArgumentManifest;
}

export type GenerationResult =
  | { status: "empty"; jobNameRoot: string; jobIds: [] }
  | {
      status: "submitted";
      jobNameRoot: string;
      jobId: string;
      jobIds: [string];
      manifest: WrittenManifest;
      submission: SubmissionRequest;
      plan: GenerationPlan;
    };

export interface GeneratorDeps {
  settings: PipelineSettings;
  metadata: MetadataProvider;
  resolver: ReferenceResolver;
  scheduler: SchedulerClient;
  events: PassEventSink;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Builds and submits the alignment array job for one run.
 *
 * Every lane/plex is decided and rendered before anything is submitted, so a
 * conflict anywhere aborts the pass with nothing queued. The submission is
 * made held; it is released only once the argument manifest named after its
 * job id has been written.
 */
export class SeqAlignmentGenerator {
  constructor(private readonly deps: GeneratorDeps) {}

  private async descriptors(idRun: number, positions: number[], run: RunContext): Promise<LaneOrPlexDescriptor[]> {
    const out: LaneOrPlexDescriptor[] = [];
    for (const position of positions) {
      const lane = await this.deps.metadata.lane(idRun, position);
      if (!lane) {
        await this.deps.events.event("lane.skipped", `no metadata for position ${position}`, { position });
        continue;
      }

      if (!(run.indexed && lane.isPool)) {
        out.push(lane.lane);
        continue;
      }

      for (const tagIndex of lane.tagIndices) {
        const plex = lane.plexes.get(tagIndex) ?? (tagIndex === 0 ? tagZeroFromLane(lane.lane) : undefined);
        if (!plex) {
          await this.deps.events.event(
            "plex.skipped",
            `no metadata for position ${position} tag index ${tagIndex}`,
            { position, tag_index: tagIndex }
          );
          continue;
        }
        out.push(plex);
      }
    }
    return out;
  }

  private async humanSplitReferences(
    fixed: FixedReferences,
    decision: AnalysisDecision,
    label: string
  ): Promise<HumanSplitReferences | null> {
    if (decision.humanSplit !== "nonconsented") return null;
    return {
      dict: `${await fixed.humanSplit("picard", label)}.dict`,
      fasta: await fixed.humanSplit("fasta", label),
      alignmentIndex: await fixed.humanSplit(decision.rnaMode ? "bowtie2" : "bwa0_6", label)
    };
  }

  async plan(request: GenerationRequest): Promise<GenerationPlan> {
    const { metadata, resolver, events, settings } = this.deps;
    const run = await metadata.runContext(request.idRun);
    const positions = request.positions?.length
      ? [...new Set(request.positions)].sort((a, b) => a - b)
      : await metadata.positions(request.idRun);

    const root = jobNameRoot(STAGE_NAME, request.idRun, request.jobTag ?? newJobTag());
    const manifestRoot = path.join(request.runPaths.inputPath, root);
    await events.event("pass.positions", `positions ${positions.join(",") || "(none)"}`, {
      id_run: request.idRun,
      positions,
      job_name_root: root
    });

    const descriptors = await this.descriptors(request.idRun, positions, run);
    const manifest = new ArgumentManifest();
    const tasks: PlannedTask[] = [];
    if (descriptors.length === 0) {
      return { jobNameRoot: root, manifestRoot, run, tasks, manifest };
    }

    const fixed = new FixedReferences(resolver);
    const phixFasta = await fixed.phixFasta();

    for (const descriptor of descriptors) {
      const label = descriptorLabel(descriptor);
      const jobIndex = jobIndexFor(descriptor.position, descriptor.tagIndex);

      const resources = await resolveDescriptorResources(descriptor, resolver);
      await emitDiagnostics(events, label, resources.diagnostics);
      const { decision, diagnostics } = decideAnalysis(descriptor, run, resources);
      await emitDiagnostics(events, label, diagnostics);

      const command = synthesizeAlignmentCommand({
        descriptor,
        decision,
        resources,
        runPaths: request.runPaths,
        tools: settings.alignmentTools(),
        phixFasta,
        humanSplitReferences: await this.humanSplitReferences(fixed, decision, label)
      });
      manifest.set(jobIndex, command.script);
      tasks.push({ jobIndex, descriptor, decision, command });

      await events.event("task.planned", `${label} -> ${jobIndex} using ${command.template}`, {
        label,
        job_index: jobIndex,
        template: command.template,
        decision: decisionToJson(decision)
      });
    }

    return { jobNameRoot: root, manifestRoot, run, tasks, manifest };
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const { events, scheduler, settings } = this.deps;
    const plan = await this.plan(request);

    if (plan.tasks.length === 0) {
      await events.event("pass.empty", "nothing to do", null);
      return { status: "empty", jobNameRoot: plan.jobNameRoot, jobIds: [] };
    }

    const logDir = request.logDir ?? path.join(request.runPaths.archivePath, "log");
    await fs.mkdir(logDir, { recursive: true });

    const submission = buildSubmission({
      lsf: settings.lsf(),
      tools: settings.alignmentTools(),
      run: plan.run,
      jobNameRoot: plan.jobNameRoot,
      indices: plan.manifest.indices(),
      logDir,
      manifestRoot: plan.manifestRoot,
      requiredJobIds: request.requiredJobIds ?? [],
      hold: true
    });
    await events.event("submit.request", renderSubmission(submission), {
      job_name: submission.jobName,
      array: submission.arraySpec
    });

    const { jobId } = await scheduler.submit(submission);
    await events.event("submit.ok", `job_id=${jobId}`, { job_id: jobId });

    let manifest: WrittenManifest;
    try {
      manifest = await writeArgumentManifest(plan.manifestRoot, jobId, plan.manifest);
    } catch (e) {
      await events.event("manifest.failed", errorMessage(e), { job_id: jobId });
      try {
        await scheduler.cancel(jobId);
        await events.event("submit.cancelled", `job_id=${jobId}`, { job_id: jobId });
      } catch (cancelError) {
        await events.event("submit.cancel_failed", errorMessage(cancelError), { job_id: jobId });
      }
      throw e;
    }
    await events.event("manifest.written", `arguments written to ${manifest.path}`, {
      path: manifest.path,
      sha256: manifest.sha256,
      entries: manifest.entries
    });

    await scheduler.release(jobId);
    await events.event("submit.released", `job_id=${jobId}`, { job_id: jobId });

    return {
      status: "submitted",
      jobNameRoot: plan.jobNameRoot,
      jobId,
      jobIds: [jobId],
      manifest,
      submission,
      plan
    };
  }
}

export function decisionToJson(decision: AnalysisDecision): JsonObject {
  return {
    target_alignment: decision.targetAlignment,
    rna_mode: decision.rnaMode,
    aligner: decision.aligner,
    human_split_aligner: decision.humanSplitAligner,
    human_split: decision.humanSplit,
    bait_stats: decision.baitStats,
    alt_reference: decision.altReference,
    spiked_phix: decision.spikedPhix,
    paired_end: decision.pairedEnd
  };
}
