import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { access, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { CollectingEventSink } from "../src/core/diagnostics.js";
import { DecisionConflictError, ResourceResolutionError } from "../src/core/errors.js";
import { SeqAlignmentGenerator, type GenerationRequest } from "../src/generation/seqAlignment.js";
import { SamplesheetMetadataProvider, type SamplesheetInput } from "../src/lims/samplesheet.js";
import { RepositoryReferenceResolver } from "../src/references/resolver.js";
import { ArgumentManifest } from "../src/scheduler/argumentStore.js";
import { jobIndexFor } from "../src/scheduler/jobIndex.js";
import { FakeScheduler, makeRepository, STANDARD_REPOSITORY, testSettings } from "./builders.js";

const MOUSE = "Mus_musculus (GRCm38)";

function sheet(lanes: SamplesheetInput["lanes"], run: Partial<SamplesheetInput["run"]> = {}): SamplesheetInput {
  return {
    id_run: 1234,
    run: { paired_end: true, flowcell_id: "C0TEVACXX", read_cycle_counts: [76, 76], ...run },
    lanes
  };
}

const POOLED_LANE_3: SamplesheetInput["lanes"] = [
  {
    position: 3,
    is_pool: true,
    spiked_phix_tag_index: 2,
    reference_genome: MOUSE,
    plexes: [
      { tag_index: 1, reference_genome: MOUSE },
      { tag_index: 2, reference_genome: MOUSE }
    ]
  }
];

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

describe("SeqAlignmentGenerator", () => {
  let tmpDir: string;
  let repo: string;
  let counter = 0;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "lanealign-gen-"));
    repo = await makeRepository(path.join(tmpDir, "repo"));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  function setup(input: SamplesheetInput, opts: { scheduler?: FakeScheduler; repository?: string } = {}) {
    counter++;
    const events = new CollectingEventSink();
    const scheduler = opts.scheduler ?? new FakeScheduler();
    const generator = new SeqAlignmentGenerator({
      settings: testSettings(opts.repository ?? repo),
      metadata: new SamplesheetMetadataProvider(input),
      resolver: new RepositoryReferenceResolver(opts.repository ?? repo),
      scheduler,
      events
    });
    const request: GenerationRequest = {
      idRun: 1234,
      runPaths: { inputPath: path.join(tmpDir, `in${counter}`), archivePath: path.join(tmpDir, `arch${counter}`) },
      jobTag: "T1"
    };
    return { events, scheduler, generator, request };
  }

  it("plans one task per plex with position-and-tag indices", async () => {
    const { generator, request } = setup(sheet(POOLED_LANE_3));
    const plan = await generator.plan({ ...request, positions: [3] });

    expect(plan.jobNameRoot).toBe("seq_alignment_1234_T1");
    expect(plan.manifestRoot).toBe(path.join(request.runPaths.inputPath, "seq_alignment_1234_T1"));
    expect(plan.manifest.indices()).toEqual([30001, 30002]);
    expect(plan.tasks.map((t) => t.command.label)).toEqual(["1234_3#1", "1234_3#2"]);
    expect(plan.tasks.map((t) => t.decision.spikedPhix)).toEqual([false, true]);
    for (const task of plan.tasks) {
      expect(task.decision.aligner).toBe("bwa_aln");
      expect(task.decision.targetAlignment).toBe(true);
    }
  });

  it("plans the pooled human lane with a spiked PhiX plex", async () => {
    const human = "Homo_sapiens (default)";
    const { generator, request } = setup(
      sheet([
        {
          position: 3,
          is_pool: true,
          spiked_phix_tag_index: 2,
          reference_genome: human,
          plexes: [
            { tag_index: 1, reference_genome: human },
            { tag_index: 2, reference_genome: human }
          ]
        }
      ])
    );
    const plan = await generator.plan(request);

    expect(plan.manifest.indices()).toEqual([30001, 30002]);
    expect(plan.tasks.map((t) => t.decision.spikedPhix)).toEqual([false, true]);
    expect(plan.tasks.map((t) => t.decision.aligner)).toEqual(["bwa_aln", "bwa_aln"]);
    expect(plan.tasks.map((t) => t.decision.targetAlignment)).toEqual([true, true]);
    expect(plan.manifest.get(jobIndexFor(3, 1))).toContain(
      `-keys alignment_reference_genome -vals ${path.join(repo, "references/Homo_sapiens/default/all/bwa0_6/hs.fa")} `
    );
  });

  it("degrades only the lane whose target references are incomplete", async () => {
    const partial = await makeRepository(path.join(tmpDir, "partial"), [
      ...STANDARD_REPOSITORY,
      "references/Danio_rerio/zv9/all/fasta/zv9.fa",
      "references/Danio_rerio/zv9/all/bwa0_6/zv9.fa.bwt"
    ]);
    const { generator, request, events } = setup(
      sheet([
        { position: 1, reference_genome: MOUSE },
        { position: 2, reference_genome: "Danio_rerio (zv9)" }
      ]),
      { repository: partial }
    );
    const plan = await generator.plan(request);

    expect(plan.manifest.indices()).toEqual([1, 2]);
    expect(plan.tasks.map((t) => t.decision.targetAlignment)).toEqual([true, false]);
    expect(plan.manifest.get(jobIndexFor(1))).not.toContain("af_target_out_flag_name");
    expect(plan.manifest.get(jobIndexFor(2))).toContain("-keys af_target_out_flag_name -vals UNALIGNED");

    const warnings = events.events.filter((e) => e.kind === "diagnostic.warn");
    expect(warnings).toEqual([
      {
        kind: "diagnostic.warn",
        message: "1234_2 - no unique picard index for target reference, skipping target alignment",
        data: { label: "1234_2", missing: "picard" }
      }
    ]);
  });

  it("submits held, writes the manifest, then releases", async () => {
    const observed: boolean[] = [];
    let manifestFile = "";
    const scheduler = new FakeScheduler(async (_request, jobId) => {
      manifestFile = `${path.join(tmpDir, `in${counter}`, "seq_alignment_1234_T1")}_${jobId}.json`;
      observed.push(await exists(manifestFile));
    });
    const { generator, request, events } = setup(sheet(POOLED_LANE_3), { scheduler });

    const result = await generator.generate(request);
    if (result.status !== "submitted") throw new Error(`unexpected status ${result.status}`);

    expect(observed).toEqual([false]);
    expect(scheduler.calls).toEqual(["submit:4001", "release:4001"]);
    expect(scheduler.submissions[0]?.hold).toBe(true);
    expect(scheduler.submissions[0]?.jobName).toBe("seq_alignment_1234_T1[30001-30002]");
    expect(result.jobIds).toEqual(["4001"]);
    expect(result.manifest.path).toBe(manifestFile);

    const manifest = ArgumentManifest.parse(await readFile(manifestFile, "utf8"));
    expect(manifest.indices()).toEqual([30001, 30002]);
    expect(manifest.get(jobIndexFor(3, 1))).toBe(result.plan.tasks[0]?.command.script);

    const kinds = events.kinds();
    expect(kinds.indexOf("submit.ok")).toBeLessThan(kinds.indexOf("manifest.written"));
    expect(kinds.indexOf("manifest.written")).toBeLessThan(kinds.indexOf("submit.released"));
    expect(await exists(path.join(request.runPaths.archivePath, "log"))).toBe(true);
  });

  it("returns an empty result without submitting when nothing is planned", async () => {
    const { generator, request, events, scheduler } = setup(sheet(POOLED_LANE_3));
    const result = await generator.generate({ ...request, positions: [5] });

    expect(result).toEqual({ status: "empty", jobNameRoot: "seq_alignment_1234_T1", jobIds: [] });
    expect(scheduler.calls).toEqual([]);
    expect(events.kinds()).toEqual(["pass.positions", "lane.skipped", "pass.empty"]);
    expect(await exists(request.runPaths.inputPath)).toBe(false);
  });

  it("aborts the whole pass on a conflict before submitting", async () => {
    const { generator, request, scheduler } = setup(
      sheet([
        ...POOLED_LANE_3,
        { position: 4, reference_genome: MOUSE, contains_nonconsented_xahuman: true, contains_nonconsented_human: true }
      ])
    );
    await expect(generator.generate(request)).rejects.toBeInstanceOf(DecisionConflictError);
    expect(scheduler.calls).toEqual([]);
    expect(await exists(request.runPaths.inputPath)).toBe(false);
  });

  it("cancels the job when the manifest cannot be written", async () => {
    const { generator, request, scheduler, events } = setup(sheet(POOLED_LANE_3));
    await writeFile(request.runPaths.inputPath, "not a directory");

    await expect(generator.generate(request)).rejects.toThrow();
    expect(scheduler.calls).toEqual(["submit:4001", "cancel:4001"]);
    expect(events.kinds().slice(-2)).toEqual(["manifest.failed", "submit.cancelled"]);
  });

  it("surfaces a failed release and leaves the manifest in place", async () => {
    const scheduler = new FakeScheduler();
    scheduler.failRelease = true;
    const { generator, request } = setup(sheet(POOLED_LANE_3), { scheduler });

    await expect(generator.generate(request)).rejects.toThrow("bresume failed");
    expect(scheduler.calls).toEqual(["submit:4001", "release:4001"]);
    expect(await exists(path.join(request.runPaths.inputPath, "seq_alignment_1234_T1_4001.json"))).toBe(true);
  });

  it("synthesises tag 0 from the lane and plans lanes of non-indexed runs once", async () => {
    const withTagZero = setup(
      sheet([{ position: 2, is_pool: true, reference_genome: MOUSE, tag_indices: [0, 1], plexes: [{ tag_index: 1 }] }])
    );
    const plan = await withTagZero.generator.plan(withTagZero.request);
    expect(plan.manifest.indices()).toEqual([20000, 20001]);
    expect(plan.tasks[0]?.descriptor.referenceGenome).toBe(MOUSE);
    expect(plan.tasks[1]?.decision.targetAlignment).toBe(false);

    const notIndexed = setup(sheet(POOLED_LANE_3, { indexed: false }));
    expect((await notIndexed.generator.plan(notIndexed.request)).manifest.indices()).toEqual([3]);
  });

  it("fails when the PhiX reference is missing", async () => {
    const bare = await makeRepository(
      path.join(tmpDir, "bare"),
      STANDARD_REPOSITORY.filter((f) => !f.startsWith("references/PhiX/"))
    );
    const { generator, request, scheduler } = setup(sheet(POOLED_LANE_3), { repository: bare });
    await expect(generator.generate(request)).rejects.toBeInstanceOf(ResourceResolutionError);
    expect(scheduler.calls).toEqual([]);
  });
});
