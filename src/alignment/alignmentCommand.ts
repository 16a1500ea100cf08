import path from "path";
import type { AlignmentToolsConfig } from "../config/settings.js";
import { descriptorLabel, type LaneOrPlexDescriptor } from "../lims/descriptor.js";
import { targetReferences, type DescriptorResources } from "../references/resources.js";
import type { AnalysisDecision } from "./decision.js";
import { qcCommand } from "./qc.js";
import { CommandChain, ShellCommand, ShellWord, type Arg } from "./shell.js";

export const TEMPLATE_PREFIX = "alignment_wtsi_stage2_";
export const THREADS_HELPER = "npg_pipeline_job_env_to_threads";

export interface TaskPaths {
  inputPath: string;
  archivePath: string;
  qcPath: string;
}

export interface RunPaths {
  inputPath: string;
  archivePath: string;
}

export interface HumanSplitReferences {
  dict: string;
  fasta: string;
  alignmentIndex: string;
}

export interface SynthesisInput {
  descriptor: LaneOrPlexDescriptor;
  decision: AnalysisDecision;
  resources: DescriptorResources;
  runPaths: RunPaths;
  tools: AlignmentToolsConfig;
  phixFasta: string;
  // Required when decision.humanSplit is "nonconsented".
  humanSplitReferences: HumanSplitReferences | null;
}

export interface TaskCommand {
  label: string;
  template: string;
  script: string;
  chain: CommandChain;
}

/**
 * Lanes read from and write to the run-level directories; plexes use the
 * per-lane subdirectories.
 */
export function taskPaths(runPaths: RunPaths, descriptor: LaneOrPlexDescriptor): TaskPaths {
  if (descriptor.tagIndex === null) {
    return {
      inputPath: runPaths.inputPath,
      archivePath: runPaths.archivePath,
      qcPath: path.join(runPaths.archivePath, "qc")
    };
  }
  const laneArchive = path.join(runPaths.archivePath, `lane${descriptor.position}`);
  return {
    inputPath: path.join(runPaths.inputPath, `lane${descriptor.position}`),
    archivePath: laneArchive,
    qcPath: path.join(laneArchive, "qc")
  };
}

export function templateName(decision: AnalysisDecision): string {
  let label = "";
  if (decision.humanSplit === "nonconsented") {
    label = "humansplit_";
    if (!decision.targetAlignment) label += "notargetalign_";
  }
  return `${TEMPLATE_PREFIX}${label}template.json`;
}

/**
 * Everything that changes when a task has no target alignment. Applied as
 * one group: the alignment nodes are spliced out, scramble is told there is
 * no reference, stats nodes lose their reference, AlignmentFilter loses its
 * target input and its target output is relabelled as unaligned.
 */
export function noTargetAlignmentArgs(): Arg[] {
  return [
    "-splice_nodes",
    "src_bam:-alignment_filter:__PHIX_BAM_IN__",
    "-keys",
    "scramble_reference_flag",
    "-vals",
    "-x",
    "-nullkeys",
    "stats_reference_flag",
    "-nullkeys",
    "af_target_in_flag",
    "-keys",
    "af_target_out_flag_name",
    "-vals",
    "UNALIGNED"
  ];
}

function kv(key: string, value: Arg): Arg[] {
  return ["-keys", key, "-vals", value];
}

function threads(extra: string): ShellWord {
  return ShellWord.subst(extra ? `${THREADS_HELPER} ${extra}` : THREADS_HELPER);
}

function vtlibWords(tools: AlignmentToolsConfig, template: string): { cfgdatadir: ShellWord; template: ShellWord } {
  if (tools.vtlib_dir) {
    return {
      cfgdatadir: ShellWord.literal(`${tools.vtlib_dir.replace(/\/+$/, "")}/`),
      template: ShellWord.literal(path.join(tools.vtlib_dir, template))
    };
  }
  return {
    cfgdatadir: ShellWord.concat(ShellWord.subst('dirname "$(readlink -f "$(which vtfp.pl)")"'), "/../data/vtlib/"),
    template: ShellWord.concat(
      ShellWord.subst('dirname "$(dirname "$(readlink -f "$(which vtfp.pl)")")"'),
      `/data/vtlib/${template}`
    )
  };
}

export function libraryStrandedness(libraryType: string | null): "fr-firststrand" | "fr-unstranded" {
  return libraryType !== null && libraryType.includes("dUTP") ? "fr-firststrand" : "fr-unstranded";
}

function vtfpCommand(input: SynthesisInput, paths: TaskPaths, label: string, template: string): ShellCommand {
  const { descriptor, decision, resources, tools } = input;
  const nchs = decision.humanSplit === "nonconsented";
  const target = decision.targetAlignment;
  const hs = nchs ? input.humanSplitReferences : null;
  if (nchs && !hs) throw new Error(`human split references missing for ${label}`);
  const refs = target ? targetReferences(resources, decision.rnaMode) : null;
  if (refs && refs.status === "incomplete") {
    throw new Error(`target alignment without ${refs.missing} reference for ${label}`);
  }

  const vtlib = vtlibWords(tools, template);
  const cmd = new ShellCommand("vtfp.pl")
    .args(kv("samtools_executable", tools.samtools_executable))
    .args(kv("cfgdatadir", vtlib.cfgdatadir))
    .args(kv("aligner_numthreads", threads("")))
    .args(kv("br_numthreads_val", threads("--exclude 1 --divide 2")))
    .args(kv("b2c_mt_val", threads("--exclude 2 --divide 2")))
    .args(kv("indatadir", paths.inputPath))
    .args(kv("outdatadir", paths.archivePath))
    .args(kv("af_metrics", `${label}.bam_alignment_filter_metrics.json`))
    .args(kv("rpt", label));

  if (refs) cmd.args(kv("reference_dict", `${refs.picard}.dict`));
  if (hs) cmd.args(kv("reference_dict_hs", hs.dict));
  if (refs) cmd.args(kv("reference_genome_fasta", refs.fasta));
  if (hs) cmd.args(kv("hs_reference_genome_fasta", hs.fasta));
  cmd.args(kv("phix_reference_genome_fasta", input.phixFasta));
  cmd.args(kv("alignment_filter_jar", tools.alignment_filter_jar));

  if (decision.baitStats && resources.bait) {
    cmd.args(kv("bait_regions_file", resources.bait.intervalsPath));
    cmd.arg("-prune_nodes", "fopphx_samtools_stats_F0.*00_bait.*");
  } else {
    cmd.arg("-prune_nodes", "fop.*samtools_stats_F0.*00_bait.*");
  }

  if (decision.rnaMode) {
    if (refs) cmd.args(kv("alignment_reference_genome", refs.alignmentIndex));
    if (hs) cmd.args(kv("hs_alignment_reference_genome", hs.alignmentIndex));
    cmd.args(kv("library_type", libraryStrandedness(descriptor.libraryType)));
    if (!resources.transcriptomeIndex) throw new Error(`RNA analysis without transcriptome for ${label}`);
    cmd.args(kv("transcriptome_val", resources.transcriptomeIndex));
    cmd.args(kv("alignment_method", "tophat2"));
    if (hs) cmd.args(kv("alignment_hs_method", "tophat2"));
  } else {
    if (refs) cmd.args(kv("alignment_reference_genome", refs.alignmentIndex));
    if (hs) cmd.args(kv("hs_alignment_reference_genome", hs.alignmentIndex));
    cmd.args(kv("bwa_executable", tools.bwa_executable));
    cmd.args(kv("alignment_method", decision.aligner));
    if (hs) cmd.args(kv("alignment_hs_method", decision.humanSplitAligner));
  }

  if (!decision.pairedEnd) cmd.arg("-nullkeys", "bwa_mem_p_flag");

  if (decision.humanSplit === "xahuman" || decision.humanSplit === "yhuman") {
    cmd.args(kv("final_output_prep_target_name", "split_by_chromosome"));
    cmd.args(kv("split_indicator", `_${decision.humanSplit}`));
  }
  if (decision.humanSplit === "yhuman") {
    cmd.args(kv("split_bam_by_chromosome_flags", "S=Y"));
    cmd.args(kv("split_bam_by_chromosome_flags", "V=true"));
    cmd.args(kv("split_bam_by_chromosomes_jar", tools.split_bam_by_chromosomes_jar));
  }

  if (!target) cmd.args(noTargetAlignmentArgs());

  cmd.arg(vtlib.template);
  cmd.redirectStdout(`run_${label}.json`);
  return cmd;
}

/**
 * Renders the full command one array task runs: working directory set-up,
 * pipeline template instantiation and execution, then the QC checks over
 * every output subset the decision produces.
 */
export function synthesizeAlignmentCommand(input: SynthesisInput): TaskCommand {
  const { descriptor, decision } = input;
  const label = descriptorLabel(descriptor);
  const isPlex = descriptor.tagIndex !== null;
  const paths = taskPaths(input.runPaths, descriptor);
  const template = templateName(decision);

  const workDir = ShellWord.concat(
    path.join(input.runPaths.archivePath, "tmp_"),
    ShellWord.env("LSB_JOBID"),
    `/${label}`
  );

  const flagstats = (subset: string | null) =>
    qcCommand({ check: "bam_flagstats", descriptor, isPlex, qcIn: paths.archivePath, qcOut: paths.qcPath, subset });

  const chain = new CommandChain()
    .then(new ShellCommand("mkdir", "-p", workDir))
    .always(new ShellCommand("cd", workDir))
    .then(vtfpCommand(input, paths, label, template))
    .then(new ShellCommand("viv.pl", "-s", "-x", "-v", 3, "-o", `viv_${label}.log`, `run_${label}.json`))
    .then(flagstats(null))
    .then(flagstats("phix"));

  if (decision.humanSplit === "xahuman" || decision.humanSplit === "yhuman") {
    chain.then(flagstats(decision.humanSplit));
  }
  if (decision.humanSplit === "nonconsented") {
    chain.then(flagstats("human"));
  }
  chain.then(qcCommand({ check: "alignment_filter_metrics", descriptor, isPlex, qcOut: paths.qcPath }));

  return { label, template, script: chain.render(), chain };
}
