import type { Diagnostic } from "../core/diagnostics.js";
import { DecisionConflictError, type ConflictFlag } from "../core/errors.js";
import { descriptorLabel, type LaneOrPlexDescriptor, type RunContext } from "../lims/descriptor.js";
import { targetReferences, type DescriptorResources } from "../references/resources.js";

export type Aligner = "bwa_aln" | "bwa_aln_se" | "bwa_mem" | "tophat2";
export type HumanSplit = "none" | "xahuman" | "yhuman" | "nonconsented";

export interface AnalysisDecision {
  readonly targetAlignment: boolean;
  readonly rnaMode: boolean;
  readonly aligner: Aligner;
  readonly humanSplitAligner: Aligner;
  readonly humanSplit: HumanSplit;
  readonly baitStats: boolean;
  readonly altReference: boolean;
  readonly spikedPhix: boolean;
  readonly pairedEnd: boolean;
}

export interface DecisionResult {
  decision: AnalysisDecision;
  diagnostics: Diagnostic[];
}

export const FORCE_BWA_MEM_MIN_READ_CYCLES = 101;

const HUMAN_RE = /Homo_sapiens/;
const RNA_LIBRARY_RE = /(?:(?:cD|R)NA|DAFT)/;
const RNA_SPECIES_RE = /Homo_sapiens|Mus_musculus|Plasmodium_(?:falciparum|berghei)/;
// HiSeq High Throughput V4 and later, Rapid Run V2 and later.
const NEWER_FLOWCELL_RE = /(?:A[N-Z]|[B-Z][A-Z])XX$/;

export function hasNewerFlowcell(flowcellId: string): boolean {
  return NEWER_FLOWCELL_RE.test(flowcellId);
}

export function isRnaLibrary(libraryType: string | null): boolean {
  return libraryType !== null && RNA_LIBRARY_RE.test(libraryType);
}

function humanSplitOf(d: LaneOrPlexDescriptor): HumanSplit {
  const set: ConflictFlag[] = [];
  if (d.containsNonconsentedXaHuman) set.push("nonconsented_xahuman_split");
  if (d.separateYChromosomeData) set.push("separate_y_chromosome");
  if (d.containsNonconsentedHuman) set.push("nonconsented_human_split");

  if (set.length > 1) {
    throw new DecisionConflictError(
      "only one of nonconsented X and autosome human split, separate Y chromosome data and nonconsented human split may be specified",
      descriptorLabel(d),
      set
    );
  }

  const human = d.referenceGenome !== null && HUMAN_RE.test(d.referenceGenome);
  if ((d.containsNonconsentedXaHuman || d.separateYChromosomeData) && !human) {
    throw new DecisionConflictError(
      "nonconsented X and autosome human split and separate Y chromosome data must have a Homo sapiens reference",
      descriptorLabel(d),
      [...set, "non_human_reference"]
    );
  }
  if (d.containsNonconsentedHuman && human) {
    throw new DecisionConflictError(
      "nonconsented human split must not have a Homo sapiens reference",
      descriptorLabel(d),
      [...set, "human_reference"]
    );
  }

  if (d.containsNonconsentedXaHuman) return "xahuman";
  if (d.separateYChromosomeData) return "yhuman";
  if (d.containsNonconsentedHuman) return "nonconsented";
  return "none";
}

function rnaAnalysis(
  d: LaneOrPlexDescriptor,
  run: RunContext,
  resources: DescriptorResources,
  diagnostics: Diagnostic[]
): boolean {
  if (!isRnaLibrary(d.libraryType)) {
    diagnostics.push({ level: "debug", message: "not RNA library type" });
    return false;
  }
  if (!d.referenceGenome || !RNA_SPECIES_RE.test(d.referenceGenome)) {
    diagnostics.push({
      level: "debug",
      message: "not human, mouse, Plasmodium falciparum or Plasmodium berghei, skipping RNA analysis"
    });
    return false;
  }
  if (!resources.transcriptomeIndex) {
    diagnostics.push({ level: "debug", message: "no transcriptome set" });
    return false;
  }
  if (!run.pairedEnd) {
    diagnostics.push({ level: "debug", message: "single end run, skipping RNA analysis" });
    return false;
  }
  diagnostics.push({ level: "debug", message: "doing RNA analysis" });
  return true;
}

function dnaAligner(run: RunContext, altReference: boolean): { aligner: Aligner; legacy: Aligner } {
  const legacy: Aligner = run.pairedEnd ? "bwa_aln" : "bwa_aln_se";
  if (altReference) return { aligner: "bwa_mem", legacy };

  const longReads =
    run.gclp ||
    run.hiSeqX ||
    hasNewerFlowcell(run.flowcellId) ||
    run.readCycleCounts.some((c) => c >= FORCE_BWA_MEM_MIN_READ_CYCLES);
  return { aligner: longReads ? "bwa_mem" : legacy, legacy };
}

/**
 * Decides which analysis variant applies to one lane or plex.
 *
 * Pure: resolution has already happened (see resolveDescriptorResources) and
 * nothing is logged here; the returned diagnostics are for the caller to
 * record. Throws DecisionConflictError for settings that cannot be combined.
 */
export function decideAnalysis(
  descriptor: LaneOrPlexDescriptor,
  run: RunContext,
  resources: DescriptorResources
): DecisionResult {
  const diagnostics: Diagnostic[] = [];
  const label = descriptorLabel(descriptor);

  const humanSplit = humanSplitOf(descriptor);
  const rnaMode = rnaAnalysis(descriptor, run, resources, diagnostics);

  if (!run.pairedEnd && (rnaMode || humanSplit === "nonconsented")) {
    throw new DecisionConflictError(
      "only paired reads supported for RNA or nonconsented human analysis",
      label,
      [rnaMode ? "rna_analysis" : "nonconsented_human_split", "single_end_run"]
    );
  }

  let targetAlignment = false;
  if (resources.fasta === null) {
    diagnostics.push({ level: "info", message: "no target reference, skipping target alignment" });
  } else if (!descriptor.alignmentsRequested) {
    diagnostics.push({ level: "info", message: "no alignments requested" });
  } else {
    const target = targetReferences(resources, rnaMode);
    if (target.status === "incomplete") {
      diagnostics.push({
        level: "warn",
        message: `no unique ${target.missing} index for target reference, skipping target alignment`,
        data: { missing: target.missing }
      });
    } else {
      targetAlignment = true;
    }
  }

  const altReference = resources.altReference;
  const { aligner: dna, legacy } = dnaAligner(run, altReference);

  let baitStats = false;
  if (!targetAlignment) {
    diagnostics.push({ level: "debug", message: "no reference or no alignments set, no bait stats" });
  } else if (!descriptor.baitName) {
    diagnostics.push({ level: "debug", message: "no bait set" });
  } else if (!resources.bait) {
    diagnostics.push({ level: "debug", message: "no bait path found" });
  } else {
    diagnostics.push({ level: "debug", message: "doing optional bait stats analysis" });
    baitStats = true;
  }

  const decision: AnalysisDecision = Object.freeze({
    targetAlignment,
    rnaMode,
    aligner: rnaMode ? "tophat2" : dna,
    humanSplitAligner: rnaMode ? "tophat2" : legacy,
    humanSplit,
    baitStats,
    altReference,
    spikedPhix: descriptor.spikedPhix,
    pairedEnd: run.pairedEnd
  });

  return { decision, diagnostics };
}
