import { describe, it, expect } from "vitest";
import { decideAnalysis, hasNewerFlowcell, isRnaLibrary } from "../src/alignment/decision.js";
import { DecisionConflictError } from "../src/core/errors.js";
import { descriptor, resources, runContext } from "./builders.js";

function conflictOf(fn: () => unknown): DecisionConflictError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DecisionConflictError) return e;
    throw e;
  }
  throw new Error("expected a DecisionConflictError");
}

const HUMAN = "Homo_sapiens (GRCh38_15)";

describe("decideAnalysis: human split", () => {
  it("allows at most one split variant", () => {
    const err = conflictOf(() =>
      decideAnalysis(
        descriptor({ referenceGenome: HUMAN, containsNonconsentedXaHuman: true, separateYChromosomeData: true }),
        runContext(),
        resources()
      )
    );
    expect(err.label).toBe("1234_3");
    expect(err.flags).toEqual(["nonconsented_xahuman_split", "separate_y_chromosome"]);
  });

  it("requires a human reference for X/autosome and Y splits", () => {
    const err = conflictOf(() =>
      decideAnalysis(descriptor({ separateYChromosomeData: true }), runContext(), resources())
    );
    expect(err.flags).toEqual(["separate_y_chromosome", "non_human_reference"]);
  });

  it("forbids a human reference for the nonconsented human split", () => {
    const err = conflictOf(() =>
      decideAnalysis(descriptor({ referenceGenome: HUMAN, containsNonconsentedHuman: true, tagIndex: 5 }), runContext(), resources())
    );
    expect(err.label).toBe("1234_3#5");
    expect(err.flags).toEqual(["nonconsented_human_split", "human_reference"]);
  });

  it("selects the variant that is set", () => {
    const human = resources({ reading: { species: "Homo_sapiens", build: "GRCh38_15", transcriptome: null } });
    expect(
      decideAnalysis(descriptor({ referenceGenome: HUMAN, containsNonconsentedXaHuman: true }), runContext(), human).decision
        .humanSplit
    ).toBe("xahuman");
    expect(
      decideAnalysis(descriptor({ referenceGenome: HUMAN, separateYChromosomeData: true }), runContext(), human).decision
        .humanSplit
    ).toBe("yhuman");
    expect(decideAnalysis(descriptor({ containsNonconsentedHuman: true }), runContext(), resources()).decision.humanSplit).toBe(
      "nonconsented"
    );
  });

  it("refuses the nonconsented split on a single end run", () => {
    const err = conflictOf(() =>
      decideAnalysis(descriptor({ containsNonconsentedHuman: true }), runContext({ pairedEnd: false }), resources())
    );
    expect(err.flags).toEqual(["nonconsented_human_split", "single_end_run"]);
  });
});

describe("decideAnalysis: aligner", () => {
  it("uses bwa_aln on old flowcells with short reads", () => {
    const { decision } = decideAnalysis(descriptor(), runContext(), resources());
    expect(decision.aligner).toBe("bwa_aln");
    expect(decision.humanSplitAligner).toBe("bwa_aln");
    expect(decision.targetAlignment).toBe(true);
  });

  it("uses bwa_aln_se on single end runs", () => {
    const { decision } = decideAnalysis(descriptor(), runContext({ pairedEnd: false }), resources());
    expect(decision.aligner).toBe("bwa_aln_se");
    expect(decision.pairedEnd).toBe(false);
  });

  it("switches to bwa_mem for long reads, newer flowcells, GCLP and HiSeq X", () => {
    expect(decideAnalysis(descriptor(), runContext({ readCycleCounts: [101, 101] }), resources()).decision.aligner).toBe(
      "bwa_mem"
    );
    expect(decideAnalysis(descriptor(), runContext({ readCycleCounts: [100, 100] }), resources()).decision.aligner).toBe(
      "bwa_aln"
    );
    expect(decideAnalysis(descriptor(), runContext({ flowcellId: "HCLJTBBXX" }), resources()).decision.aligner).toBe("bwa_mem");
    expect(decideAnalysis(descriptor(), runContext({ gclp: true }), resources()).decision.aligner).toBe("bwa_mem");
    expect(decideAnalysis(descriptor(), runContext({ hiSeqX: true }), resources()).decision.aligner).toBe("bwa_mem");
  });

  it("forces bwa_mem for alt-aware references but keeps the legacy human split aligner", () => {
    const { decision } = decideAnalysis(
      descriptor({ containsNonconsentedHuman: true }),
      runContext(),
      resources({ altReference: true })
    );
    expect(decision.aligner).toBe("bwa_mem");
    expect(decision.humanSplitAligner).toBe("bwa_aln");
    expect(decision.altReference).toBe(true);
  });
});

describe("decideAnalysis: RNA", () => {
  const rnaResources = resources({ transcriptomeIndex: "/tx/mm.known" });

  it("uses tophat2 for RNA libraries with a transcriptome", () => {
    const { decision, diagnostics } = decideAnalysis(descriptor({ libraryType: "RNA PolyA" }), runContext(), rnaResources);
    expect(decision.rnaMode).toBe(true);
    expect(decision.aligner).toBe("tophat2");
    expect(decision.humanSplitAligner).toBe("tophat2");
    expect(diagnostics.map((d) => d.message)).toContain("doing RNA analysis");
  });

  it("falls back to DNA alignment without a transcriptome", () => {
    const { decision, diagnostics } = decideAnalysis(descriptor({ libraryType: "cDNA" }), runContext(), resources());
    expect(decision.rnaMode).toBe(false);
    expect(decision.aligner).toBe("bwa_aln");
    expect(diagnostics[0]).toEqual({ level: "debug", message: "no transcriptome set" });
  });

  it("skips RNA analysis for other species", () => {
    const { decision, diagnostics } = decideAnalysis(
      descriptor({ libraryType: "RNA", referenceGenome: "Danio_rerio (zv9)" }),
      runContext(),
      rnaResources
    );
    expect(decision.rnaMode).toBe(false);
    expect(diagnostics[0]?.message).toBe("not human, mouse, Plasmodium falciparum or Plasmodium berghei, skipping RNA analysis");
  });

  it("does no RNA analysis on single end runs and does not fail", () => {
    const { decision } = decideAnalysis(descriptor({ libraryType: "RNA" }), runContext({ pairedEnd: false }), rnaResources);
    expect(decision.rnaMode).toBe(false);
    expect(decision.aligner).toBe("bwa_aln_se");
  });

  it("recognises RNA library types", () => {
    expect(isRnaLibrary("RNA PolyA")).toBe(true);
    expect(isRnaLibrary("cDNA")).toBe(true);
    expect(isRnaLibrary("DAFT-seq")).toBe(true);
    expect(isRnaLibrary("Standard")).toBe(false);
    expect(isRnaLibrary(null)).toBe(false);
  });
});

describe("decideAnalysis: target alignment and baits", () => {
  it("turns target alignment off when there is no reference", () => {
    const { decision, diagnostics } = decideAnalysis(
      descriptor({ referenceGenome: null }),
      runContext(),
      resources({ reading: null, fasta: null, picard: null, bwa: null, bowtie2: null })
    );
    expect(decision.targetAlignment).toBe(false);
    expect(decision.baitStats).toBe(false);
    expect(diagnostics).toContainEqual({ level: "info", message: "no target reference, skipping target alignment" });
  });

  it("turns target alignment off when alignments are not requested", () => {
    const { decision, diagnostics } = decideAnalysis(descriptor({ alignmentsRequested: false }), runContext(), resources());
    expect(decision.targetAlignment).toBe(false);
    expect(diagnostics).toContainEqual({ level: "info", message: "no alignments requested" });
  });

  it("turns target alignment off with a warning when an index it needs is missing", () => {
    const bait = { name: "exome_v5", intervalsPath: "/baits/exome_v5.interval_list" };
    const { decision, diagnostics } = decideAnalysis(
      descriptor({ baitName: "exome_v5" }),
      runContext(),
      resources({ picard: null, bait })
    );
    expect(decision.targetAlignment).toBe(false);
    expect(decision.baitStats).toBe(false);
    expect(diagnostics).toContainEqual({
      level: "warn",
      message: "no unique picard index for target reference, skipping target alignment",
      data: { missing: "picard" }
    });

    const rna = decideAnalysis(
      descriptor({ libraryType: "RNA PolyA" }),
      runContext(),
      resources({ bowtie2: null, transcriptomeIndex: "/tx/mm.known" })
    );
    expect(rna.decision.rnaMode).toBe(true);
    expect(rna.decision.targetAlignment).toBe(false);
    expect(decideAnalysis(descriptor(), runContext(), resources({ bowtie2: null })).decision.targetAlignment).toBe(true);
  });

  it("does bait stats only with a bait name and an intervals file", () => {
    const bait = { name: "exome_v5", intervalsPath: "/baits/exome_v5.interval_list" };
    expect(decideAnalysis(descriptor({ baitName: "exome_v5" }), runContext(), resources({ bait })).decision.baitStats).toBe(true);
    expect(decideAnalysis(descriptor({ baitName: "exome_v5" }), runContext(), resources()).decision.baitStats).toBe(false);
    expect(decideAnalysis(descriptor(), runContext(), resources({ bait })).decision.baitStats).toBe(false);
  });

  it("returns a frozen decision", () => {
    const { decision } = decideAnalysis(descriptor(), runContext(), resources());
    expect(Object.isFrozen(decision)).toBe(true);
  });
});

describe("hasNewerFlowcell", () => {
  it("matches HiSeq V4 and later flowcell ids", () => {
    expect(hasNewerFlowcell("C6AUPANXX")).toBe(true);
    expect(hasNewerFlowcell("HCLJTBBXX")).toBe(true);
    expect(hasNewerFlowcell("C0TEVACXX")).toBe(false);
    expect(hasNewerFlowcell("")).toBe(false);
  });
});
