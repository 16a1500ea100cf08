import type { Diagnostic } from "../core/diagnostics.js";
import { ResourceResolutionError } from "../core/errors.js";
import type { LaneOrPlexDescriptor } from "../lims/descriptor.js";
import {
  parseReferenceGenome,
  type ReferenceKind,
  type ReferenceReading,
  type ReferenceResolver,
  type ResolveOutcome
} from "./resolver.js";

export interface DescriptorResources {
  reading: ReferenceReading | null;
  fasta: string | null;
  picard: string | null;
  bwa: string | null;
  bowtie2: string | null;
  transcriptomeIndex: string | null;
  bait: { name: string; intervalsPath: string } | null;
  altReference: boolean;
  diagnostics: Diagnostic[];
}

function outcomeToPath(outcome: ResolveOutcome, diagnostics: Diagnostic[] | null): string | null {
  switch (outcome.status) {
    case "resolved":
      diagnostics?.push({ level: "info", message: `${outcome.context}: ${outcome.path}` });
      return outcome.path;
    case "none":
      diagnostics?.push({ level: "warn", message: `no ${outcome.context}` });
      return null;
    case "ambiguous":
      diagnostics?.push({
        level: "error",
        message: `multiple candidates for ${outcome.context}`,
        data: { candidates: outcome.candidates }
      });
      return null;
    case "failed":
      diagnostics?.push({ level: "error", message: `error resolving ${outcome.context}: ${outcome.error}` });
      return null;
  }
}

/**
 * Runs every repository lookup one lane/plex can need. Lookups that come up
 * empty or ambiguous are reported as diagnostics and leave the field null.
 * Picard, bwa and bowtie2 indices are looked up quietly: which of them matter
 * depends on the decision (see targetReferences).
 */
export async function resolveDescriptorResources(
  descriptor: LaneOrPlexDescriptor,
  resolver: ReferenceResolver
): Promise<DescriptorResources> {
  const diagnostics: Diagnostic[] = [];
  const empty: DescriptorResources = {
    reading: null,
    fasta: null,
    picard: null,
    bwa: null,
    bowtie2: null,
    transcriptomeIndex: null,
    bait: null,
    altReference: false,
    diagnostics
  };

  const reading = parseReferenceGenome(descriptor.referenceGenome);
  if (!reading) {
    diagnostics.push({
      level: "warn",
      message: descriptor.referenceGenome
        ? `unparsable reference genome "${descriptor.referenceGenome}"`
        : "no reference genome set"
    });
    return empty;
  }

  const lookup = (kind: ReferenceKind) => resolver.resolve({ species: reading.species, build: reading.build, kind });

  const fasta = outcomeToPath(await lookup("fasta"), diagnostics);
  const picard = outcomeToPath(await lookup("picard"), null);
  const bwa = outcomeToPath(await lookup("bwa0_6"), null);
  const bowtie2 = outcomeToPath(await lookup("bowtie2"), null);
  const altReference = bwa !== null && (await resolver.exists(`${bwa}.alt`));

  let transcriptomeIndex: string | null = null;
  if (reading.transcriptome) {
    transcriptomeIndex = outcomeToPath(
      await resolver.transcriptomeIndex({ species: reading.species, transcriptome: reading.transcriptome }),
      diagnostics
    );
  }

  let bait: DescriptorResources["bait"] = null;
  if (descriptor.baitName) {
    const intervalsPath = outcomeToPath(
      await resolver.baitIntervals({ baitName: descriptor.baitName, build: reading.build }),
      diagnostics
    );
    if (intervalsPath) bait = { name: descriptor.baitName, intervalsPath };
  }

  return { reading, fasta, picard, bwa, bowtie2, transcriptomeIndex, bait, altReference, diagnostics };
}

export type TargetReferences =
  | { status: "complete"; fasta: string; picard: string; alignmentIndex: string }
  | { status: "incomplete"; missing: ReferenceKind };

/**
 * The references target alignment reads: the fasta, its picard dictionary
 * and the aligner index for the mode (bowtie2 for RNA, bwa otherwise).
 */
export function targetReferences(resources: DescriptorResources, rnaMode: boolean): TargetReferences {
  const { fasta, picard } = resources;
  if (fasta === null) return { status: "incomplete", missing: "fasta" };
  if (picard === null) return { status: "incomplete", missing: "picard" };
  const alignmentIndex = rnaMode ? resources.bowtie2 : resources.bwa;
  if (alignmentIndex === null) return { status: "incomplete", missing: rnaMode ? "bowtie2" : "bwa0_6" };
  return { status: "complete", fasta, picard, alignmentIndex };
}

const DEFAULT_BUILD = "default";

/**
 * References every task shares regardless of its own species: the PhiX
 * spike-in and the default human assembly used for human read splitting.
 * Looked up once per pass.
 */
export class FixedReferences {
  private readonly cache = new Map<string, string>();

  constructor(private readonly resolver: ReferenceResolver) {}

  private async fixed(species: string, kind: ReferenceKind, requiredBy: string): Promise<string> {
    const key = `${species}/${kind}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const outcome = await this.resolver.resolve({ species, build: DEFAULT_BUILD, kind });
    if (outcome.status !== "resolved") {
      throw new ResourceResolutionError(
        `cannot resolve default ${kind} reference for ${species} (${outcome.status}), required by ${requiredBy}`
      );
    }
    this.cache.set(key, outcome.path);
    return outcome.path;
  }

  phixFasta(): Promise<string> {
    return this.fixed("PhiX", "fasta", "phiX spike-in split");
  }

  humanSplit(kind: ReferenceKind, requiredBy: string): Promise<string> {
    return this.fixed("Homo_sapiens", kind, requiredBy);
  }
}
