import { promises as fs } from "fs";
import path from "path";

export type ReferenceKind = "fasta" | "picard" | "bwa0_6" | "bowtie2";

export interface ReferenceQuery {
  species: string;
  build: string;
  kind: ReferenceKind;
}

export type ResolveOutcome =
  | { status: "resolved"; path: string; context: string }
  | { status: "none"; context: string }
  | { status: "ambiguous"; candidates: string[]; context: string }
  | { status: "failed"; error: string; context: string };

export interface ReferenceResolver {
  resolve(query: ReferenceQuery): Promise<ResolveOutcome>;
  transcriptomeIndex(query: { species: string; transcriptome: string }): Promise<ResolveOutcome>;
  baitIntervals(query: { baitName: string; build: string }): Promise<ResolveOutcome>;
  exists(filePath: string): Promise<boolean>;
}

export interface ReferenceReading {
  species: string;
  build: string;
  transcriptome: string | null;
}

// "Homo_sapiens (GRCh38_15 + ensembl_75_transcriptome)"
const REFERENCE_GENOME_RE = /^\s*(\S+)\s+\(\s*([^)+\s]+)\s*(?:\+\s*([^)\s]+)\s*)?\)\s*$/;

export function parseReferenceGenome(value: string | null): ReferenceReading | null {
  if (!value) return null;
  const m = REFERENCE_GENOME_RE.exec(value);
  if (!m || !m[1] || !m[2]) return null;
  return { species: m[1], build: m[2], transcriptome: m[3] ?? null };
}

const KIND_SUFFIXES: Record<ReferenceKind, { suffixes: string[]; strip: boolean }> = {
  fasta: { suffixes: [".fa", ".fasta", ".fna"], strip: false },
  picard: { suffixes: [".dict"], strip: true },
  bwa0_6: { suffixes: [".bwt"], strip: true },
  bowtie2: { suffixes: [".1.bt2"], strip: true }
};

function isMissing(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}

async function matchOne(dir: string, suffixes: string[], strip: boolean, context: string): Promise<ResolveOutcome> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (e) {
    if (isMissing(e)) return { status: "none", context };
    return { status: "failed", error: e instanceof Error ? e.message : String(e), context };
  }

  const matches: string[] = [];
  for (const name of names.sort()) {
    const suffix = suffixes.find((s) => name.endsWith(s) && name.length > s.length);
    if (!suffix) continue;
    const full = path.join(dir, name);
    matches.push(strip ? full.slice(0, -suffix.length) : full);
  }

  const first = matches[0];
  if (first === undefined) return { status: "none", context };
  if (matches.length > 1) return { status: "ambiguous", candidates: matches, context };
  return { status: "resolved", path: first, context };
}

/**
 * Reference repository laid out as
 *   references/<Species>/<build>/all/<kind>/
 *   transcriptomes/<Species>/<transcriptome>/tophat2/
 *   baits/<bait name>/<build>/
 */
export class RepositoryReferenceResolver implements ReferenceResolver {
  constructor(private readonly repositoryRoot: string) {}

  async resolve(query: ReferenceQuery): Promise<ResolveOutcome> {
    const dir = path.join(this.repositoryRoot, "references", query.species, query.build, "all", query.kind);
    const { suffixes, strip } = KIND_SUFFIXES[query.kind];
    return matchOne(dir, suffixes, strip, `${query.kind} reference for ${query.species} ${query.build}`);
  }

  async transcriptomeIndex(query: { species: string; transcriptome: string }): Promise<ResolveOutcome> {
    const dir = path.join(this.repositoryRoot, "transcriptomes", query.species, query.transcriptome, "tophat2");
    const outcome = await matchOne(dir, [".known.1.bt2"], true, `transcriptome ${query.transcriptome} for ${query.species}`);
    return outcome.status === "resolved" ? { ...outcome, path: `${outcome.path}.known` } : outcome;
  }

  async baitIntervals(query: { baitName: string; build: string }): Promise<ResolveOutcome> {
    const dir = path.join(this.repositoryRoot, "baits", query.baitName, query.build);
    return matchOne(dir, [".interval_list"], false, `bait ${query.baitName} for ${query.build}`);
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
