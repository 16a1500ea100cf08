import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { StructuralInputError } from "../core/errors.js";
import type { LaneMetadata, LaneOrPlexDescriptor, MetadataProvider, RunContext } from "./descriptor.js";

const zSampleAttributes = z.object({
  library_type: z.string().nullable().default(null),
  reference_genome: z.string().nullable().default(null),
  contains_nonconsented_xahuman: z.boolean().default(false),
  separate_y_chromosome_data: z.boolean().default(false),
  contains_nonconsented_human: z.boolean().default(false),
  alignments_in_bam: z.boolean().default(true),
  bait_name: z.string().nullable().default(null)
});

const zPlex = zSampleAttributes.extend({
  tag_index: z.number().int().min(0)
});

const zLane = zSampleAttributes.extend({
  position: z.number().int(),
  is_pool: z.boolean().default(false),
  spiked_phix_tag_index: z.number().int().min(0).nullable().default(null),
  tag_indices: z.array(z.number().int().min(0)).optional(),
  plexes: z.array(zPlex).default([])
});

export const zSamplesheet = z.object({
  id_run: z.number().int().min(1),
  run: z.object({
    paired_end: z.boolean(),
    indexed: z.boolean().default(true),
    gclp: z.boolean().default(false),
    hiseqx: z.boolean().default(false),
    flowcell_id: z.string().default(""),
    read_cycle_counts: z.array(z.number().int().min(0)).default([]),
    resources: z
      .object({
        slots: z.string().regex(/^\d+(,\d+)?$/).optional(),
        memory_mb: z.number().int().min(1).optional()
      })
      .optional()
  }),
  lanes: z.array(zLane)
});

export type Samplesheet = z.output<typeof zSamplesheet>;
export type SamplesheetInput = z.input<typeof zSamplesheet>;
type SampleAttributes = z.output<typeof zSampleAttributes>;

function toDescriptor(
  idRun: number,
  position: number,
  tagIndex: number | null,
  isPool: boolean,
  spikedPhix: boolean,
  attrs: SampleAttributes
): LaneOrPlexDescriptor {
  return Object.freeze({
    idRun,
    position,
    tagIndex,
    libraryType: attrs.library_type,
    referenceGenome: attrs.reference_genome,
    isPool,
    containsNonconsentedXaHuman: attrs.contains_nonconsented_xahuman,
    separateYChromosomeData: attrs.separate_y_chromosome_data,
    containsNonconsentedHuman: attrs.contains_nonconsented_human,
    spikedPhix,
    alignmentsRequested: attrs.alignments_in_bam,
    baitName: attrs.bait_name
  });
}

/**
 * Metadata provider backed by a samplesheet document (YAML or JSON) exported
 * from the laboratory information system.
 */
export class SamplesheetMetadataProvider implements MetadataProvider {
  private readonly sheet: Samplesheet;

  constructor(input: SamplesheetInput | unknown) {
    const parsed = zSamplesheet.safeParse(input);
    if (!parsed.success) {
      throw new StructuralInputError(`invalid samplesheet: ${z.prettifyError(parsed.error)}`);
    }
    this.sheet = parsed.data;
  }

  static parseText(raw: string): SamplesheetMetadataProvider {
    let doc: unknown;
    try {
      doc = YAML.parse(raw);
    } catch (e) {
      throw new StructuralInputError(`unparsable samplesheet: ${e instanceof Error ? e.message : String(e)}`);
    }
    return new SamplesheetMetadataProvider(doc);
  }

  static async loadFromFile(filePath: string): Promise<SamplesheetMetadataProvider> {
    return SamplesheetMetadataProvider.parseText(await fs.readFile(filePath, "utf8"));
  }

  private assertRun(idRun: number): void {
    if (idRun !== this.sheet.id_run) {
      throw new StructuralInputError(`samplesheet is for run ${this.sheet.id_run}, not ${idRun}`);
    }
  }

  async runContext(idRun: number): Promise<RunContext> {
    this.assertRun(idRun);
    const run = this.sheet.run;
    const resources: { slots?: string; memoryMb?: number } = {};
    if (run.resources?.slots !== undefined) resources.slots = run.resources.slots;
    if (run.resources?.memory_mb !== undefined) resources.memoryMb = run.resources.memory_mb;

    return {
      idRun,
      pairedEnd: run.paired_end,
      indexed: run.indexed,
      gclp: run.gclp,
      hiSeqX: run.hiseqx,
      flowcellId: run.flowcell_id,
      readCycleCounts: [...run.read_cycle_counts],
      resources
    };
  }

  async positions(idRun: number): Promise<number[]> {
    this.assertRun(idRun);
    return this.sheet.lanes.map((l) => l.position).sort((a, b) => a - b);
  }

  async lane(idRun: number, position: number): Promise<LaneMetadata | null> {
    this.assertRun(idRun);
    const lane = this.sheet.lanes.find((l) => l.position === position);
    if (!lane) return null;

    const spikeTag = lane.is_pool ? lane.spiked_phix_tag_index : null;
    const plexes = new Map<number, LaneOrPlexDescriptor>();
    for (const p of lane.plexes) {
      if (plexes.has(p.tag_index)) {
        throw new StructuralInputError(`duplicate tag index ${p.tag_index} in lane ${position}`);
      }
      plexes.set(p.tag_index, toDescriptor(idRun, position, p.tag_index, false, spikeTag === p.tag_index, p));
    }

    const tagIndices = lane.tag_indices
      ? [...new Set(lane.tag_indices)].sort((a, b) => a - b)
      : [...plexes.keys()].sort((a, b) => a - b);

    return {
      lane: toDescriptor(idRun, position, null, lane.is_pool, false, lane),
      isPool: lane.is_pool,
      spikedPhixTagIndex: spikeTag,
      tagIndices,
      plexes
    };
  }
}
