export interface LaneOrPlexDescriptor {
  readonly idRun: number;
  readonly position: number;
  readonly tagIndex: number | null;
  readonly libraryType: string | null;
  readonly referenceGenome: string | null;
  readonly isPool: boolean;
  readonly containsNonconsentedXaHuman: boolean;
  readonly separateYChromosomeData: boolean;
  readonly containsNonconsentedHuman: boolean;
  readonly spikedPhix: boolean;
  readonly alignmentsRequested: boolean;
  readonly baitName: string | null;
}

export interface LaneMetadata {
  lane: LaneOrPlexDescriptor;
  isPool: boolean;
  spikedPhixTagIndex: number | null;
  tagIndices: number[];
  plexes: Map<number, LaneOrPlexDescriptor>;
}

export interface RunContext {
  readonly idRun: number;
  readonly pairedEnd: boolean;
  readonly indexed: boolean;
  readonly gclp: boolean;
  readonly hiSeqX: boolean;
  readonly flowcellId: string;
  readonly readCycleCounts: readonly number[];
  readonly resources?: {
    readonly slots?: string;
    readonly memoryMb?: number;
  };
}

export interface MetadataProvider {
  runContext(idRun: number): Promise<RunContext>;
  positions(idRun: number): Promise<number[]>;
  lane(idRun: number, position: number): Promise<LaneMetadata | null>;
}

export function descriptorLabel(d: Pick<LaneOrPlexDescriptor, "idRun" | "position" | "tagIndex">): string {
  const base = `${d.idRun}_${d.position}`;
  return d.tagIndex === null ? base : `${base}#${d.tagIndex}`;
}

/**
 * Tag 0 holds the reads that did not match any tag in the pool. It is
 * analysed with the lane's own settings when the metadata has no entry for it.
 */
export function tagZeroFromLane(lane: LaneOrPlexDescriptor): LaneOrPlexDescriptor {
  return { ...lane, tagIndex: 0, spikedPhix: false };
}
