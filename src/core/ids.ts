import { ulid } from "ulid";
import { createHash } from "crypto";
import { encodeCrockfordBase32_128bits } from "./canonicalJson.js";

export type PassId = `pass_${string}`;

export function derivePassIdFromParts(parts: string[]): PassId {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  const digest = h.digest();
  const first16 = digest.subarray(0, 16);
  return `pass_${encodeCrockfordBase32_128bits(first16)}`;
}

// Time-ordered and unique per call; used to keep job names of concurrent passes apart.
export function newJobTag(): string {
  return ulid();
}

export function jobNameRoot(stage: string, idRun: number, jobTag: string): string {
  return [stage, String(idRun), jobTag].join("_");
}
