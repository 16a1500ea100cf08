import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { derivePassIdFromParts, type PassId } from "../core/ids.js";

export interface PassIdentityInput {
  toolName: string;
  contractVersion: string;
  configHash: `sha256:${string}`;
  canonicalParams: unknown;
}

export function deriveCanonicalParamsHash(canonicalParams: unknown): `sha256:${string}` {
  return sha256Prefixed(stableJsonStringify(canonicalParams));
}

export function derivePassId(input: PassIdentityInput): { passId: PassId; paramsHash: `sha256:${string}` } {
  const paramsHash = deriveCanonicalParamsHash(input.canonicalParams);
  const passId = derivePassIdFromParts([
    `tool=${input.toolName}`,
    `contract=${input.contractVersion}`,
    `config=${input.configHash}`,
    `params=${paramsHash}`
  ]);
  return { passId, paramsHash };
}
