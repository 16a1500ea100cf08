import { promises as fs } from "fs";
import path from "path";
import { ulid } from "ulid";
import * as z from "zod/v4";
import { sha256Prefixed } from "../core/canonicalJson.js";
import { StructuralInputError, TaskResolutionError } from "../core/errors.js";
import { parseJobIndex, type JobIndex } from "./jobIndex.js";

const zManifestFile = z.record(z.string().regex(/^[1-9]\d*$/, "manifest keys must be array indices"), z.string().min(1));

export const MANIFEST_EXTENSION = ".json";

/**
 * Array index to task command for one generation pass.
 */
export class ArgumentManifest {
  private readonly entries = new Map<JobIndex, string>();

  set(index: JobIndex, command: string): void {
    if (this.entries.has(index)) {
      throw new StructuralInputError(`duplicate job index ${index}`);
    }
    if (!command) throw new StructuralInputError(`empty command for job index ${index}`);
    this.entries.set(index, command);
  }

  get(index: JobIndex): string | undefined {
    return this.entries.get(index);
  }

  get size(): number {
    return this.entries.size;
  }

  indices(): JobIndex[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }

  toJSON(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const index of this.indices()) {
      const command = this.entries.get(index);
      if (command !== undefined) out[String(index)] = command;
    }
    return out;
  }

  serialize(): string {
    return JSON.stringify(this.toJSON());
  }

  static parse(text: string): ArgumentManifest {
    const parsed = zManifestFile.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new TaskResolutionError(`invalid argument manifest: ${z.prettifyError(parsed.error)}`);
    }
    const manifest = new ArgumentManifest();
    for (const [key, command] of Object.entries(parsed.data)) {
      const index = parseJobIndex(key);
      if (index === null) throw new TaskResolutionError(`invalid argument manifest key: ${key}`);
      manifest.set(index, command);
    }
    return manifest;
  }
}

/**
 * `<manifestRoot>_<jobId>.json`; manifestRoot is the input directory joined
 * with the pass's job name root. Task wrappers rebuild this name from the
 * scheduler job id in their environment.
 */
export function manifestPath(manifestRoot: string, jobId: string): string {
  if (!/^\d+$/.test(jobId)) throw new Error(`invalid scheduler job id: ${jobId}`);
  return `${manifestRoot}_${jobId}${MANIFEST_EXTENSION}`;
}

export interface WrittenManifest {
  path: string;
  sha256: `sha256:${string}`;
  entries: number;
}

async function syncDirectory(dir: string): Promise<void> {
  const handle = await fs.open(dir, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

// Written next to its final name and renamed into place, so a reader sees either no file or the whole manifest.
export async function writeArgumentManifest(
  manifestRoot: string,
  jobId: string,
  manifest: ArgumentManifest
): Promise<WrittenManifest> {
  const target = manifestPath(manifestRoot, jobId);
  const text = manifest.serialize();
  await fs.mkdir(path.dirname(target), { recursive: true });

  const tmp = `${target}.${ulid()}.tmp`;
  const handle = await fs.open(tmp, "wx");
  try {
    await handle.writeFile(text, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fs.rename(tmp, target);
  await syncDirectory(path.dirname(target));

  return { path: target, sha256: sha256Prefixed(text), entries: manifest.size };
}

export async function readArgumentManifest(filePath: string): Promise<ArgumentManifest> {
  const text = await fs.readFile(filePath, "utf8");
  return ArgumentManifest.parse(text);
}

export function lookupTaskCommand(manifest: ArgumentManifest, index: JobIndex): string {
  const command = manifest.get(index);
  if (command === undefined) {
    throw new TaskResolutionError(`no command for array index ${index}`);
  }
  return command;
}
