import { spawn } from "child_process";
import { TaskResolutionError } from "../core/errors.js";
import { lookupTaskCommand, manifestPath, readArgumentManifest } from "../scheduler/argumentStore.js";
import { parseJobIndex } from "../scheduler/jobIndex.js";

export const JOB_ID_ENV = "LSB_JOBID";
export const JOB_INDEX_ENV = "LSB_JOBINDEX";

export type TaskRunner = (script: string, env: NodeJS.ProcessEnv) => Promise<number>;

export const bashRunner: TaskRunner = async (script, env) => {
  const child = spawn("bash", ["-c", script], { env, stdio: "inherit" });
  return new Promise<number>((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (signal) reject(new Error(`task command killed by ${signal}`));
      else resolve(code ?? 0);
    });
  });
};

export interface ArrayTaskInput {
  manifestRoot: string;
  env: NodeJS.ProcessEnv;
  runner?: TaskRunner;
}

export interface ArrayTaskOutcome {
  jobId: string;
  jobIndex: number;
  manifestPath: string;
  exitCode: number;
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) throw new TaskResolutionError(`${name} is not set`);
  return value;
}

/**
 * Runs inside one array task: finds this task's command in the pass's
 * argument manifest and executes it.
 */
export async function runArrayTask(input: ArrayTaskInput): Promise<ArrayTaskOutcome> {
  const jobId = requireEnv(input.env, JOB_ID_ENV);
  if (!/^\d+$/.test(jobId)) throw new TaskResolutionError(`${JOB_ID_ENV} is not a job id: ${jobId}`);

  const rawIndex = requireEnv(input.env, JOB_INDEX_ENV);
  const jobIndex = parseJobIndex(rawIndex);
  if (jobIndex === null) {
    throw new TaskResolutionError(`${JOB_INDEX_ENV} is not an array index: ${rawIndex}`);
  }

  const file = manifestPath(input.manifestRoot, jobId);
  const manifest = await readArgumentManifest(file);
  const script = lookupTaskCommand(manifest, jobIndex);

  const runner = input.runner ?? bashRunner;
  const exitCode = await runner(script, input.env);
  return { jobId, jobIndex, manifestPath: file, exitCode };
}
