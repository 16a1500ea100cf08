import path from "path";
import type { AlignmentToolsConfig, LsfConfig } from "../config/settings.js";
import type { RunContext } from "../lims/descriptor.js";
import { ShellCommand, ShellWord } from "../alignment/shell.js";
import { formatArraySpec, type JobIndex } from "./jobIndex.js";

export interface SubmissionRequest {
  queue: string;
  hold: boolean;
  preExec: string | null;
  resourceArgs: string[];
  dependency: string | null;
  jobName: string;
  arraySpec: string;
  indices: JobIndex[];
  outputLog: string;
  command: string;
}

export interface BuildSubmissionInput {
  lsf: LsfConfig;
  tools: AlignmentToolsConfig;
  run: RunContext;
  jobNameRoot: string;
  indices: JobIndex[];
  logDir: string;
  manifestRoot: string;
  requiredJobIds?: string[];
  hold?: boolean;
}

export function memorySpec(memoryMb: number): string[] {
  return ["-M", String(memoryMb), "-R", `select[mem>${memoryMb}] rusage[mem=${memoryMb}]`];
}

export function dependencyExpression(jobIds: string[]): string | null {
  if (jobIds.length === 0) return null;
  for (const id of jobIds) {
    if (!/^\d+$/.test(id)) throw new Error(`invalid dependency job id: ${id}`);
  }
  return jobIds.map((id) => `done(${id})`).join(" && ");
}

/**
 * Command every array task runs. It carries no per-task data: the wrapper
 * finds its own command in the argument manifest from LSB_JOBID and
 * LSB_JOBINDEX at run time.
 */
export function wrapperCommand(tools: AlignmentToolsConfig, manifestRoot: string): ShellCommand {
  return new ShellCommand(tools.task_exec_command, "--manifest-root", ShellWord.literal(manifestRoot));
}

export function buildSubmission(input: BuildSubmissionInput): SubmissionRequest {
  if (input.indices.length === 0) {
    throw new Error("cannot build a submission without job indices");
  }
  const { lsf, run } = input;
  const memoryMb = run.resources?.memoryMb ?? lsf.memory_mb;
  const slots = run.resources?.slots ?? lsf.slots;

  const resourceArgs = [...memorySpec(memoryMb), "-R", `span[hosts=${lsf.hosts}]`, "-n", slots];
  if (lsf.fs_resource) {
    resourceArgs.push("-R", `rusage[${lsf.fs_resource}=${lsf.counter_slots_per_job}]`);
  }

  const indices = [...input.indices].sort((a, b) => a - b);
  const arraySpec = formatArraySpec(indices);

  return {
    queue: lsf.queue,
    hold: input.hold ?? true,
    preExec: lsf.pre_exec,
    resourceArgs,
    dependency: dependencyExpression(input.requiredJobIds ?? []),
    jobName: `${input.jobNameRoot}${arraySpec}`,
    arraySpec,
    indices,
    outputLog: path.join(input.logDir, `${input.jobNameRoot}.%I.%J.out`),
    command: wrapperCommand(input.tools, input.manifestRoot).render()
  };
}

export function bsubArgv(request: SubmissionRequest): string[] {
  const argv: string[] = [];
  if (request.hold) argv.push("-H");
  argv.push("-q", request.queue);
  if (request.preExec) argv.push("-E", request.preExec);
  argv.push(...request.resourceArgs);
  if (request.dependency) argv.push("-w", request.dependency);
  argv.push("-J", request.jobName, "-o", request.outputLog, request.command);
  return argv;
}

// For logs and dry runs; the scheduler client passes bsubArgv() without a shell.
export function renderSubmission(request: SubmissionRequest): string {
  return new ShellCommand("bsub").args(bsubArgv(request)).render();
}
