import { spawnSync } from "child_process";
import { bsubArgv, type SubmissionRequest } from "./submission.js";

export interface SchedulerSubmitResult {
  jobId: string;
  stdout: string;
  stderr: string;
}

export interface SchedulerClient {
  submit(request: SubmissionRequest): Promise<SchedulerSubmitResult>;
  // Lets a held submission start; called once its argument manifest is on disk.
  release(jobId: string): Promise<void>;
  cancel(jobId: string): Promise<void>;
}

export function parseBsubJobId(output: string): string | null {
  const m = /Job <(\d+)> is submitted/.exec(output);
  return m && m[1] ? m[1] : null;
}

function run(command: string, args: string[]): { stdout: string; stderr: string } {
  const res = spawnSync(command, args, { stdio: ["ignore", "pipe", "pipe"] });
  const stdout = res.stdout ? res.stdout.toString("utf8") : "";
  const stderr = res.stderr ? res.stderr.toString("utf8") : "";

  if (res.error) {
    throw res.error;
  }
  if (res.status !== 0) {
    throw new Error(`${command} failed (exit ${res.status})${stderr ? `: ${stderr.trim()}` : ""}`);
  }
  return { stdout, stderr };
}

export class LsfSchedulerClient implements SchedulerClient {
  async submit(request: SubmissionRequest): Promise<SchedulerSubmitResult> {
    const { stdout, stderr } = run("bsub", bsubArgv(request));
    const jobId = parseBsubJobId(stdout) ?? parseBsubJobId(stderr);
    if (!jobId) {
      throw new Error(`unable to parse bsub job id from output: ${stdout || stderr}`);
    }
    return { jobId, stdout, stderr };
  }

  async release(jobId: string): Promise<void> {
    run("bresume", [jobId]);
  }

  async cancel(jobId: string): Promise<void> {
    run("bkill", [jobId]);
  }
}
