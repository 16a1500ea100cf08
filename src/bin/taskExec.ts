#!/usr/bin/env node
import { runArrayTask } from "../taskExec/runArrayTask.js";

function usage(): string {
  return ["usage:", "  lanealign-task-exec --manifest-root <input dir>/<job name root>", ""].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const manifestRoot = args["manifest-root"];
  if (typeof manifestRoot !== "string") {
    throw new Error(`--manifest-root is required\n${usage()}`);
  }

  const outcome = await runArrayTask({ manifestRoot, env: process.env });
  if (outcome.exitCode !== 0) {
    console.error(`task ${outcome.jobId}[${outcome.jobIndex}] failed (exit ${outcome.exitCode})`);
  }
  process.exitCode = outcome.exitCode;
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
