import type { LaneOrPlexDescriptor } from "../lims/descriptor.js";
import { ShellCommand, ShellWord, type Arg } from "./shell.js";

export const QC_SCRIPT_NAME = "qc";

export type QcCheck = "bam_flagstats" | "alignment_filter_metrics";

export interface QcCommandInput {
  check: QcCheck;
  descriptor: LaneOrPlexDescriptor;
  isPlex: boolean;
  qcOut: string;
  // bam_flagstats only; alignment_filter_metrics reads from the task's working directory.
  qcIn?: string;
  subset?: string | null;
}

/**
 * `qc` invocation for one output subset. Arguments are emitted sorted by
 * name so identical inputs always render identically.
 */
export function qcCommand(input: QcCommandInput): ShellCommand {
  const { check, descriptor } = input;
  const args = new Map<string, Arg>();
  args.set("id_run", descriptor.idRun);
  args.set("position", descriptor.position);
  if (input.isPlex && descriptor.tagIndex !== null) {
    args.set("tag_index", descriptor.tagIndex);
  }

  if (check === "bam_flagstats") {
    if (input.subset) args.set("subset", input.subset);
    if (input.qcIn === undefined) throw new Error("bam_flagstats qc needs qc_in");
    args.set("qc_in", input.qcIn);
  } else {
    args.set("qc_in", ShellWord.env("PWD"));
  }
  args.set("qc_out", input.qcOut);
  args.set("check", check);

  const cmd = new ShellCommand(QC_SCRIPT_NAME);
  for (const name of [...args.keys()].sort()) {
    const value = args.get(name);
    if (value === undefined) continue;
    cmd.arg(`--${name}`, value);
  }
  return cmd;
}
