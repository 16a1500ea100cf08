import { describe, it, expect } from "vitest";
import { qcCommand } from "../src/alignment/qc.js";
import { CommandChain, ShellCommand, ShellWord, bashSingleQuote } from "../src/alignment/shell.js";
import { descriptor } from "./builders.js";

describe("ShellWord", () => {
  it("leaves safe literals bare and single-quotes the rest", () => {
    expect(ShellWord.literal("/a/b-c_d.fa").render()).toBe("/a/b-c_d.fa");
    expect(ShellWord.literal("1234_3#2").render()).toBe("'1234_3#2'");
    expect(ShellWord.literal("it's").render()).toBe(`'it'"'"'s'`);
    expect(ShellWord.literal("").render()).toBe("''");
  });

  it("emits env references and substitutions double-quoted", () => {
    expect(ShellWord.env("LSB_JOBID").render()).toBe('"${LSB_JOBID}"');
    expect(ShellWord.subst("which vtfp.pl").render()).toBe('"$(which vtfp.pl)"');
    expect(ShellWord.concat("/a/tmp_", ShellWord.env("LSB_JOBID"), "/1234_3").render()).toBe(
      '/a/tmp_"${LSB_JOBID}"/1234_3'
    );
  });

  it("rejects invalid variable names", () => {
    expect(() => ShellWord.env("1BAD")).toThrow("invalid env var name: 1BAD");
  });

  it("quotes a value exactly once however it is built", () => {
    expect(bashSingleQuote("a b")).toBe("'a b'");
    expect(new ShellCommand("echo", "a b", 3).render()).toBe("echo 'a b' 3");
  });
});

describe("CommandChain", () => {
  it("joins with && and ; and ignores the first separator", () => {
    const chain = new CommandChain()
      .always(new ShellCommand("mkdir", "-p", "/x"))
      .always(new ShellCommand("cd", "/x"))
      .then(new ShellCommand("true").redirectStdout("out.json"));
    expect(chain.render()).toBe("mkdir -p /x ; cd /x && true > out.json");
    expect(chain.commands()).toHaveLength(3);
  });
});

describe("qcCommand", () => {
  it("renders bam_flagstats for a plex with sorted arguments", () => {
    const cmd = qcCommand({
      check: "bam_flagstats",
      descriptor: descriptor({ tagIndex: 2 }),
      isPlex: true,
      qcIn: "/arch/lane3",
      qcOut: "/arch/lane3/qc",
      subset: "phix"
    });
    expect(cmd.render()).toBe(
      "qc --check bam_flagstats --id_run 1234 --position 3 --qc_in /arch/lane3 --qc_out /arch/lane3/qc --subset phix --tag_index 2"
    );
  });

  it("reads alignment filter metrics from the working directory", () => {
    const cmd = qcCommand({ check: "alignment_filter_metrics", descriptor: descriptor(), isPlex: false, qcOut: "/arch/qc" });
    expect(cmd.render()).toBe('qc --check alignment_filter_metrics --id_run 1234 --position 3 --qc_in "${PWD}" --qc_out /arch/qc');
  });

  it("requires qc_in for flagstats", () => {
    expect(() => qcCommand({ check: "bam_flagstats", descriptor: descriptor(), isPlex: false, qcOut: "/q" })).toThrow(
      "bam_flagstats qc needs qc_in"
    );
  });
});
