import { describe, it, expect, afterEach } from "vitest";
import path from "path";
import { McpError } from "@modelcontextprotocol/sdk/types.js";
import { PipelineSettings } from "../src/config/settings.js";
import { configInput } from "./builders.js";

describe("PipelineSettings", () => {
  const saved = process.env.REFERENCE_REPOSITORY;

  afterEach(() => {
    if (saved === undefined) delete process.env.REFERENCE_REPOSITORY;
    else process.env.REFERENCE_REPOSITORY = saved;
  });

  it("loads the default config with the repository from the environment", async () => {
    process.env.REFERENCE_REPOSITORY = "/data/repository";
    const settings = await PipelineSettings.loadFromFile(path.resolve("config/default.pipeline.yaml"));
    expect(settings.repositoryRoot()).toBe("/data/repository");
    expect(settings.lsf()).toEqual({
      queue: "normal",
      memory_mb: 32000,
      slots: "12,16",
      hosts: 1,
      fs_resource: null,
      counter_slots_per_job: 4,
      pre_exec: null
    });
    expect(settings.alignmentTools().task_exec_command).toBe("lanealign-task-exec");
    expect(settings.runtimeInstanceId()).toBe("local");
    expect(() => settings.assertToolAllowed("seq_alignment_submit")).not.toThrow();
    expect(() => settings.assertToolAllowed("artifact_import")).toThrow(McpError);
  });

  it("fails when the repository variable is unset", async () => {
    delete process.env.REFERENCE_REPOSITORY;
    await expect(PipelineSettings.loadFromFile(path.resolve("config/default.pipeline.yaml"))).rejects.toThrow(
      /invalid pipeline config/
    );
  });

  it("hashes equal configs identically", () => {
    const a = new PipelineSettings(configInput("/repo"));
    const b = new PipelineSettings({ ...configInput("/repo"), alignment: { ...configInput("/repo").alignment, vtlib_dir: null } });
    const c = new PipelineSettings(configInput("/elsewhere"));
    expect(a.configHash).toBe(b.configHash);
    expect(a.configHash).not.toBe(c.configHash);
    expect(a.configHash).toMatch(/^sha256:[a-f0-9]{64}$/);
  });

  it("rejects malformed slot specifications", () => {
    const bad = configInput("/repo");
    expect(() => new PipelineSettings({ ...bad, lsf: { ...bad.lsf, slots: "many" } })).toThrow(/slots must look like 12 or 12,16/);
  });
});
