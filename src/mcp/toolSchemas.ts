import * as z from "zod/v4";

const crockford26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zPassId = z.string().regex(new RegExp(`^pass_${crockford26}$`), "invalid pass_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);
export const zPassStatus = z.enum(["running", "planned", "submitted", "empty", "failed", "blocked"]);

const zAbsolutePath = z.string().min(1).refine((p) => p.startsWith("/"), "must be an absolute path");

export const zRunSelection = z.object({
  samplesheet_path: z.string().min(1),
  id_run: z.number().int().min(1),
  positions: z.array(z.number().int().min(1).max(9999)).max(64).optional(),
  input_path: zAbsolutePath,
  archive_path: zAbsolutePath,
  job_tag: z
    .string()
    .regex(/^[A-Za-z0-9]{1,32}$/, "job_tag must be alphanumeric")
    .optional()
});

export const zDecisionSummary = z.object({
  target_alignment: z.boolean(),
  rna_mode: z.boolean(),
  aligner: z.string(),
  human_split_aligner: z.string(),
  human_split: z.string(),
  bait_stats: z.boolean(),
  alt_reference: z.boolean(),
  spiked_phix: z.boolean(),
  paired_end: z.boolean()
});

export const zTaskSummary = z.object({
  job_index: z.number().int(),
  position: z.number().int(),
  tag_index: z.number().int().nullable(),
  label: z.string(),
  template: z.string(),
  command_sha256: zSha256,
  decision: zDecisionSummary
});

export const zPassProvenance = z.object({
  pass_id: zPassId,
  status: zPassStatus
});

export const zSeqAlignmentPlanInput = zRunSelection;

export const zSeqAlignmentPlanOutput = zPassProvenance.extend({
  id_run: z.number().int(),
  job_name_root: z.string(),
  manifest_root: z.string(),
  array_spec: z.string().nullable(),
  tasks: z.array(zTaskSummary.extend({ command: z.string() }))
});

export const zSeqAlignmentSubmitInput = zRunSelection.extend({
  log_dir: zAbsolutePath.optional(),
  required_job_ids: z.array(z.string().regex(/^\d+$/, "job ids are decimal")).max(64).optional()
});

export const zSeqAlignmentSubmitOutput = zPassProvenance.extend({
  id_run: z.number().int(),
  job_name_root: z.string(),
  job_id: z.string().nullable(),
  job_ids: z.array(z.string()),
  array_spec: z.string().nullable(),
  bsub_command: z.string().nullable(),
  manifest_path: z.string().nullable(),
  manifest_sha256: zSha256.nullable(),
  tasks: z.array(zTaskSummary)
});

export const zSeqAlignmentPassGetInput = z.object({
  pass_id: zPassId,
  include_events: z.boolean().optional()
});

export const zPassEvent = z.object({
  ts: z.string(),
  kind: z.string(),
  message: z.string().nullable(),
  data: z.record(z.string(), z.unknown()).nullable()
});

export const zSeqAlignmentPassGetOutput = z.object({
  pass: z.object({
    pass_id: zPassId,
    tool_name: z.string(),
    id_run: z.number().int(),
    status: zPassStatus,
    params_hash: zSha256,
    config_hash: zSha256,
    job_name_root: z.string().nullable(),
    job_id: z.string().nullable(),
    manifest_path: z.string().nullable(),
    requested_by: z.string().nullable(),
    error: z.string().nullable(),
    created_at: z.string(),
    started_at: z.string().nullable(),
    finished_at: z.string().nullable()
  }),
  result: z.record(z.string(), z.unknown()).nullable(),
  tasks: z.array(zTaskSummary.extend({ decision: z.record(z.string(), z.unknown()) })),
  events: z.array(zPassEvent).optional()
});
