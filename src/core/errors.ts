import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

export type ConflictFlag =
  | "nonconsented_xahuman_split"
  | "separate_y_chromosome"
  | "nonconsented_human_split"
  | "human_reference"
  | "non_human_reference"
  | "single_end_run"
  | "rna_analysis";

/**
 * Mutually exclusive or incompatible analysis settings on one lane/plex.
 * Aborts the whole generation pass before anything is submitted.
 */
export class DecisionConflictError extends McpError {
  constructor(
    message: string,
    readonly label: string,
    readonly flags: ConflictFlag[]
  ) {
    super(ErrorCode.InvalidParams, `${message} (${label})`, { label, flags });
    this.name = "DecisionConflictError";
  }
}

export class StructuralInputError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InvalidParams, message);
    this.name = "StructuralInputError";
  }
}

// A reference every task depends on (PhiX, default human split) is missing.
export class ResourceResolutionError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InvalidRequest, message);
    this.name = "ResourceResolutionError";
  }
}

export class TaskResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskResolutionError";
  }
}
