import type { AuditFailure } from "../core/errors.js";
import type { AuditRecord } from "./audit.js";
import type { CaptureStrategyName } from "./config.js";

/**
 * Steps an intercepted execution passes through, in order
 */
export type AuditPhase =
  | "classifying"
  | "pass-through"
  | "capture-before"
  | "execute"
  | "capture-after"
  | "assemble"
  | "dispatch";

/**
 * - skipped: executed without an audit record (not auditable, filtered out, or capture declined)
 * - recorded: record assembled and handed to the sink without any failure
 * - degraded: the statement succeeded but part of the audit did not
 */
export type AuditStatus = "skipped" | "recorded" | "degraded";

export interface AuditOutcome {
  status: AuditStatus;
  phases: AuditPhase[];
  failures: AuditFailure[];
  strategy?: CaptureStrategyName;
  record?: AuditRecord;
}

export interface AuditedResult<T> {
  value: T;
  outcome: AuditOutcome;
}
