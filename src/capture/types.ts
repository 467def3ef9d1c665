import type { AuditFailure } from "../core/errors.js";
import type { StatementDescriptor } from "../parser/statement-parser.js";
import type { ParameterBindings, RowSnapshot } from "../types/audit.js";
import type { QueryOutcome } from "../types/command.js";
import type { CaptureStrategyName } from "../types/config.js";
import type { AuditPhase } from "../types/outcome.js";

export interface CaptureRequest {
  statement: StatementDescriptor;
  text: string;
  parameters: ParameterBindings;
  trace: (phase: AuditPhase) => void;
}

export type CaptureResult =
  /** Nothing was executed; the caller decides how to run the statement */
  | { kind: "declined"; failure: AuditFailure }
  | {
      kind: "executed";
      /** What the caller of the command sees */
      execution: QueryOutcome;
      before: RowSnapshot;
      after: RowSnapshot;
      failures: AuditFailure[];
    };

/**
 * Executes a statement exactly once while capturing its row images.
 * Only the real execution may reject; capture problems are reported in `failures`.
 */
export interface CaptureStrategy {
  readonly name: CaptureStrategyName;
  capture(request: CaptureRequest): Promise<CaptureResult>;
}
