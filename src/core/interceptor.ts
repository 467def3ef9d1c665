import type { CaptureRequest, CaptureResult, CaptureStrategy } from "../capture/types.js";
import { assertBound, firstScalar } from "../db/command.js";
import type { StatementParser } from "../parser/statement-parser.js";
import type { ParameterBindings } from "../types/audit.js";
import type { QueryChannel, QueryOutcome, SqlCommand } from "../types/command.js";
import type { CaptureStrategyName } from "../types/config.js";
import type { AuditedResult, AuditOutcome, AuditPhase } from "../types/outcome.js";
import type { Logger } from "../utils/logger.js";
import type { AuditAssembler } from "./assembler.js";
import { AuditFailure } from "./errors.js";

export interface InterceptorDependencies {
  parser: StatementParser;
  channel: QueryChannel;
  strategies: Record<CaptureStrategyName, CaptureStrategy>;
  strategy: CaptureStrategyName;
  fallbackToReload: boolean;
  assembler: AuditAssembler;
  shouldAudit: (tableName: string) => boolean;
  logger: Logger;
}

export interface InterceptedExecution {
  execution: QueryOutcome;
  outcome: AuditOutcome;
}

/**
 * Run one statement exactly once and audit it when it is a write to an audited table.
 * Rejects only with the database's own error for the statement.
 */
export async function executeWithAudit(
  deps: InterceptorDependencies,
  text: string,
  parameters: ParameterBindings,
): Promise<InterceptedExecution> {
  const phases: AuditPhase[] = ["classifying"];
  const failures: AuditFailure[] = [];

  const passThrough = async (): Promise<InterceptedExecution> => {
    phases.push("pass-through");
    const execution = await deps.channel.query(text, parameters);
    return { execution, outcome: { status: "skipped", phases, failures } };
  };

  const { descriptor, failure } = deps.parser.parse(text);
  if (failure) failures.push(failure);

  const { operation, tableName } = descriptor;
  if (operation === "UNKNOWN" || !tableName || !deps.shouldAudit(tableName)) {
    return passThrough();
  }

  const request: CaptureRequest = {
    statement: descriptor,
    text,
    parameters,
    trace: (phase) => phases.push(phase),
  };

  let strategy = deps.strategies[deps.strategy];
  let result: CaptureResult = await strategy.capture(request);

  if (result.kind === "declined" && strategy.name === "rewrite" && deps.fallbackToReload) {
    deps.logger.warn(`${result.failure.message}; falling back to select-reload`);
    failures.push(result.failure);
    strategy = deps.strategies.reload;
    result = await strategy.capture(request);
  }

  if (result.kind === "declined") {
    deps.logger.warn(`${result.failure.message}; executing without audit`);
    failures.push(result.failure);
    return passThrough();
  }

  // The statement has run; from here on nothing may reject
  const { execution } = result;
  failures.push(...result.failures);

  try {
    phases.push("assemble");
    const assembled = await deps.assembler.assemble({
      tableName,
      operation,
      text,
      parameters,
      before: result.before,
      after: result.after,
    });
    failures.push(...assembled.failures);

    phases.push("dispatch");
    const dispatchFailure = await deps.assembler.dispatch(assembled.record);
    if (dispatchFailure) failures.push(dispatchFailure);

    return {
      execution,
      outcome: {
        status: failures.length > 0 ? "degraded" : "recorded",
        phases,
        failures,
        strategy: strategy.name,
        record: assembled.record,
      },
    };
  } catch (error) {
    deps.logger.error("Failed to assemble audit record:", error);
    failures.push(new AuditFailure("capture", "Failed to assemble audit record", { cause: error }));
    return {
      execution,
      outcome: { status: "degraded", phases, failures, strategy: strategy.name },
    };
  }
}

/**
 * Runs statements for an audited command
 */
export interface AuditExecutor {
  run(text: string, parameters: ParameterBindings): Promise<InterceptedExecution>;
}

/**
 * Command whose executions are audited transparently.
 * `execute` and `executeScalar` behave like an unaudited command;
 * the `*Audited` variants also report what the audit layer did.
 */
export class AuditedCommand implements SqlCommand {
  constructor(
    private executor: AuditExecutor,
    public text: string,
    readonly parameters: ParameterBindings = {},
  ) {}

  async execute(): Promise<number> {
    const { value } = await this.executeAudited();
    return value;
  }

  async executeScalar(): Promise<unknown> {
    const { value } = await this.executeScalarAudited();
    return value;
  }

  async executeAudited(): Promise<AuditedResult<number>> {
    const { execution, outcome } = await this.executor.run(this.text, this.parameters);
    return { value: execution.rowCount, outcome };
  }

  async executeScalarAudited(): Promise<AuditedResult<unknown>> {
    const { execution, outcome } = await this.executor.run(this.text, this.parameters);
    return { value: firstScalar(execution), outcome };
  }

  async prepare(): Promise<void> {
    assertBound(this.text, this.parameters);
  }
}
