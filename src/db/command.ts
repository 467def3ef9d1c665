import type { ParameterBindings } from "../types/audit.js";
import type { QueryChannel, QueryOutcome, SqlCommand } from "../types/command.js";
import { unboundPlaceholders } from "./channel.js";

/**
 * First column of the first row, or null
 */
export function firstScalar(outcome: QueryOutcome): unknown {
  const row = outcome.rows[0];
  if (!row) return null;
  const first = Object.keys(row)[0];
  return first === undefined ? null : (row[first] ?? null);
}

export function assertBound(text: string, parameters: ParameterBindings): void {
  const missing = unboundPlaceholders(text, parameters);
  if (missing.length > 0) {
    throw new Error(`No value bound for parameter(s): ${missing.join(", ")}`);
  }
}

/**
 * Plain command that runs its text on a channel with no auditing
 */
export class DirectCommand implements SqlCommand {
  constructor(
    private channel: QueryChannel,
    public text: string,
    readonly parameters: ParameterBindings = {},
  ) {}

  async execute(): Promise<number> {
    const outcome = await this.channel.query(this.text, this.parameters);
    return outcome.rowCount;
  }

  async executeScalar(): Promise<unknown> {
    return firstScalar(await this.channel.query(this.text, this.parameters));
  }

  async prepare(): Promise<void> {
    assertBound(this.text, this.parameters);
  }
}
