/**
 * Where in the audit pipeline something went wrong.
 * Only "execution" ever reaches application code, and then as the driver's own error.
 */
export type AuditFailureKind = "parse" | "capture" | "execution" | "dispatch";

export class AuditFailure extends Error {
  readonly kind: AuditFailureKind;

  constructor(kind: AuditFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuditFailure";
    this.kind = kind;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function describeError(error: unknown): string {
  return toError(error).message;
}
