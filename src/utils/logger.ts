export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const PREFIX = "[AUDIT]";

/**
 * Console-backed logger. Debug output is enabled with AUDIT_DEBUG=true.
 */
export function createConsoleLogger(debugEnabled = process.env.AUDIT_DEBUG === "true"): Logger {
  return {
    debug(message, ...details) {
      if (debugEnabled) {
        console.log(`${PREFIX} DEBUG`, message, ...details);
      }
    },
    info(message, ...details) {
      console.info(PREFIX, message, ...details);
    },
    warn(message, ...details) {
      console.warn(PREFIX, message, ...details);
    },
    error(message, ...details) {
      console.error(PREFIX, message, ...details);
    },
  };
}
