import type { QueryChannel } from "../types/command.js";
import type { Logger } from "../utils/logger.js";

/** First `server_version_num` that accepts `old.` and `new.` in RETURNING */
export const OLD_NEW_RETURNING_VERSION = 180000;

const VERSION_QUERY = "SHOW server_version_num";

/**
 * Server version of the connection, fetched once.
 * A failed or unreadable lookup is retried on the next call.
 */
export class ServerVersionCache {
  private version: Promise<number | undefined> | null = null;

  constructor(
    private channel: QueryChannel,
    private logger: Logger,
  ) {}

  getVersion(): Promise<number | undefined> {
    if (!this.version) {
      const pending: Promise<number | undefined> = this.load().then((version) => {
        if (version === undefined && this.version === pending) {
          this.version = null;
        }
        return version;
      });
      this.version = pending;
    }
    return this.version;
  }

  clear(): void {
    this.version = null;
  }

  private async load(): Promise<number | undefined> {
    try {
      const outcome = await this.channel.query(VERSION_QUERY, {});
      const raw = outcome.rows[0]?.server_version_num;
      const version = typeof raw === "number" ? raw : Number(raw);
      if (!Number.isInteger(version)) {
        this.logger.warn("Unreadable server_version_num:", raw);
        return undefined;
      }
      this.logger.debug(`Server version ${version}`);
      return version;
    } catch (error) {
      this.logger.warn("Failed to read server version:", error);
      return undefined;
    }
  }
}
