import { AsyncLocalStorage } from "node:async_hooks";
import type { AuditContext } from "../types/audit.js";
import type { AuditContextProvider } from "../types/config.js";

/**
 * Manages audit context using AsyncLocalStorage
 * Allows tracking the acting user across async operations
 */
export class AuditContextManager implements AuditContextProvider {
  private storage = new AsyncLocalStorage<AuditContext>();

  /**
   * Set context for the current async context
   */
  setContext(context: AuditContext): void {
    this.storage.enterWith(context);
  }

  /**
   * Get the current audit context
   */
  getContext(): AuditContext | undefined {
    return this.storage.getStore();
  }

  getCurrentContext(): AuditContext | undefined {
    return this.getContext();
  }

  /**
   * Run a function with a specific audit context
   */
  runWithContext<T>(context: AuditContext, fn: () => T): T {
    return this.storage.run(context, fn);
  }

  /**
   * Merge new context with existing context.
   * Custom properties are merged key by key.
   */
  mergeContext(partial: Partial<AuditContext>): void {
    const current = this.getContext() || {};
    const customProperties =
      current.customProperties || partial.customProperties
        ? { ...current.customProperties, ...partial.customProperties }
        : undefined;
    this.setContext({ ...current, ...partial, ...(customProperties ? { customProperties } : {}) });
  }
}
