/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * rigkit Logger - consistent, component-prefixed logging across packages
 *
 * Log levels:
 * - error: Always logged - failures that abort a conversion
 * - warn: Always logged - recorded diagnostics (skipped primitives, unresolved bones)
 * - info: Logged when RIGKIT_DEBUG is set - stage progress
 * - debug: Logged when RIGKIT_DEBUG is set - detailed decoding info
 *
 * Enable debug logging with the RIGKIT_DEBUG=true environment variable.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component/module name (e.g., 'ContainerReader', 'Partitioner') */
  component: string;
  /** Operation being performed (e.g., 'readContainer', 'partitionPrimitive') */
  operation?: string;
  /** Global primitive index if applicable */
  primitiveIndex?: number;
  /** Scene node index if applicable */
  nodeIndex?: number;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

export function isDebugEnabled(): boolean {
  return process.env.RIGKIT_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.primitiveIndex !== undefined) {
    prefix += ` primitive #${ctx.primitiveIndex}`;
  }
  if (ctx.nodeIndex !== undefined) {
    prefix += ` node #${ctx.nodeIndex}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    /**
     * Log an error - always visible
     * Use for failures that abort the current file
     */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}:`, formatError(error), ctx.data);
        } else {
          console.error(`${prefix} ${message}:`, formatError(error));
        }
      } else {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}`, ctx.data);
        } else {
          console.error(`${prefix} ${message}`);
        }
      }
    },

    /**
     * Log a warning - always visible
     * Use for recoverable issues that are also recorded as diagnostics
     */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Log info - only visible when RIGKIT_DEBUG=true
     */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /**
     * Log debug - only visible when RIGKIT_DEBUG=true
     */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a caught error with context - visible when RIGKIT_DEBUG=true
     * Use in catch blocks where the error is converted or recorded
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.debug(`${prefix} ${message} (recovered):`, formatError(error), ctx.data);
      } else {
        console.debug(`${prefix} ${message} (recovered):`, formatError(error));
      }
    },
  };
}
