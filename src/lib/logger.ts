/**
 * Structured logging utility
 */

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, error?: unknown): void;
}

function format(meta?: LogMeta): string {
  return meta ? JSON.stringify(meta) : "";
}

/**
 * Create a logger whose lines carry a scope tag, e.g. "[INFO] [chat] ..."
 */
export function createLogger(scope?: string): Logger {
  const tag = scope ? ` [${scope}]` : "";

  return {
    debug: (msg, meta) => {
      if (process.env.DEBUG) {
        console.log(`[DEBUG]${tag} ${msg}`, format(meta));
      }
    },

    info: (msg, meta) => {
      console.log(`[INFO]${tag} ${msg}`, format(meta));
    },

    warn: (msg, meta) => {
      console.warn(`[WARN]${tag} ${msg}`, format(meta));
    },

    error: (msg, error) => {
      console.error(`[ERROR]${tag} ${msg}`, error ?? "");
    },
  };
}

export const logger = createLogger();
