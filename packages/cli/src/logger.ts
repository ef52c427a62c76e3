/**
 * Console logger with a `[tag]` prefix.
 */

import pc from "picocolors";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Print debug lines. Default: false */
  readonly verbose?: boolean;
  /** Default: whatever picocolors detects for the terminal */
  readonly colors?: boolean;
  /** Defaults to the global console */
  readonly console?: Pick<Console, "log" | "warn" | "error">;
}

export function createLogger(tag: string, options?: LoggerOptions): Logger {
  const out = options?.console ?? console;
  const verbose = options?.verbose ?? false;
  const c = pc.createColors(options?.colors ?? pc.isColorSupported);
  const prefix = c.dim(`[${tag}]`);

  return {
    debug(message) {
      if (verbose) out.log(`${prefix} ${c.dim(message)}`);
    },
    info(message) {
      out.log(`${prefix} ${message}`);
    },
    warn(message) {
      out.warn(`${prefix} ${c.yellow("warning:")} ${message}`);
    },
    error(message) {
      out.error(`${prefix} ${c.red("error:")} ${message}`);
    },
  };
}
