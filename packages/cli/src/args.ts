/**
 * Argument parser for `cargo-arch`.
 *
 * Only the flags below exist. Anything else is a usage error rather than
 * being silently ignored.
 */

import { UsageError } from "@pkgforge/errors";

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  h: "help",
  v: "verbose",
  V: "version",
};

const BOOLEAN_FLAGS = new Set(["help", "verbose", "version"]);
const VALUE_FLAGS = new Set(["manifest-path"]);

/** Subcommand name Cargo passes when invoked as `cargo arch` */
export const CARGO_SUBCOMMAND = "arch";

function setFlag(flags: Record<string, string | boolean>, key: string, inline: string | undefined, next: string | undefined): boolean {
  if (BOOLEAN_FLAGS.has(key)) {
    if (inline !== undefined) {
      throw new UsageError(`Flag --${key} does not take a value`);
    }
    flags[key] = true;
    return false;
  }

  if (VALUE_FLAGS.has(key)) {
    if (inline !== undefined) {
      if (inline === "") {
        throw new UsageError(`Flag --${key} requires a value`);
      }
      flags[key] = inline;
      return false;
    }
    if (next === undefined || next === "" || next.startsWith("-")) {
      throw new UsageError(`Flag --${key} requires a value`);
    }
    flags[key] = next;
    return true;
  }

  throw new UsageError(`Unknown flag: --${key}`);
}

/**
 * Splits argv into positionals and flags. Supports `--flag value`,
 * `--flag=value` and the short aliases `-h`, `-v`, `-V`.
 *
 * @throws {UsageError} on an unknown flag or a missing value
 */
export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      const key = eq === -1 ? body : body.slice(0, eq);
      const inline = eq === -1 ? undefined : body.slice(eq + 1);
      if (setFlag(flags, key, inline, argv[i + 1])) i++;
    } else if (arg.startsWith("-") && arg.length === 2) {
      const short = arg.slice(1);
      const long = ALIASES[short];
      if (long === undefined) {
        throw new UsageError(`Unknown flag: ${arg}`);
      }
      if (setFlag(flags, long, undefined, argv[i + 1])) i++;
    } else {
      positionals.push(arg);
    }

    i++;
  }

  // `cargo arch --verbose` arrives as `arch --verbose`
  if (positionals[0] === CARGO_SUBCOMMAND) {
    positionals.shift();
  }

  return { positionals, flags };
}
