/**
 * CLI pipeline: parse args -> locate -> load -> resolve -> render -> write.
 */

import { getErrorMessage, getExitCode, isError, UsageError, wrapError } from "@pkgforge/errors";
import { loadManifest, locateManifest } from "@pkgforge/manifest";
import {
  describeSource,
  explainArchConfig,
  renderPkgbuild,
  resolveArchConfig,
  writePkgbuild,
} from "@pkgforge/pkgbuild";

import { parseArgv } from "./args.js";
import { createLogger, type Logger, type LoggerOptions } from "./logger.js";

export const BIN_NAME = "cargo-arch";
export const VERSION = "0.1.0";

export interface CliArgs {
  readonly manifestPath: string | undefined;
  readonly verbose: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

export interface CliDeps {
  /** Environment consulted for CARGO_MANIFEST_DIR. Default: process.env */
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Base for relative paths and the output directory. Default: process.cwd() */
  readonly cwd?: string;
  readonly console?: LoggerOptions["console"];
  readonly colors?: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags } = parseArgv(argv);

  const extra = positionals[0];
  if (extra !== undefined) {
    throw new UsageError(`Unexpected argument: ${extra}`);
  }

  const manifestPath = flags["manifest-path"];
  return {
    manifestPath: typeof manifestPath === "string" ? manifestPath : undefined,
    verbose: flags.verbose === true,
    help: flags.help === true,
    version: flags.version === true,
  };
}

export function helpText(): string {
  return `
  ${BIN_NAME} - Generate an Arch Linux PKGBUILD from Cargo.toml

  Usage:
    ${BIN_NAME} [options]
    cargo arch [options]

  Options:
    --manifest-path <dir>  Directory containing Cargo.toml
    -v, --verbose          Show where each field came from
    -V, --version          Print version
    -h, --help             Show this help message

  Environment:
    CARGO_MANIFEST_DIR     Used when --manifest-path is not given
`;
}

function causeChain(error: Error): string[] {
  const lines: string[] = [];
  let current = error.cause;
  while (current !== undefined) {
    lines.push(`caused by: ${getErrorMessage(current)}`);
    current = isError(current) ? current.cause : undefined;
  }
  return lines;
}

function report(error: unknown, log: Logger, verbose: boolean): number {
  const wrapped = wrapError(error);
  log.error(wrapped.message);
  if (verbose) {
    for (const line of causeChain(wrapped)) {
      log.error(line);
    }
    if (wrapped.stack !== undefined) {
      log.debug(wrapped.stack);
    }
  }
  return getExitCode(wrapped);
}

async function generate(cliArgs: CliArgs, deps: CliDeps, log: Logger): Promise<string> {
  const manifestFile = locateManifest({
    manifestPath: cliArgs.manifestPath,
    env: deps.env,
    cwd: deps.cwd,
  });
  log.debug(`reading ${manifestFile}`);

  const manifest = await loadManifest(manifestFile, {
    onWarning: (message) => log.warn(message),
  });

  const sources = explainArchConfig(manifest);
  for (const [field, source] of Object.entries(sources)) {
    log.debug(`${field} <- ${describeSource(source)}`);
  }

  const content = renderPkgbuild(resolveArchConfig(manifest));
  return writePkgbuild(content, { dir: deps.cwd });
}

/**
 * Runs the whole pipeline.
 *
 * @returns process exit code; 0 on success
 */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.console ?? console;

  let cliArgs: CliArgs;
  try {
    cliArgs = parseArgs(argv);
  } catch (error: unknown) {
    return report(error, createLogger(BIN_NAME, { console: out, colors: deps.colors }), false);
  }

  if (cliArgs.help) {
    out.log(helpText());
    return 0;
  }
  if (cliArgs.version) {
    out.log(`${BIN_NAME} ${VERSION}`);
    return 0;
  }

  const log = createLogger(BIN_NAME, { verbose: cliArgs.verbose, console: out, colors: deps.colors });
  try {
    const written = await generate(cliArgs, deps, log);
    out.log(`Generated ${written}`);
    return 0;
  } catch (error: unknown) {
    return report(error, log, cliArgs.verbose);
  }
}
