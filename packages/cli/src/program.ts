/**
 * @chronostamp/cli — Command-line program.
 *
 *   chronostamp [global options] <stamp|upgrade|verify|info|prune> ...
 *
 * Exit codes: 0 success, 1 failure, 2 invalid arguments or configuration.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import { InvalidQuorumError } from "@chronostamp/calendar";
import { parseAttestationSelector, type AttestationSelector } from "@chronostamp/engine";
import { MalformedProofError } from "@chronostamp/proof";
import { ConfigError, loadConfig, type ClientConfig, type GlobalFlags } from "./config.js";
import { ProofFileError } from "./files.js";
import { createLogger } from "./logger.js";
import { createRuntime, type Output, type Runtime } from "./runtime.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";
import { infoCommand } from "./commands/info.js";
import { pruneCommand } from "./commands/prune.js";
import { stampCommand } from "./commands/stamp.js";
import { upgradeCommand } from "./commands/upgrade.js";
import { verifyCommand } from "./commands/verify.js";

export const VERSION = "0.1.0";

export interface ProgramDeps {
  readonly makeRuntime: (config: ClientConfig) => Runtime;
  readonly env: Record<string, string | undefined>;
  readonly stdout: Output;
  readonly stderr: Output;
}

const defaultDeps: ProgramDeps = {
  makeRuntime: (config) => createRuntime(config, createLogger(config.logLevel)),
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
};

// =============================================================================
// Option parsers
// =============================================================================

function collect(value: string, previous: unknown): string[] {
  return [...(Array.isArray(previous) ? previous.map(String) : []), value];
}

function count(_value: string, previous: number): number {
  return previous + 1;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return n;
}

function selectors(value: unknown, fallback: readonly string[]): AttestationSelector[] {
  if (value === false) return [];
  const texts = Array.isArray(value) ? value.map(String) : fallback;
  return texts.map(parseAttestationSelector);
}

// =============================================================================
// Program
// =============================================================================

export interface ProgramHooks {
  /** Called once global options have produced a runtime */
  readonly onRuntime: (runtime: Runtime) => void;
  readonly onExit: (code: ExitCode) => void;
}

export function buildProgram(deps: ProgramDeps, hooks: ProgramHooks): Command {
  const program = new Command();

  program
    .name("chronostamp")
    .description("Timestamp files against public blockchains through remote calendars.")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => void deps.stdout.write(text),
      writeErr: (text) => void deps.stderr.write(text),
    })
    .option("-v, --verbose", "Be more verbose; repeatable", count, 0)
    .option("-q, --quiet", "Be more quiet; repeatable", count, 0)
    .option("-l, --whitelist <url>", "Add a calendar to the whitelist", collect)
    .option("--no-default-whitelist", "Do not load the default calendar whitelist")
    .option("--cache <dir>", "Location of the timestamp cache")
    .option("--no-cache", "Disable the timestamp cache")
    .option("--btc-testnet", "Use Bitcoin testnet rather than mainnet")
    .option("--btc-regtest", "Use Bitcoin regtest rather than mainnet")
    .option("--bitcoin-node <url>", "Bitcoin node JSON-RPC URL")
    .option("--query-local-bitcoin", "Query the local Bitcoin node for block times")
    .option("--query-explorer [n]", "Query a block explorer for up to N attestations (default 1)")
    .option("--explorer-url <url>", "Esplora API base URL")
    .option("-w, --wait", "Wait until the timestamp is complete")
    .option("--wait-interval <seconds>", "Seconds between upgrade attempts when waiting");

  const setup = (): Runtime => {
    const flags: GlobalFlags = program.opts();
    const config = loadConfig(flags, deps.env);
    const runtime = deps.makeRuntime(config);
    hooks.onRuntime(runtime);
    return runtime;
  };

  program
    .command("stamp")
    .alias("s")
    .description("Create timestamps for files; stamps stdin when no file is given")
    .argument("[files...]", "Files to timestamp")
    .option("-c, --calendar <url>", "Create timestamp with the aid of a remote calendar", collect)
    .option("-m <n>", "Timestamps are created with at least M calendars", positiveInt, 2)
    .option("--timeout <seconds>", "Timeout before giving up on a calendar", positiveInt, 5)
    .action(async (files: string[], opts: { calendar?: string[]; m: number; timeout: number }) => {
      const runtime = setup();
      const code = await stampCommand(
        {
          files,
          calendarUrls: opts.calendar ?? [],
          minResponses: opts.m,
          timeoutSeconds: opts.timeout,
        },
        runtime,
      );
      hooks.onExit(code);
    });

  program
    .command("upgrade")
    .alias("u")
    .description("Upgrade remote calendar timestamps to be locally verifiable")
    .argument("<files...>", "Existing timestamp(s)")
    .option("-c, --calendar <url>", "Override calendars in the timestamp", collect)
    .option("-n, --dry-run", "Perform a trial upgrade without modifying the timestamp")
    .action(async (files: string[], opts: { calendar?: string[]; dryRun?: boolean }) => {
      const runtime = setup();
      const code = await upgradeCommand(
        { files, calendarUrls: opts.calendar ?? [], dryRun: opts.dryRun === true },
        runtime,
      );
      hooks.onExit(code);
    });

  program
    .command("verify")
    .alias("v")
    .description("Verify a timestamp")
    .argument("<timestamp>", "Timestamp filename")
    .option("-f <file>", "Specify target file explicitly")
    .option("-d <digest>", "Verify a (hex-encoded) digest rather than a file")
    .action(async (proofPath: string, opts: { f?: string; d?: string }) => {
      const runtime = setup();
      if (opts.f !== undefined && opts.d !== undefined) {
        runtime.logger.error("-f and -d are mutually exclusive");
        hooks.onExit(EXIT.USAGE);
        return;
      }
      const code = await verifyCommand({ proofPath, target: opts.f, digest: opts.d }, runtime);
      hooks.onExit(code);
    });

  program
    .command("info")
    .alias("i")
    .description("Show information on a timestamp")
    .argument("<file>", "Filename")
    .action((proofPath: string) => {
      const runtime = setup();
      const flags: GlobalFlags = program.opts();
      const verbose = flags.verbose ?? 0;
      hooks.onExit(infoCommand({ proofPath, verbose: verbose > 0 }, runtime));
    });

  program
    .command("prune")
    .alias("p")
    .description("Prune attestations from a timestamp")
    .argument("<timestamp>", "Timestamp filename")
    .option("--verify <selector>", "Verify attestations of this kind first (default: btc)", collect)
    .option("--no-verify", "Do not verify any attestations")
    .option("--discard <selector>", "Discard attestations of this kind (default: pending:*)", collect)
    .action(async (proofPath: string, opts: { verify?: unknown; discard?: unknown }) => {
      const verify = selectors(opts.verify, ["btc"]);
      const discard = selectors(opts.discard, ["pending:*"]);
      const runtime = setup();
      hooks.onExit(await pruneCommand({ proofPath, verify, discard }, runtime));
    });

  return program;
}

// =============================================================================
// Run
// =============================================================================

function describeFailure(err: unknown): { code: ExitCode; message: string } {
  if (err instanceof ConfigError || err instanceof InvalidQuorumError || err instanceof RangeError) {
    return { code: EXIT.USAGE, message: err.message };
  }
  if (err instanceof MalformedProofError) {
    return { code: EXIT.FAILURE, message: `Invalid timestamp file: ${err.message}` };
  }
  if (err instanceof ProofFileError) {
    return { code: EXIT.FAILURE, message: err.message };
  }
  return { code: EXIT.FAILURE, message: err instanceof Error ? err.message : String(err) };
}

/**
 * Parse `args` (without the node and script entries) and run the command.
 */
export async function run(
  args: readonly string[],
  deps: ProgramDeps = defaultDeps,
): Promise<ExitCode> {
  const state: { exitCode: ExitCode; logger: Logger | undefined } = {
    exitCode: EXIT.OK,
    logger: undefined,
  };

  const program = buildProgram(deps, {
    onRuntime: (runtime) => {
      state.logger = runtime.logger;
    },
    onExit: (code) => {
      state.exitCode = code;
    },
  });

  try {
    await program.parseAsync([...args], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT.OK : EXIT.USAGE;
    }
    const { code, message } = describeFailure(err);
    if (state.logger !== undefined) {
      state.logger.error(message);
    } else {
      deps.stderr.write(`error: ${message}\n`);
    }
    return code;
  }
  return state.exitCode;
}
