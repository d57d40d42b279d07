/**
 * @chronostamp/cli — Configuration.
 *
 * Global command-line flags and environment variables are folded into one
 * validated ClientConfig at startup. Flags win over the environment.
 *
 * Environment:
 *   CHRONOSTAMP_CACHE_DIR      cache location (default ~/.cache/chronostamp)
 *   CHRONOSTAMP_BITCOIN_NODE   Bitcoin JSON-RPC URL
 *   CHRONOSTAMP_LOG_LEVEL      base log level before -v/-q
 */

import { homedir } from "node:os";
import { join, normalize } from "node:path";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const ClientConfigSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS).default("info"),

    // Calendars
    whitelist: z.array(z.string().min(1)).default([]),
    useDefaultWhitelist: z.boolean().default(true),

    // Cache; null disables it
    cacheDir: z.string().min(1).nullable(),

    // Bitcoin
    bitcoinNetwork: z.enum(["mainnet", "testnet", "regtest"]).default("mainnet"),
    bitcoinNode: z.string().url().optional(),
    queryLocalBitcoin: z.boolean().default(false),
    explorerQueries: z.number().int().min(0).default(0),
    explorerUrl: z.string().url().optional(),

    // Upgrades
    wait: z.boolean().default(false),
    waitIntervalSeconds: z.number().int().min(1).default(30),
  })
  .refine(
    (config) =>
      config.explorerQueries === 0 ||
      config.bitcoinNetwork !== "regtest" ||
      config.explorerUrl !== undefined,
    { message: "regtest has no public explorer; pass --explorer-url", path: ["explorerUrl"] },
  );

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

// =============================================================================
// Flags
// =============================================================================

/** Global options as commander hands them over. */
export interface GlobalFlags {
  readonly verbose?: number | undefined;
  readonly quiet?: number | undefined;
  readonly whitelist?: readonly string[] | undefined;
  readonly defaultWhitelist?: boolean | undefined;
  /** Directory, or false for --no-cache */
  readonly cache?: string | boolean | undefined;
  readonly btcTestnet?: boolean | undefined;
  readonly btcRegtest?: boolean | undefined;
  readonly bitcoinNode?: string | undefined;
  readonly queryLocalBitcoin?: boolean | undefined;
  /** true when given without a count */
  readonly queryExplorer?: string | boolean | undefined;
  readonly explorerUrl?: string | undefined;
  readonly wait?: boolean | undefined;
  readonly waitInterval?: string | undefined;
}

export class ConfigError extends Error {
  readonly code = "INVALID_CONFIG" as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function defaultCacheDir(): string {
  return join(homedir(), ".cache", "chronostamp");
}

/**
 * Move `base` by `verbose - quiet` steps, clamped to the known levels.
 * Each -v is one step more detailed.
 */
export function adjustLogLevel(base: LogLevel, verbose = 0, quiet = 0): LogLevel {
  const index = LOG_LEVELS.indexOf(base) - verbose + quiet;
  const clamped = Math.min(Math.max(index, 0), LOG_LEVELS.length - 1);
  return LOG_LEVELS[clamped] ?? base;
}

// =============================================================================
// Loader
// =============================================================================

function networkOf(flags: GlobalFlags): string {
  if (flags.btcTestnet === true && flags.btcRegtest === true) {
    throw new ConfigError("--btc-testnet and --btc-regtest are mutually exclusive");
  }
  if (flags.btcTestnet === true) return "testnet";
  if (flags.btcRegtest === true) return "regtest";
  return "mainnet";
}

function cacheDirOf(flags: GlobalFlags, env: Record<string, string | undefined>): string | null {
  if (flags.cache === false) return null;
  const dir = typeof flags.cache === "string" ? flags.cache : env["CHRONOSTAMP_CACHE_DIR"];
  if (dir === undefined || dir === "") return defaultCacheDir();
  return normalize(dir.startsWith("~/") ? join(homedir(), dir.slice(2)) : dir);
}

function explorerQueriesOf(flags: GlobalFlags): number | undefined {
  if (flags.queryExplorer === undefined || flags.queryExplorer === false) return undefined;
  if (flags.queryExplorer === true) return 1;
  return Number(flags.queryExplorer);
}

/**
 * Build the client configuration.
 *
 * @throws ConfigError if a flag or variable is invalid
 */
export function loadConfig(
  flags: GlobalFlags = {},
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const baseLevel = LOG_LEVELS.find((level) => level === env["CHRONOSTAMP_LOG_LEVEL"]);
  if (env["CHRONOSTAMP_LOG_LEVEL"] !== undefined && baseLevel === undefined) {
    throw new ConfigError(
      `Invalid CHRONOSTAMP_LOG_LEVEL "${env["CHRONOSTAMP_LOG_LEVEL"]}"; expected one of ${LOG_LEVELS.join(", ")}`,
    );
  }

  const raw = {
    logLevel: adjustLogLevel(baseLevel ?? "info", flags.verbose, flags.quiet),
    whitelist: flags.whitelist ?? [],
    useDefaultWhitelist: flags.defaultWhitelist ?? true,
    cacheDir: cacheDirOf(flags, env),
    bitcoinNetwork: networkOf(flags),
    bitcoinNode: flags.bitcoinNode ?? env["CHRONOSTAMP_BITCOIN_NODE"],
    queryLocalBitcoin: flags.queryLocalBitcoin ?? false,
    explorerQueries: explorerQueriesOf(flags),
    explorerUrl: flags.explorerUrl,
    wait: flags.wait ?? false,
    waitIntervalSeconds: flags.waitInterval === undefined ? undefined : Number(flags.waitInterval),
  };

  const result = ClientConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
