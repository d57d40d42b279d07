/**
 * @chronostamp/cli — Runtime wiring.
 *
 * Turns a ClientConfig into the collaborators the engines take. Commands
 * only ever see a Runtime, so tests can hand them fakes.
 */

import type { Logger } from "pino";
import {
  DiskTimestampCache,
  InMemoryTimestampCache,
  type TimestampCache,
} from "@chronostamp/cache";
import {
  DEFAULT_CALENDAR_WHITELIST,
  UrlWhitelist,
  remoteCalendarFactory,
  type CalendarFactory,
} from "@chronostamp/calendar";
import {
  BitcoinRpcVerifier,
  DEFAULT_ESPLORA_URL,
  EsploraExplorer,
  VerifierRegistry,
  defaultNodeUrl,
  type BitcoinNetwork,
  type BlockExplorer,
} from "@chronostamp/chain-observer";
import type { SleepFn } from "@chronostamp/engine";
import type { ClientConfig } from "./config.js";

/** Where proofs written to stdout go. */
export interface Output {
  write(chunk: string | Uint8Array): unknown;
}

export interface Runtime {
  readonly config: ClientConfig;
  readonly logger: Logger;
  readonly cache: TimestampCache;
  readonly whitelist: UrlWhitelist;
  readonly calendarFactory: CalendarFactory;
  readonly verifiers: VerifierRegistry;
  readonly explorer: BlockExplorer | undefined;
  readonly sleepFn?: SleepFn | undefined;
  readonly stdout: Output;
  readonly readStdin: () => Promise<Uint8Array>;
}

const EXPLORER_URLS: Readonly<Record<BitcoinNetwork, string | undefined>> = {
  mainnet: DEFAULT_ESPLORA_URL,
  testnet: "https://blockstream.info/testnet/api",
  regtest: undefined,
};

export function buildWhitelist(config: ClientConfig): UrlWhitelist {
  const whitelist = new UrlWhitelist(config.useDefaultWhitelist ? DEFAULT_CALENDAR_WHITELIST : []);
  for (const url of config.whitelist) whitelist.add(url);
  return whitelist;
}

async function readAllStdin(): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Uint8Array(Buffer.concat(chunks));
}

export function createRuntime(config: ClientConfig, logger: Logger): Runtime {
  const cache: TimestampCache =
    config.cacheDir === null
      ? new InMemoryTimestampCache()
      : new DiskTimestampCache({ dir: config.cacheDir, logger });

  // Naming a node implies querying it.
  const verifiers = new VerifierRegistry();
  if (config.queryLocalBitcoin || config.bitcoinNode !== undefined) {
    verifiers.register(
      new BitcoinRpcVerifier({ url: config.bitcoinNode ?? defaultNodeUrl(config.bitcoinNetwork) }),
    );
  }

  const explorerUrl = config.explorerUrl ?? EXPLORER_URLS[config.bitcoinNetwork];
  const explorer =
    config.explorerQueries > 0 && explorerUrl !== undefined
      ? new EsploraExplorer({ url: explorerUrl })
      : undefined;

  return {
    config,
    logger,
    cache,
    whitelist: buildWhitelist(config),
    calendarFactory: remoteCalendarFactory(),
    verifiers,
    explorer,
    stdout: process.stdout,
    readStdin: readAllStdin,
  };
}
