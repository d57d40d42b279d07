/**
 * @chronostamp/cli — Logging.
 *
 * Everything diagnostic goes to stderr so stdout stays usable for proofs
 * (`chronostamp stamp < file > file.ots`). Interactive terminals get
 * pino-pretty, everything else newline-delimited JSON.
 */

import { destination, pino, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export function createLogger(level: LogLevel, pretty = process.stderr.isTTY === true): Logger {
  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { destination: 2, ignore: "pid,hostname", translateTime: "SYS:HH:MM:ss" },
      },
    });
  }
  return pino({ level }, destination({ dest: 2, sync: true }));
}
