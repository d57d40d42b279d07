/**
 * @chronostamp/cli — Command-line client.
 *
 * @packageDocumentation
 */

// Program
export { run, buildProgram, VERSION } from "./program.js";
export type { ProgramDeps, ProgramHooks } from "./program.js";

// Configuration
export {
  loadConfig,
  adjustLogLevel,
  defaultCacheDir,
  ClientConfigSchema,
  ConfigError,
  LOG_LEVELS,
} from "./config.js";
export type { ClientConfig, GlobalFlags, LogLevel } from "./config.js";

// Runtime
export { createRuntime, buildWhitelist } from "./runtime.js";
export type { Runtime, Output } from "./runtime.js";
export { createLogger } from "./logger.js";

// Output
export { formatTree, formatUnixTime } from "./format.js";
export type { FormatTreeOptions } from "./format.js";
export {
  readProofFile,
  writeProofFileExclusive,
  replaceWithBackup,
  targetOfProof,
  ProofFileError,
  PROOF_EXTENSION,
  BACKUP_EXTENSION,
} from "./files.js";

// Commands
export { EXIT } from "./commands/exit-codes.js";
export type { ExitCode } from "./commands/exit-codes.js";
