// ABOUTME: Public programmatic surface for components that link the library.
// ABOUTME: Re-exports the logger, its configuration, and the shell renderer.

export {
  createAuditLogger,
  ensureLogDirectory,
  isPermissionError,
  log,
  logCommand,
} from "./logger.js";
export type { AuditLogger, LogFileSystem, LoggerOptions } from "./logger.js";
export { createConfig, resolveLogFile, DEFAULT_LOG_DIR, LOG_FILES } from "./config.js";
export type { LoggerConfig } from "./config.js";
export { formatEntry, formatTimestamp, formatCommand } from "./format.js";
export { renderShellFunction, writeShellFunction } from "./shell.js";
