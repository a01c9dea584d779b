// ABOUTME: Appends audit entries to per-component files under the log directory.
// ABOUTME: Falls back to stderr when the directory or file is not writable.

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { createConfig, resolveLogFile, type LoggerConfig } from "./config.js";
import { formatCommand, formatEntry, formatTimestamp } from "./format.js";
import * as stderr from "./log.js";

export interface LogFileSystem {
  existsSync(path: string): boolean;
  mkdirSync(path: string, options: { recursive: true; mode: number }): unknown;
  appendFileSync(path: string, data: string): void;
}

export interface LoggerOptions {
  fs?: LogFileSystem;
  now?: () => Date;
}

export interface AuditLogger {
  ensureLogDirectory(): boolean;
  log(component: string, action: string, command?: string, message?: string): void;
  logCommand(component: string, action: string, args: readonly unknown[]): void;
}

const nodeFs: LogFileSystem = { existsSync, mkdirSync, appendFileSync };

/**
 * Only EACCES and EPERM are recovered. Anything else (ENOSPC, ENOTDIR, EIO)
 * reaches the caller.
 */
export function isPermissionError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) {
    return false;
  }
  return err.code === "EACCES" || err.code === "EPERM";
}

export function createAuditLogger(config: LoggerConfig, opts: LoggerOptions = {}): AuditLogger {
  const fs = opts.fs ?? nodeFs;
  const now = opts.now ?? (() => new Date());

  function ensureLogDirectory(): boolean {
    if (fs.existsSync(config.directory)) {
      return true;
    }
    try {
      fs.mkdirSync(config.directory, { recursive: true, mode: 0o755 });
    } catch (err) {
      if (!isPermissionError(err)) {
        throw err;
      }
      stderr.log(`Warning: Cannot create ${config.directory}, logging to stderr`);
      return false;
    }
    return true;
  }

  function log(component: string, action: string, command?: string, message?: string): void {
    const entry = formatEntry({
      timestamp: formatTimestamp(now()),
      action,
      command,
      message,
    });

    if (!ensureLogDirectory()) {
      stderr.write(entry);
      return;
    }

    const logFile = resolveLogFile(config, component);
    try {
      fs.appendFileSync(logFile, entry);
    } catch (err) {
      if (!isPermissionError(err)) {
        throw err;
      }
      stderr.log(`Warning: Cannot write to ${logFile}`);
      stderr.write(entry);
    }
  }

  function logCommand(component: string, action: string, args: readonly unknown[]): void {
    log(component, action, formatCommand(args));
  }

  return { ensureLogDirectory, log, logCommand };
}

const defaultLogger = createAuditLogger(createConfig());

export function ensureLogDirectory(): boolean {
  return defaultLogger.ensureLogDirectory();
}

export function log(component: string, action: string, command?: string, message?: string): void {
  defaultLogger.log(component, action, command, message);
}

export function logCommand(component: string, action: string, args: readonly unknown[]): void {
  defaultLogger.logCommand(component, action, args);
}
