// ABOUTME: Log directory, component file table, and CLI option validation.
// ABOUTME: Defines the LoggerConfig interface and the buildLogRequest function.

import { join } from "node:path";

export const DEFAULT_LOG_DIR = "/var/log/kvm-appvm";

export const DEFAULT_COMPONENT = "appvm";

export const LOG_FILES: Readonly<Record<string, string>> = Object.freeze({
  appvm: "appvm.log",
  "qemu-hook": "qemu-hook.log",
  "guest-init": "guest-init.log",
});

export interface LoggerConfig {
  readonly directory: string;
  readonly files: Readonly<Record<string, string>>;
  // Used for any component missing from `files`
  readonly defaultFile: string;
}

export interface ConfigOverrides {
  directory?: string;
}

export function createConfig(overrides: ConfigOverrides = {}): LoggerConfig {
  return Object.freeze({
    directory: overrides.directory ?? DEFAULT_LOG_DIR,
    files: LOG_FILES,
    defaultFile: LOG_FILES[DEFAULT_COMPONENT],
  });
}

export function resolveLogFile(config: LoggerConfig, component: string): string {
  const file = Object.hasOwn(config.files, component)
    ? config.files[component]
    : config.defaultFile;
  return join(config.directory, file);
}

export interface LogRequest {
  component: string;
  action: string;
  command?: string;
  message?: string;
}

export interface CLIOptions {
  component?: string;
  action?: string;
  command?: string;
  message?: string;
}

function required(value: string | undefined, name: string): string {
  if (value === undefined || value.trim() === "") {
    throw new Error(`${name} is required`);
  }
  return value;
}

export function buildLogRequest(options: CLIOptions): LogRequest {
  const component = required(options.component, "Component");
  const action = required(options.action, "Action");

  return {
    component,
    action,
    // Recorded verbatim; never tokenized or expanded
    command: options.command || undefined,
    message: options.message || undefined,
  };
}
