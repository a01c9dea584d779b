// ABOUTME: Renders the log_action bash function for shell-scripted components.
// ABOUTME: Built from the same config table as the logger so both pick the same files.

import type { Writable } from "node:stream";
import { quote } from "shell-quote";
import type { LoggerConfig } from "./config.js";

export function renderShellFunction(config: LoggerConfig): string {
  const arms = Object.entries(config.files).map(
    ([component, file]) => `        ${quote([component])}) log_file="$log_dir"/${quote([file])} ;;`
  );

  return [
    "# log_action <component> <action> <message>",
    "log_action() {",
    '    local component="$1"',
    '    local action="$2"',
    '    local message="$3"',
    "    local timestamp",
    "    timestamp=$(date '+%Y-%m-%d %H:%M:%S')",
    `    local log_dir=${quote([config.directory])}`,
    "    local log_file",
    '    local line="[$timestamp] [$action]"',
    "",
    '    case "$component" in',
    ...arms,
    `        *) log_file="$log_dir"/${quote([config.defaultFile])} ;;`,
    "    esac",
    "",
    '    if [ -n "$message" ]; then',
    '        line="$line $message"',
    "    fi",
    "",
    '    if [ ! -e "$log_dir" ] && ! mkdir -p -m 755 "$log_dir" 2>/dev/null; then',
    '        echo "Warning: Cannot create $log_dir, logging to stderr" >&2',
    "        printf '%s\\n' \"$line\" >&2",
    "        return 0",
    "    fi",
    "",
    "    if ! { printf '%s\\n' \"$line\" >> \"$log_file\"; } 2>/dev/null; then",
    '        echo "Warning: Cannot write to $log_file" >&2',
    "        printf '%s\\n' \"$line\" >&2",
    "    fi",
    "}",
    "",
  ].join("\n");
}

export function writeShellFunction(
  config: LoggerConfig,
  output: Writable = process.stdout,
): void {
  output.write(renderShellFunction(config));
}
