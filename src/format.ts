// ABOUTME: Formats audit log entries and command strings.
// ABOUTME: Produces the "[timestamp] [ACTION] command: ... message" line format.

export interface LogEntry {
  timestamp: string;
  action: string;
  command?: string;
  message?: string;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Serializes an entry as a single newline-terminated line. Empty command or
 * message strings are omitted along with their separators.
 */
export function formatEntry(entry: LogEntry): string {
  let line = `[${entry.timestamp}] [${entry.action}]`;
  if (entry.command) {
    line += ` command: ${entry.command}`;
  }
  if (entry.message) {
    line += ` ${entry.message}`;
  }
  return line + "\n";
}

export function formatCommand(args: readonly unknown[]): string {
  return args.map((arg) => String(arg)).join(" ");
}
