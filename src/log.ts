// ABOUTME: Stderr output for permission warnings and entries that could not reach a log file.
// ABOUTME: Nothing here touches stdout, which carries only shell-function output.

export function log(msg: string): void {
  process.stderr.write(msg + "\n");
}

// Entries are already newline-terminated
export function write(text: string): void {
  process.stderr.write(text);
}
