#!/usr/bin/env node
// ABOUTME: CLI entry point for appvm-log.
// ABOUTME: Builds the default logger and runs the requested subcommand.

import { createProgram } from "./cli.js";
import { createConfig } from "./config.js";
import { createAuditLogger } from "./logger.js";
import { log } from "./log.js";

async function main() {
  try {
    const config = createConfig();
    const logger = createAuditLogger(config);
    await createProgram({ config, logger }).parseAsync(process.argv);
  } catch (err) {
    log(`Fatal error: ${err}`);
    process.exit(1);
  }
}

void main();
