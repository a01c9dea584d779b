// ABOUTME: Command-line surface for scripts that log through the binary.
// ABOUTME: Wires log, command, init, and shell-function subcommands to an AuditLogger.

import { Command } from "commander";
import type { Writable } from "node:stream";
import { buildLogRequest, type LoggerConfig } from "./config.js";
import type { AuditLogger } from "./logger.js";
import { log } from "./log.js";
import { writeShellFunction } from "./shell.js";

export interface ProgramDeps {
  config: LoggerConfig;
  logger: AuditLogger;
  output?: Writable;
}

export function createProgram(deps: ProgramDeps): Command {
  const output = deps.output ?? process.stdout;
  const program = new Command();

  program
    .name("appvm-log")
    .description("Append timestamped audit entries for appvm components")
    .version("0.1.0")
    .enablePositionalOptions();

  program
    .command("log")
    .description("Log an action with an optional command and message")
    .argument("<component>", "appvm, qemu-hook or guest-init (anything else goes to appvm.log)")
    .argument("<action>", "Action tag, e.g. CREATE, START, PREPARE")
    .argument("[message...]", "Free-form message; words after the component may start with -")
    .option("--command <cmd>", "Command line being executed, recorded verbatim (give before <component>)")
    .passThroughOptions()
    .action((component: string, action: string, message: string[], opts: { command?: string }) => {
      const request = buildLogRequest({
        component,
        action,
        command: opts.command,
        message: message.join(" "),
      });
      deps.logger.log(request.component, request.action, request.command, request.message);
    });

  program
    .command("command")
    .description("Log a command given as separate arguments")
    .argument("<component>", "Component name")
    .argument("<action>", "Action tag")
    .argument("<args...>", "Command and its arguments")
    .passThroughOptions()
    .action((component: string, action: string, args: string[]) => {
      const request = buildLogRequest({ component, action });
      deps.logger.logCommand(request.component, request.action, args);
    });

  program
    .command("init")
    .description("Create the log directory if it does not exist")
    .action(() => {
      if (!deps.logger.ensureLogDirectory()) {
        process.exitCode = 1;
        return;
      }
      log(`Log directory ready: ${deps.config.directory}`);
    });

  program
    .command("shell-function")
    .description("Print the log_action bash function for use with eval")
    .action(() => {
      writeShellFunction(deps.config, output);
    });

  return program;
}
