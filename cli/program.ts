"use strict";

import { Command, CommanderError } from "commander";

import { DiscImageError } from "../errors.js";
import { registerBuildCommand } from "./commands/build.js";
import { registerInjectCommand } from "./commands/inject.js";
import { registerRipCommand } from "./commands/rip.js";
import { formatterFor, type CliContext } from "./lib/context.js";
import { consoleStreams } from "./lib/output.js";

export const VERSION = "2.0.0";

/** Exit status for command line usage errors (sysexits EX_USAGE). */
export const EXIT_USAGE = 64;

export const createProgram = (context: CliContext): Command => {
  const streams = context.streams ?? consoleStreams;
  const program = new Command();

  program
    .name("psxdisc")
    .description("Build, patch and rip PlayStation disc images")
    .version(VERSION, "-V, --version")
    .configureOutput({
      writeOut: text => streams.out(text.replace(/\n$/, "")),
      writeErr: text => streams.err(text.replace(/\n$/, ""))
    })
    .exitOverride();

  registerBuildCommand(program, context);
  registerInjectCommand(program, context);
  registerRipCommand(program, context);
  return program;
};

/** Runs one command line (without the node and script arguments) and returns the exit status. */
export const runCli = (args: string[], context: CliContext): number => {
  const program = createProgram(context);
  try {
    program.parse(args, { from: "user" });
    return 0;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      if (error.code === "commander.helpDisplayed" || error.code === "commander.version") return 0;
      return error.exitCode === 0 ? 0 : EXIT_USAGE;
    }
    if (error instanceof DiscImageError) {
      formatterFor(context, {}).error(error.message);
      return 1;
    }
    throw error;
  }
};
