"use strict";

import chalk, { type ChalkInstance } from "chalk";

import type { ToolReporter } from "../../tools/reporter.js";

export interface OutputStreams {
  out(line: string): void;
  err(line: string): void;
}

export const consoleStreams: OutputStreams = {
  out: line => console.log(line),
  err: line => console.error(line)
};

export interface OutputOptions {
  verbose: boolean;
  quiet: boolean;
}

export class OutputFormatter implements ToolReporter {
  private readonly options: OutputOptions;
  private readonly streams: OutputStreams;
  private readonly colors: ChalkInstance;

  constructor(options: OutputOptions, streams: OutputStreams = consoleStreams, colors: ChalkInstance = chalk) {
    this.options = options;
    this.streams = streams;
    this.colors = colors;
  }

  get isVerbose(): boolean {
    return this.options.verbose;
  }

  success(message: string): void {
    if (!this.options.quiet) this.streams.out(`${this.colors.green("✓")} ${message}`);
  }

  error(message: string): void {
    this.streams.err(`${this.colors.red("✗")} ${this.colors.red(message)}`);
  }

  warn(message: string): void {
    if (!this.options.quiet) this.streams.err(`${this.colors.yellow("⚠")} Warning: ${message}`);
  }

  info(message: string): void {
    if (!this.options.quiet) this.streams.out(message);
  }

  debug(message: string): void {
    if (this.options.verbose) this.streams.out(this.colors.gray(message));
  }

  /** Unformatted output such as table rows. */
  raw(text: string): void {
    this.streams.out(text);
  }
}

export const createFormatter = (
  options: { verbose?: boolean; quiet?: boolean },
  streams?: OutputStreams,
  colors?: ChalkInstance
): OutputFormatter =>
  new OutputFormatter({ verbose: options.verbose ?? false, quiet: options.quiet ?? false }, streams, colors);
