"use strict";

/** Where the tools send progress; the CLI backs this with its chalk logger. */
export interface ToolReporter {
  info(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
}

export const silentReporter: ToolReporter = {
  info: () => undefined,
  debug: () => undefined,
  warn: () => undefined
};
