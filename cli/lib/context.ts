"use strict";

import { extname } from "node:path";
import type { ChalkInstance } from "chalk";

import type { HostFileSystem } from "../../host/host-files.js";
import { createFormatter, type OutputFormatter, type OutputStreams } from "./output.js";

/** Everything a command needs from its surroundings, so tests can run commands in memory. */
export interface CliContext {
  host: HostFileSystem;
  streams?: OutputStreams;
  colors?: ChalkInstance;
}

export const formatterFor = (context: CliContext, options: { verbose?: boolean }): OutputFormatter =>
  createFormatter(options, context.streams, context.colors);

/** Appends `extension` when `path` has none. */
export const withDefaultExtension = (path: string, extension: string): string =>
  extname(path) === "" ? `${path}${extension}` : path;
