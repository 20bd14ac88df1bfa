#!/usr/bin/env node
"use strict";

import { nodeHostFileSystem } from "../host/host-files.js";
import { runCli } from "./program.js";

try {
  process.exitCode = runCli(process.argv.slice(2), { host: nodeHostFileSystem });
} catch (error: unknown) {
  console.error(error instanceof Error ? `Error: ${error.message}` : "An unexpected error occurred");
  process.exitCode = 1;
}
