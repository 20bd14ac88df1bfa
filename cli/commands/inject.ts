"use strict";

import type { Command } from "commander";

import { injectFile } from "../../tools/inject.js";
import { formatterFor, withDefaultExtension, type CliContext } from "../lib/context.js";

export function registerInjectCommand(program: Command, context: CliContext): void {
  program
    .command("inject")
    .description("Replace the contents of a file inside a disc image")
    .argument("<image>", "image file (.bin or .cue; \".bin\" is assumed when no extension is given)")
    .argument("<path>", "path of the file inside the image, e.g. DATA/LEVEL1.BIN")
    .argument("<newfile>", "host file with the new contents")
    .option("-v, --verbose", "print details about the replaced file")
    .action((image: string, path: string, newFile: string, options: { verbose?: boolean }) => {
      const formatter = formatterFor(context, options);
      const result = injectFile({
        imagePath: withDefaultExtension(image, ".bin"),
        targetPath: path,
        newFilePath: newFile,
        host: context.host,
        reporter: formatter
      });
      formatter.debug(
        `Wrote ${result.sectors} sectors at LBN ${result.lsn}, directory record at sector ${result.directorySector} offset ${result.recordOffset}`
      );
    });
}
