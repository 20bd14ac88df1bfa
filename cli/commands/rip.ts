"use strict";

import type { Command } from "commander";

import { readLbnTable, ripDiscImage } from "../../tools/rip.js";
import { stripExtension } from "../../tools/build.js";
import { formatterFor, withDefaultExtension, type CliContext } from "../lib/context.js";

type RipCommandOptions = {
  lbns?: boolean;
  lbnTable?: boolean;
  verbose?: boolean;
};

export function registerRipCommand(program: Command, context: CliContext): void {
  program
    .command("rip")
    .description("Dump the filesystem of a disc image into a catalog file and a directory tree")
    .argument("<image>", "image file (.bin or .cue; \".bin\" is assumed when no extension is given)")
    .argument("[output]", "output name for \"<output>.cat\", \"<output>.sys\" and the directory \"<output>\"")
    .option("-l, --lbns", "write the LBN of every file and directory into the catalog")
    .option("-t, --lbn-table", "print a table of LBNs and sizes instead of dumping")
    .option("-v, --verbose", "print details while dumping")
    .action((image: string, output: string | undefined, options: RipCommandOptions) => {
      const formatter = formatterFor(context, options);
      const imagePath = withDefaultExtension(image, ".bin");

      if (options.lbnTable) {
        for (const row of readLbnTable({ imagePath, host: context.host, reporter: formatter })) {
          formatter.raw(row);
        }
        return;
      }

      const result = ripDiscImage({
        imagePath,
        outputBase: output ?? stripExtension(imagePath),
        writeLbns: options.lbns ?? false,
        host: context.host,
        reporter: formatter
      });
      formatter.success(`Dumped ${result.filesWritten} files`);
    });
}
