"use strict";

import type { Command } from "commander";

import { formatHumanSize } from "../../binary-utils.js";
import { RAW_SECTOR_SIZE } from "../../cdrom/mode2-sector.js";
import { buildDiscImage, stripExtension } from "../../tools/build.js";
import { formatterFor, withDefaultExtension, type CliContext } from "../lib/context.js";

type BuildCommandOptions = {
  cuefile?: boolean;
  verbose?: boolean;
};

export function registerBuildCommand(program: Command, context: CliContext): void {
  program
    .command("build")
    .description("Build a raw Mode 2 disc image from a catalog file and a directory tree")
    .argument("<catalog>", "catalog file; \".cat\" is assumed when no extension is given")
    .argument("[output]", "output image name (default: catalog name without extension)")
    .option("-c, --cuefile", "also write a .cue file for the image")
    .option("-v, --verbose", "print the layout of the image while building")
    .addHelpText(
      "after",
      `
The catalog "<name>.cat" describes the volume; the files are read from the
directory "<name>". The image is written to "<output>.bin".`
    )
    .action((catalog: string, output: string | undefined, options: BuildCommandOptions) => {
      const formatter = formatterFor(context, options);
      const catalogPath = withDefaultExtension(catalog, ".cat");
      const outputBase = stripExtension(output ?? catalogPath);

      const result = buildDiscImage({
        catalogPath,
        outputBase,
        writeCue: options.cuefile ?? false,
        host: context.host,
        reporter: formatter
      });
      const sectors = result.layout.volumeSize;
      formatter.success(`Built ${sectors} sectors, ${formatHumanSize(sectors * RAW_SECTOR_SIZE)}`);
    });
}
