"use strict";

import { basename } from "node:path";

import { readFully, type HostFileSystem } from "../host/host-files.js";
import { formatCueSheet } from "../cdrom/disc-image.js";
import { parseCatalog } from "../catalog/catalog-parser.js";
import { HostFileSectorSink, SYSTEM_AREA_SIZE } from "../builders/iso9660/image-writer.js";
import { describeLayout, layoutDiscImage, writeDiscImage, type DiscLayout } from "../builders/iso9660/index.js";
import { silentReporter, type ToolReporter } from "./reporter.js";

export type BuildOptions = {
  catalogPath: string;
  /** Output path without extension; ".bin" and ".cue" are appended. */
  outputBase: string;
  writeCue: boolean;
  host: HostFileSystem;
  reporter?: ToolReporter;
};

export type BuildResult = {
  imagePath: string;
  cuePath: string | null;
  layout: DiscLayout;
};

export const stripExtension = (path: string): string => {
  const name = basename(path);
  const dot = name.lastIndexOf(".");
  return dot > 0 ? path.slice(0, path.length - (name.length - dot)) : path;
};

const readSystemArea = (path: string, host: HostFileSystem): Uint8Array => {
  const file = host.openRead(path);
  try {
    const buffer = new Uint8Array(SYSTEM_AREA_SIZE);
    const count = readFully(file, buffer, 0);
    return buffer.subarray(0, count);
  } finally {
    file.close();
  }
};

/** Catalog and host tree in, raw Mode 2 image (and optionally a cue sheet) out. */
export const buildDiscImage = (options: BuildOptions): BuildResult => {
  const { host } = options;
  const reporter = options.reporter ?? silentReporter;
  const basePath = stripExtension(options.catalogPath);

  reporter.info(`Reading catalog file "${options.catalogPath}"...`);
  reporter.info(`Reading filesystem from directory "${basePath}"...`);
  const catalog = parseCatalog(host.readText(options.catalogPath), { basePath, host });
  if (catalog.systemAreaFile != null) {
    catalog.metadata.systemArea = readSystemArea(catalog.systemAreaFile, host);
  }

  const layout = layoutDiscImage(catalog.tree, catalog.metadata, message => reporter.warn(message));
  for (const line of describeLayout(layout)) reporter.debug(line);

  const imagePath = `${options.outputBase}.bin`;
  const image = host.openWrite(imagePath);
  try {
    const sink = new HostFileSectorSink(image);
    writeDiscImage(layout, sink, host, message => reporter.debug(message));
    sink.flush();
  } finally {
    image.close();
  }
  reporter.info(`Image file written to "${imagePath}"`);

  let cuePath: string | null = null;
  if (options.writeCue) {
    cuePath = `${options.outputBase}.cue`;
    host.writeText(cuePath, formatCueSheet(basename(imagePath)));
    reporter.info(`Cue file written to "${cuePath}"`);
  }

  return { imagePath, cuePath, layout };
};
