"use strict";

import { RAW_SECTOR_SIZE } from "../../cdrom/mode2-sector.js";
import type { PushIssue } from "../../errors.js";
import type { HostFileSystem } from "../../host/host-files.js";
import { LOGICAL_BLOCK_SIZE, buildDirectoryExtents, calculateDirectorySizes } from "./directory-records.js";
import type { FilesystemTree } from "./filesystem-tree.js";
import { ImageWriter, type SectorSink } from "./image-writer.js";
import { buildPathTables, type PathTableBuilder } from "./path-table.js";
import { allocateSectors, type StartSectorOverride } from "./sector-allocator.js";
import type { VolumeMetadata } from "./types.js";
import {
  ROOT_DIRECTORY_SECTOR,
  encodePrimaryVolumeDescriptor,
  encodeVolumeDescriptorTerminator
} from "./volume-descriptors.js";

/** 74 minutes of 75 sectors per second. */
export const MAX_ISO_SECTORS = 333000;

export type DiscLayout = {
  tree: FilesystemTree;
  metadata: VolumeMetadata;
  volumeSize: number;
  pathTables: PathTableBuilder;
  overrides: StartSectorOverride[];
};

/**
 * Runs the layout passes in their fixed order: directory sizes, sector
 * allocation, directory extents, path tables. Mutates the tree in place.
 */
export const layoutDiscImage = (
  tree: FilesystemTree,
  metadata: VolumeMetadata,
  pushIssue: PushIssue
): DiscLayout => {
  calculateDirectorySizes(tree);
  const allocator = allocateSectors(tree, ROOT_DIRECTORY_SECTOR, pushIssue);
  const volumeSize = allocator.currentSector;
  if (volumeSize > MAX_ISO_SECTORS) {
    const mebibytes = Math.floor((MAX_ISO_SECTORS * RAW_SECTOR_SIZE) / (1024 * 1024));
    pushIssue(`Output image larger than ${mebibytes} MiB`);
  }
  buildDirectoryExtents(tree, metadata);
  const pathTables = buildPathTables(tree);
  return { tree, metadata, volumeSize, pathTables, overrides: allocator.overrides };
};

export const writeDiscImage = (
  layout: DiscLayout,
  sink: SectorSink,
  host: HostFileSystem,
  log?: (message: string) => void
): number => {
  const writer = new ImageWriter(sink, log);
  writer.writeSystemArea(layout.metadata.systemArea);
  writer.writePrimaryDescriptor(
    encodePrimaryVolumeDescriptor(layout.metadata, {
      volumeSpaceSize: layout.volumeSize,
      pathTableSize: layout.pathTables.size,
      rootDirectorySector: layout.tree.root.firstSector,
      rootDirectorySize: layout.tree.root.numSectors * LOGICAL_BLOCK_SIZE
    })
  );
  writer.writeTerminator(encodeVolumeDescriptorTerminator());
  writer.writePathTables(layout.pathTables.typeL, layout.pathTables.typeM);
  writer.writeExtents(layout.tree, host);
  return writer.currentSector;
};

/** One line per node in allocation order, for verbose output. */
export const describeLayout = (layout: DiscLayout): string[] => {
  const lines: string[] = [];
  for (const node of layout.tree.traverse("pre-order")) {
    if (node.kind === "directory") {
      lines.push(
        `${node.hostPath} (${node.numSectors} sectors @ ${node.firstSector}, PT record ${node.recordNumber})`
      );
    } else {
      lines.push(`${node.hostPath} (${node.numSectors} sectors @ ${node.firstSector}, ${node.size} bytes)`);
    }
  }
  return lines;
};

export { FilesystemTree } from "./filesystem-tree.js";
export { HostFileSectorSink, ImageWriter } from "./image-writer.js";
export type { SectorSink } from "./image-writer.js";
export { createVolumeMetadata } from "./identifiers.js";
export type { DirectoryNode, FileNode, FilesystemNode, LongDateTime, VolumeMetadata } from "./types.js";
