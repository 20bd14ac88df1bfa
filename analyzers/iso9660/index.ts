"use strict";

import { DiscImageError, type PushIssue } from "../../errors.js";
import type { DiscImage } from "../../cdrom/disc-image.js";
import type {
  Iso9660DirectoryRecord,
  Iso9660PathTableEntry,
  Iso9660PrimaryVolumeDescriptor,
  Iso9660Stat,
  Iso9660VolumeDescriptorSummary
} from "./types.js";
import { ISO9660_DESCRIPTOR_BLOCK_SIZE, ISO9660_SYSTEM_AREA_BLOCKS } from "./iso-parsing.js";
import { scanDirectoryBytes } from "./directory-records.js";
import { parsePathTable } from "./path-table.js";
import { parseDescriptorSummary, parsePrimaryVolumeDescriptor } from "./volume-descriptors.js";

const MAX_DESCRIPTORS = 128;
const TERMINATOR_TYPE = 255;
const PRIMARY_TYPE = 1;

export const statFromRecord = (record: Iso9660DirectoryRecord): Iso9660Stat => {
  const size = record.dataLength ?? 0;
  return {
    name: record.fileIdentifierRaw,
    lsn: record.extentLocationLba ?? 0,
    size,
    sectorCount: Math.ceil(size / ISO9660_DESCRIPTOR_BLOCK_SIZE),
    isDirectory: record.isDirectory,
    xa: record.xa
  };
};

/** Splits "/DATA/LEVEL1.BIN;1" or "DATA/LEVEL1.BIN;1" into its components. */
export const splitIsoPath = (path: string): string[] => path.split("/").filter(part => part.length > 0);

/**
 * Read access to the ISO 9660 filesystem of a disc image: volume descriptors,
 * the type L path table and directory lookups. Lookups compare the full
 * stored identifier, version suffix included, case-sensitively.
 */
export class Iso9660Volume {
  readonly image: DiscImage;
  readonly descriptors: Iso9660VolumeDescriptorSummary[];
  readonly primaryVolume: Iso9660PrimaryVolumeDescriptor;
  readonly pathTable: Iso9660PathTableEntry[];
  private readonly pushIssue: PushIssue;

  private constructor(
    image: DiscImage,
    descriptors: Iso9660VolumeDescriptorSummary[],
    primaryVolume: Iso9660PrimaryVolumeDescriptor,
    pathTable: Iso9660PathTableEntry[],
    pushIssue: PushIssue
  ) {
    this.image = image;
    this.descriptors = descriptors;
    this.primaryVolume = primaryVolume;
    this.pathTable = pathTable;
    this.pushIssue = pushIssue;
  }

  static open(image: DiscImage, pushIssue: PushIssue = () => undefined): Iso9660Volume {
    const descriptors: Iso9660VolumeDescriptorSummary[] = [];
    let primaryVolume: Iso9660PrimaryVolumeDescriptor | null = null;

    for (let index = 0; index < MAX_DESCRIPTORS; index += 1) {
      const sector = ISO9660_SYSTEM_AREA_BLOCKS + index;
      if (sector >= image.sectorCount) {
        pushIssue(`Volume descriptor set is not terminated before sector ${sector}.`);
        break;
      }
      const bytes = image.readDataSector(sector);
      const summary = parseDescriptorSummary(bytes, sector);
      if (!summary || summary.identifier !== "CD001") break;
      descriptors.push(summary);
      if (summary.typeCode === PRIMARY_TYPE && !primaryVolume) {
        primaryVolume = parsePrimaryVolumeDescriptor(bytes, pushIssue);
      }
      if (summary.typeCode === TERMINATOR_TYPE) break;
    }

    if (!primaryVolume) {
      throw new DiscImageError("validation", "No ISO 9660 filesystem on data track");
    }
    if (!primaryVolume.rootDirectoryRecord) {
      throw new DiscImageError("validation", "Error reading ISO 9660 volume information");
    }

    let pathTable: Iso9660PathTableEntry[] = [];
    const location = primaryVolume.typeLPathTableLocation;
    const size = primaryVolume.pathTableSize ?? 0;
    if (location != null && size > 0) {
      const sectors = Math.ceil(size / ISO9660_DESCRIPTOR_BLOCK_SIZE);
      pathTable = parsePathTable(image.readDataSectors(location, sectors).subarray(0, size), "L", pushIssue);
    }
    return new Iso9660Volume(image, descriptors, primaryVolume, pathTable, pushIssue);
  }

  get root(): Iso9660Stat {
    const record = this.primaryVolume.rootDirectoryRecord;
    if (!record) throw new DiscImageError("validation", "Error reading ISO 9660 volume information");
    return statFromRecord(record);
  }

  /** All records of a directory extent, "." and ".." included, in on-disk order. */
  readDirectoryRecords(directory: Iso9660Stat): Iso9660DirectoryRecord[] {
    if (!directory.isDirectory) {
      throw new DiscImageError("validation", `'${directory.name}' does not refer to a directory`);
    }
    const bytes = this.image.readDataSectors(directory.lsn, directory.sectorCount).subarray(0, directory.size);
    return scanDirectoryBytes(bytes, this.pushIssue).map(located => located.record);
  }

  /** Entries of a directory without "." and "..". */
  listDirectory(directory: Iso9660Stat): Iso9660Stat[] {
    return this.readDirectoryRecords(directory)
      .filter(record => !record.isDotEntry && !record.isDotDotEntry)
      .map(statFromRecord);
  }

  readDirectory(path: string): Iso9660Stat[] {
    const directory = this.stat(path);
    if (!directory) throw new DiscImageError("validation", `Error reading ISO 9660 directory '${path}'`);
    return this.listDirectory(directory);
  }

  /** Looks up a file or directory; null when any component is missing. */
  stat(path: string): Iso9660Stat | null {
    let current = this.root;
    for (const component of splitIsoPath(path)) {
      if (!current.isDirectory) return null;
      const match = this.readDirectoryRecords(current).find(
        record => !record.isDotEntry && !record.isDotDotEntry && record.fileIdentifierRaw === component
      );
      if (!match) return null;
      current = statFromRecord(match);
    }
    return current;
  }
}

export type {
  Iso9660DirectoryRecord,
  Iso9660PathTableEntry,
  Iso9660PrimaryVolumeDescriptor,
  Iso9660Stat,
  XaSystemUse
} from "./types.js";
