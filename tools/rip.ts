"use strict";

import { join } from "node:path";

import { DiscImageError } from "../errors.js";
import type { HostFile, HostFileSystem } from "../host/host-files.js";
import { DiscImage } from "../cdrom/disc-image.js";
import { FORM1_DATA_SIZE, MODE2_RAW_SECTOR_SIZE, SM_DATA } from "../cdrom/mode2-sector.js";
import { Iso9660Volume, statFromRecord, type Iso9660Stat } from "../analyzers/iso9660/index.js";
import { XA_ATTR_CDDA, XA_ATTR_INTERLEAVED, XA_ATTR_MODE2FORM2 } from "../builders/iso9660/directory-records.js";
import { SYSTEM_AREA_SECTORS } from "../builders/iso9660/image-writer.js";
import { CatalogWriter } from "../catalog/catalog-writer.js";
import { silentReporter, type ToolReporter } from "./reporter.js";

export type RipOptions = {
  imagePath: string;
  /** Output path without extension: "<base>.cat", "<base>.sys" and the directory "<base>". */
  outputBase: string;
  writeLbns: boolean;
  host: HostFileSystem;
  reporter?: ToolReporter;
};

export type RipResult = {
  catalogPath: string;
  systemAreaPath: string;
  outputDirectory: string;
  filesWritten: number;
  skipped: string[];
};

type FileKind = "file" | "form2" | "cdda";

const fileKindOf = (stat: Iso9660Stat): FileKind => {
  const attributes = stat.xa?.attributes ?? 0;
  if (attributes & XA_ATTR_CDDA) return "cdda";
  if (attributes & (XA_ATTR_MODE2FORM2 | XA_ATTR_INTERLEAVED)) return "form2";
  return "file";
};

export const stripVersion = (identifier: string): string => {
  const separator = identifier.lastIndexOf(";");
  return separator === -1 ? identifier : identifier.slice(0, separator);
};

const byLsn = (a: Iso9660Stat, b: Iso9660Stat): number => a.lsn - b.lsn;

const openDataVolume = (image: DiscImage, reporter: ToolReporter): Iso9660Volume => {
  const { info } = image;
  reporter.debug(`First track = ${info.firstTrack}`);
  reporter.debug(`Track format = ${info.format}`);
  if (info.format === "audio") {
    throw new DiscImageError("validation", `First track (${info.firstTrack}) is not a data track`);
  }
  return Iso9660Volume.open(image, message => reporter.warn(message));
};

const isAllZero = (bytes: Uint8Array): boolean => bytes.every(value => value === 0);

/**
 * Copies system area sectors while they are plain data sectors. Images
 * without subheaders stop at the first all-zero sector instead.
 */
const dumpSystemArea = (image: DiscImage, output: HostFile): void => {
  for (let sector = 0; sector < SYSTEM_AREA_SECTORS && sector < image.sectorCount; sector += 1) {
    if (image.isRawMode2) {
      const decoded = image.readMode2Sector(sector);
      if (decoded.subheader.submode !== SM_DATA) break;
      output.write(decoded.data);
    } else {
      const data = image.readDataSector(sector);
      if (isAllZero(data)) break;
      output.write(data);
    }
  }
};

class ImageRipper {
  private readonly volume: Iso9660Volume;
  private readonly host: HostFileSystem;
  private readonly reporter: ToolReporter;
  private readonly catalog: CatalogWriter;
  private filesWritten = 0;
  readonly skipped: string[] = [];

  constructor(volume: Iso9660Volume, host: HostFileSystem, reporter: ToolReporter, writeLbns: boolean) {
    this.volume = volume;
    this.host = host;
    this.reporter = reporter;
    this.catalog = new CatalogWriter({ writeLbns });
  }

  get fileCount(): number {
    return this.filesWritten;
  }

  get catalogText(): string {
    return this.catalog.toString();
  }

  writeHeader(systemAreaPath: string): void {
    const pvd = this.volume.primaryVolume;
    this.catalog.systemArea(systemAreaPath);
    this.catalog.volume({
      systemId: pvd.systemIdentifier,
      volumeId: pvd.volumeIdentifier,
      volumeSetId: pvd.volumeSetIdentifier,
      publisherId: pvd.publisherIdentifier,
      preparerId: pvd.dataPreparerIdentifier,
      applicationId: pvd.applicationIdentifier,
      copyrightFileId: pvd.copyrightFileIdentifier,
      abstractFileId: pvd.abstractFileIdentifier,
      bibliographicFileId: pvd.bibliographicFileIdentifier,
      creationDate: pvd.volumeCreationDateTime,
      modificationDate: pvd.volumeModificationDateTime,
      expirationDate: pvd.volumeExpirationDateTime,
      effectiveDate: pvd.volumeEffectiveDateTime
    });
  }

  dumpDirectory(directory: Iso9660Stat, isoPath: string, hostDirectory: string, name: string): void {
    this.reporter.debug(`Dumping '${isoPath}' as '${name}'`);
    this.host.makeDirectory(hostDirectory);
    this.catalog.openDirectory(name, directory.lsn);

    const children = this.volume.listDirectory(directory).sort(byLsn);
    for (const child of children) {
      if (child.isDirectory) {
        const childPath = isoPath === "" ? child.name : `${isoPath}/${child.name}`;
        this.dumpDirectory(child, childPath, join(hostDirectory, child.name), child.name);
        continue;
      }
      const entryName = stripVersion(child.name);
      const entryPath = isoPath === "" ? entryName : `${isoPath}/${entryName}`;
      const kind = fileKindOf(child);
      if (kind === "cdda") {
        this.reporter.info(`Skipping '${entryPath}' which is a CD-DA file`);
        this.skipped.push(entryPath);
        continue;
      }
      this.catalog.file(entryName, kind === "form2", child.lsn);
      this.dumpFile(child, kind === "form2", join(hostDirectory, entryName));
    }

    this.catalog.closeDirectory();
  }

  private dumpFile(stat: Iso9660Stat, isForm2: boolean, hostPath: string): void {
    const image = this.volume.image;
    if (isForm2) {
      this.reporter.debug(
        `XA file '${stat.name}' size = ${stat.size}, secsize = ${stat.sectorCount}, attributes = ${(stat.xa?.attributes ?? 0).toString(16).padStart(4, "0")}, filenum = ${stat.xa?.fileNumber ?? 0}`
      );
    }
    const blockSize = isForm2 ? MODE2_RAW_SECTOR_SIZE : FORM1_DATA_SIZE;
    let remaining = isForm2 ? stat.sectorCount * blockSize : stat.size;

    const output = this.host.openWrite(hostPath);
    try {
      for (let sector = 0; sector < stat.sectorCount && remaining > 0; sector += 1) {
        let block: Uint8Array;
        try {
          block = isForm2 ? image.readMode2Sector(stat.lsn + sector).mode2Raw : image.readDataSector(stat.lsn + sector);
        } catch (error) {
          if (!(error instanceof DiscImageError) || error.kind !== "io") throw error;
          this.reporter.warn(error.message);
          this.reporter.warn(`Output file "${hostPath}" may be incomplete`);
          break;
        }
        const count = Math.min(remaining, blockSize);
        output.write(block.subarray(0, count));
        remaining -= count;
      }
    } finally {
      output.close();
    }
    this.filesWritten += 1;
  }
}

/** Dumps an image to "<base>.sys", "<base>.cat" and the host tree under "<base>". */
export const ripDiscImage = (options: RipOptions): RipResult => {
  const { host, outputBase } = options;
  const reporter = options.reporter ?? silentReporter;
  const catalogPath = `${outputBase}.cat`;
  const systemAreaPath = `${outputBase}.sys`;

  reporter.info(`Analyzing image "${options.imagePath}"...`);
  const image = DiscImage.open(options.imagePath, host);
  try {
    const volume = openDataVolume(image, reporter);
    reporter.info(`Volume ID = ${volume.primaryVolume.volumeIdentifier}`);

    const systemArea = host.openWrite(systemAreaPath);
    try {
      dumpSystemArea(image, systemArea);
    } finally {
      systemArea.close();
    }
    reporter.info(`System area data written to "${systemAreaPath}"`);

    const ripper = new ImageRipper(volume, host, reporter, options.writeLbns);
    ripper.writeHeader(systemAreaPath);
    reporter.info(`Dumping filesystem to directory "${outputBase}"...`);
    ripper.dumpDirectory(volume.root, "", outputBase, "");
    host.writeText(catalogPath, ripper.catalogText);
    reporter.info(`Catalog written to "${catalogPath}"`);

    return {
      catalogPath,
      systemAreaPath,
      outputDirectory: outputBase,
      filesWritten: ripper.fileCount,
      skipped: ripper.skipped
    };
  } finally {
    image.close();
  }
};

const hex8 = (value: number): string => (value >>> 0).toString(16).padStart(8, "0");

const lbnRow = (lsn: number, sectors: number, size: number, type: string, path: string): string =>
  `${hex8(lsn)} ${hex8(sectors)} ${hex8(size)} ${type} ${path}`;

const collectLbnRows = (volume: Iso9660Volume, directory: Iso9660Stat, isoPath: string, rows: string[]): void => {
  const records = volume.readDirectoryRecords(directory);
  const self = records.find(record => record.isDotEntry);
  const selfSize = self?.dataLength ?? directory.size;
  rows.push(
    lbnRow(self?.extentLocationLba ?? directory.lsn, Math.ceil(selfSize / FORM1_DATA_SIZE), selfSize, "d", isoPath)
  );

  const children = records
    .filter(record => !record.isDotEntry && !record.isDotDotEntry)
    .map(statFromRecord)
    .sort(byLsn);
  for (const child of children) {
    const entryName = stripVersion(child.name);
    const entryPath = isoPath === "" ? entryName : `${isoPath}/${entryName}`;
    if (child.isDirectory) {
      collectLbnRows(volume, child, entryPath, rows);
      continue;
    }
    const attributes = child.xa?.attributes ?? 0;
    let type = "f";
    let size = child.size;
    if (attributes & (XA_ATTR_MODE2FORM2 | XA_ATTR_INTERLEAVED)) {
      type = "x";
      size = child.sectorCount * MODE2_RAW_SECTOR_SIZE;
    }
    if (attributes & XA_ATTR_CDDA) type = "a";
    rows.push(lbnRow(child.lsn, child.sectorCount, size, type, entryPath));
  }
};

/** Header line plus one row per directory and file, each directory's entries in LBN order. */
export const formatLbnTable = (volume: Iso9660Volume): string[] => {
  const rows = [`${"LBN".padStart(8)} ${"NumSec".padStart(8)} ${"Size".padStart(8)} T Path`];
  collectLbnRows(volume, volume.root, "", rows);
  return rows;
};

export const readLbnTable = (options: { imagePath: string; host: HostFileSystem; reporter?: ToolReporter }): string[] => {
  const reporter = options.reporter ?? silentReporter;
  const image = DiscImage.open(options.imagePath, options.host);
  try {
    return formatLbnTable(openDataVolume(image, reporter));
  } finally {
    image.close();
  }
};
