"use strict";

import { writeBothEndianUint32 } from "../binary-utils.js";
import { DiscImageError } from "../errors.js";
import { readFully, type HostFileSystem } from "../host/host-files.js";
import { DiscImage } from "../cdrom/disc-image.js";
import {
  FORM1_DATA_SIZE,
  MODE2_RAW_SECTOR_SIZE,
  RAW_SECTOR_SIZE,
  SM_DATA,
  SM_EOF,
  SM_EOR,
  dataSubheader,
  encodeMode2Sector,
  encodeRawXaSector,
  extentSubmode
} from "../cdrom/mode2-sector.js";
import { Iso9660Volume, splitIsoPath } from "../analyzers/iso9660/index.js";
import { ISO_DIRECTORY, XA_ATTR_INTERLEAVED, XA_ATTR_MODE2FORM2 } from "../builders/iso9660/directory-records.js";
import { silentReporter, type ToolReporter } from "./reporter.js";

export type InjectOptions = {
  imagePath: string;
  /** Path of the file inside the image, without the ";1" version suffix. */
  targetPath: string;
  newFilePath: string;
  host: HostFileSystem;
  reporter?: ToolReporter;
};

export type InjectResult = {
  lsn: number;
  sectors: number;
  size: number;
  isForm2: boolean;
  directorySector: number;
  recordOffset: number;
};

const RECORD_FLAGS_OFFSET = 25;
const RECORD_NAME_LENGTH_OFFSET = 32;
const RECORD_NAME_OFFSET = 33;
const RECORD_DATA_LENGTH_OFFSET = 10;

/**
 * Offset of the non-directory record named `searchName` inside one directory
 * sector, or null. Zero bytes between records are skipped one at a time.
 */
export const findFileRecord = (sector: Uint8Array, searchName: string): number | null => {
  let offset = 0;
  while (offset < sector.length) {
    const recordLength = sector[offset] ?? 0;
    if (recordLength === 0) {
      offset += 1;
      continue;
    }
    if (offset + recordLength > sector.length || recordLength <= RECORD_NAME_OFFSET) return null;
    const flags = sector[offset + RECORD_FLAGS_OFFSET] ?? 0;
    if (!(flags & ISO_DIRECTORY)) {
      const nameLength = sector[offset + RECORD_NAME_LENGTH_OFFSET] ?? 0;
      const nameEnd = offset + RECORD_NAME_OFFSET + nameLength;
      if (nameEnd <= offset + recordLength) {
        const name = String.fromCharCode(...sector.subarray(offset + RECORD_NAME_OFFSET, nameEnd));
        if (name === searchName) return offset;
      }
    }
    offset += recordLength;
  }
  return null;
};

type InjectionPlan = {
  binPath: string;
  imageIsMode2: boolean;
  lsn: number;
  isForm2: boolean;
  numSectors: number;
  newSize: number;
  directorySector: number;
  directoryData: Uint8Array;
  isLastDirectorySector: boolean;
  recordOffset: number;
};

const planInjection = (image: DiscImage, options: InjectOptions, reporter: ToolReporter): InjectionPlan => {
  const { targetPath, newFilePath, host } = options;
  const { info } = image;
  reporter.debug(`First track = ${info.firstTrack}`);
  if (info.format === "audio") {
    throw new DiscImageError("validation", `First track (${info.firstTrack}) is not a data track`);
  }
  const imageIsMode2 = image.isRawMode2;
  if (!imageIsMode2 && info.sectorSize !== FORM1_DATA_SIZE) {
    throw new DiscImageError("validation", `Image "${info.binPath}" is neither raw Mode 2 nor a 2048-byte data image`);
  }

  const volume = Iso9660Volume.open(image, message => reporter.warn(message));
  const components = splitIsoPath(targetPath);
  const fileName = components.pop();
  if (fileName === undefined) throw new DiscImageError("validation", `'${targetPath}' does not refer to a file`);

  const stat = volume.stat([...components, `${fileName};1`].join("/"));
  if (!stat) throw new DiscImageError("validation", `Cannot find '${targetPath}' in image`);
  if (stat.isDirectory) throw new DiscImageError("validation", `'${targetPath}' does not refer to a file`);

  const attributes = stat.xa?.attributes ?? 0;
  const isForm2 = (attributes & (XA_ATTR_MODE2FORM2 | XA_ATTR_INTERLEAVED)) !== 0;
  const maxSectors = stat.sectorCount;
  reporter.debug(
    `'${targetPath}' (form ${isForm2 ? 2 : 1}) found at LBN ${stat.lsn}, length = ${maxSectors} sectors (${stat.size} bytes)`
  );

  const newSize = host.fileSize(newFilePath);
  const blockSize = isForm2 ? MODE2_RAW_SECTOR_SIZE : FORM1_DATA_SIZE;
  if (isForm2) {
    if (!imageIsMode2) {
      throw new DiscImageError(
        "validation",
        `'${targetPath}' is a form 2 file but '${options.imagePath}' is not a raw mode 2 image`
      );
    }
    if (newSize % blockSize !== 0) {
      throw new DiscImageError(
        "validation",
        `'${targetPath}' is a form 2 file but the size of ${newFilePath} is not a multiple of ${blockSize} bytes`
      );
    }
  }

  const numSectors = Math.max(1, Math.ceil(newSize / blockSize));
  if (numSectors > maxSectors) {
    throw new DiscImageError(
      "capacity",
      `${newFilePath} would require ${numSectors} sectors but there is only room for ${maxSectors} sectors (${maxSectors * blockSize} bytes)`
    );
  }

  const dirPath = components.length ? components.join("/") : "/";
  const directory = volume.stat(dirPath);
  if (!directory) throw new DiscImageError("validation", `Cannot find '${dirPath}' in image`);
  if (!directory.isDirectory) throw new DiscImageError("validation", `'${dirPath}' does not refer to a directory`);

  const searchName = `${fileName};1`;
  for (let index = 0; index < directory.sectorCount; index += 1) {
    const directoryData = image.readDataSector(directory.lsn + index);
    const recordOffset = findFileRecord(directoryData, searchName);
    if (recordOffset != null) {
      return {
        binPath: info.binPath,
        imageIsMode2,
        lsn: stat.lsn,
        isForm2,
        numSectors,
        newSize,
        directorySector: directory.lsn + index,
        directoryData,
        isLastDirectorySector: index === directory.sectorCount - 1,
        recordOffset
      };
    }
  }
  throw new DiscImageError("validation", `'${searchName}' not found in directory '${dirPath}'`);
};

/**
 * Replaces the contents of one file in place. The new data must fit in the
 * sectors the file already occupies; only its extent and the size field of
 * its directory record change.
 */
export const injectFile = (options: InjectOptions): InjectResult => {
  const { host } = options;
  const reporter = options.reporter ?? silentReporter;

  const image = DiscImage.open(options.imagePath, host);
  let plan: InjectionPlan;
  try {
    plan = planInjection(image, options, reporter);
  } finally {
    image.close();
  }

  const outputBlockSize = plan.imageIsMode2 ? RAW_SECTOR_SIZE : FORM1_DATA_SIZE;
  const blockSize = plan.isForm2 ? MODE2_RAW_SECTOR_SIZE : FORM1_DATA_SIZE;
  const recordedSize = plan.isForm2 ? plan.numSectors * FORM1_DATA_SIZE : plan.newSize;
  const output = host.openReadWrite(plan.binPath);
  try {
    const source = host.openRead(options.newFilePath);
    try {
      const block = new Uint8Array(blockSize);
      for (let index = 0; index < plan.numSectors; index += 1) {
        readFully(source, block, index * blockSize);
        const lsn = plan.lsn + index;
        let frame: Uint8Array;
        if (!plan.imageIsMode2) {
          frame = block;
        } else if (plan.isForm2) {
          frame = encodeRawXaSector(block, lsn);
        } else {
          frame = encodeMode2Sector(block, lsn, dataSubheader(extentSubmode(index, plan.numSectors)));
        }
        output.write(frame, lsn * outputBlockSize);
      }
    } finally {
      source.close();
    }

    writeBothEndianUint32(plan.directoryData, plan.recordOffset + RECORD_DATA_LENGTH_OFFSET, recordedSize);
    const directoryFrame = plan.imageIsMode2
      ? encodeMode2Sector(
          plan.directoryData,
          plan.directorySector,
          dataSubheader(plan.isLastDirectorySector ? SM_DATA | SM_EOF | SM_EOR : SM_DATA)
        )
      : plan.directoryData;
    output.write(directoryFrame, plan.directorySector * outputBlockSize);
  } finally {
    output.close();
  }

  reporter.info(`File '${options.targetPath}' replaced in "${plan.binPath}"`);
  return {
    lsn: plan.lsn,
    sectors: plan.numSectors,
    size: recordedSize,
    isForm2: plan.isForm2,
    directorySector: plan.directorySector,
    recordOffset: plan.recordOffset
  };
};
