"use strict";

import { asciiBytes, writeAsciiPadded, writeBothEndianUint16, writeBothEndianUint32, writeUint32Be, writeUint32Le } from "../../binary-utils.js";
import { encodeLongDateTime, toRecordingTime } from "./identifiers.js";
import { LOGICAL_BLOCK_SIZE, ISO_DIRECTORY } from "./directory-records.js";
import type { VolumeMetadata } from "./types.js";

export const ISO_PVD_SECTOR = 16;
export const ISO_TERMINATOR_SECTOR = 17;
export const PATH_TABLE_SECTOR = 18;
/** L table, L copy, M table, M copy */
export const PATH_TABLE_COPIES = 4;
export const ROOT_DIRECTORY_SECTOR = PATH_TABLE_SECTOR + PATH_TABLE_COPIES;

const STANDARD_IDENTIFIER = "CD001";
const XA_MARKER_OFFSET = 1024;
const XA_MARKER = "CD-XA001";
const ROOT_RECORD_OFFSET = 156;
const ROOT_RECORD_SIZE = 34;

export type PrimaryVolumeLayout = {
  volumeSpaceSize: number;
  pathTableSize: number;
  rootDirectorySector: number;
  rootDirectorySize: number;
};

const writeDescriptorHeader = (bytes: Uint8Array, type: number): void => {
  bytes[0] = type;
  bytes.set(asciiBytes(STANDARD_IDENTIFIER), 1);
  bytes[6] = 1;
};

export const encodeRootDirectoryRecord = (
  extent: number,
  dataLength: number,
  recordingTime: Uint8Array
): Uint8Array => {
  const out = new Uint8Array(ROOT_RECORD_SIZE);
  out[0] = ROOT_RECORD_SIZE;
  writeBothEndianUint32(out, 2, extent);
  writeBothEndianUint32(out, 10, dataLength);
  out.set(recordingTime.subarray(0, 7), 18);
  out[25] = ISO_DIRECTORY;
  writeBothEndianUint16(out, 28, 1);
  out[32] = 1;
  out[33] = 0x00;
  return out;
};

/** ECMA-119 8.4 Primary Volume Descriptor with the CD-XA marker in the application use area. */
export const encodePrimaryVolumeDescriptor = (metadata: VolumeMetadata, layout: PrimaryVolumeLayout): Uint8Array => {
  const pvd = new Uint8Array(LOGICAL_BLOCK_SIZE);
  writeDescriptorHeader(pvd, 1);
  writeAsciiPadded(pvd, 8, 32, metadata.systemId);
  writeAsciiPadded(pvd, 40, 32, metadata.volumeId);
  writeBothEndianUint32(pvd, 80, layout.volumeSpaceSize);
  writeBothEndianUint16(pvd, 120, 1);
  writeBothEndianUint16(pvd, 124, 1);
  writeBothEndianUint16(pvd, 128, LOGICAL_BLOCK_SIZE);
  writeBothEndianUint32(pvd, 132, layout.pathTableSize);
  writeUint32Le(pvd, 140, PATH_TABLE_SECTOR);
  writeUint32Le(pvd, 144, PATH_TABLE_SECTOR + 1);
  writeUint32Be(pvd, 148, PATH_TABLE_SECTOR + 2);
  writeUint32Be(pvd, 152, PATH_TABLE_SECTOR + 3);
  pvd.set(
    encodeRootDirectoryRecord(
      layout.rootDirectorySector,
      layout.rootDirectorySize,
      toRecordingTime(metadata.creationDate)
    ),
    ROOT_RECORD_OFFSET
  );
  writeAsciiPadded(pvd, 190, 128, metadata.volumeSetId);
  writeAsciiPadded(pvd, 318, 128, metadata.publisherId);
  writeAsciiPadded(pvd, 446, 128, metadata.preparerId);
  writeAsciiPadded(pvd, 574, 128, metadata.applicationId);
  writeAsciiPadded(pvd, 702, 37, metadata.copyrightFileId);
  writeAsciiPadded(pvd, 739, 37, metadata.abstractFileId);
  writeAsciiPadded(pvd, 776, 37, metadata.bibliographicFileId);
  encodeLongDateTime(pvd, 813, metadata.creationDate);
  encodeLongDateTime(pvd, 830, metadata.modificationDate);
  encodeLongDateTime(pvd, 847, metadata.expirationDate);
  encodeLongDateTime(pvd, 864, metadata.effectiveDate);
  pvd[881] = 1;
  pvd.set(asciiBytes(XA_MARKER), XA_MARKER_OFFSET);
  return pvd;
};

export const encodeVolumeDescriptorTerminator = (): Uint8Array => {
  const terminator = new Uint8Array(LOGICAL_BLOCK_SIZE);
  writeDescriptorHeader(terminator, 255);
  return terminator;
};
