"use strict";

import { asciiBytes, sectorsFor, writeBothEndianUint16, writeBothEndianUint32, writeUint16Be } from "../../binary-utils.js";
import { FORM1_DATA_SIZE } from "../../cdrom/mode2-sector.js";
import type { FilesystemTree } from "./filesystem-tree.js";
import { toRecordingTime } from "./identifiers.js";
import type { DirectoryNode, FilesystemNode, VolumeMetadata } from "./types.js";

export const LOGICAL_BLOCK_SIZE = FORM1_DATA_SIZE;

// ECMA-119 9.1.6 file flags
export const ISO_FILE = 0x00;
export const ISO_EXISTENCE = 0x01;
export const ISO_DIRECTORY = 0x02;

// CD-ROM XA system use field: permission and attribute bits
export const XA_PERM_RSYS = 0x0001;
export const XA_PERM_XSYS = 0x0004;
export const XA_PERM_RUSR = 0x0010;
export const XA_PERM_XUSR = 0x0040;
export const XA_PERM_RGRP = 0x0100;
export const XA_PERM_XGRP = 0x0400;
export const XA_ATTR_MODE2FORM1 = 0x0800;
export const XA_ATTR_MODE2FORM2 = 0x1000;
export const XA_ATTR_INTERLEAVED = 0x2000;
export const XA_ATTR_CDDA = 0x4000;
export const XA_ATTR_DIRECTORY = 0x8000;

const XA_PERM_ALL =
  XA_PERM_RSYS | XA_PERM_XSYS | XA_PERM_RUSR | XA_PERM_XUSR | XA_PERM_RGRP | XA_PERM_XGRP;

export const XA_FORM1_DIR = XA_ATTR_DIRECTORY | XA_ATTR_MODE2FORM1 | XA_PERM_ALL;
export const XA_FORM1_FILE = XA_ATTR_MODE2FORM1 | XA_PERM_ALL;
export const XA_FORM2_FILE = XA_ATTR_MODE2FORM2 | XA_PERM_ALL;

export const XA_EXTENSION_SIZE = 14;
const DIRECTORY_RECORD_HEADER_SIZE = 33;

export type XaAttributes = {
  groupId: number;
  userId: number;
  attributes: number;
  fileNumber: number;
};

export const encodeXaExtension = (xa: XaAttributes): Uint8Array => {
  const out = new Uint8Array(XA_EXTENSION_SIZE);
  writeUint16Be(out, 0, xa.groupId);
  writeUint16Be(out, 2, xa.userId);
  writeUint16Be(out, 4, xa.attributes);
  out[6] = 0x58; // 'X'
  out[7] = 0x41; // 'A'
  out[8] = xa.fileNumber & 0xff;
  return out;
};

const padToEven = (value: number): number => value + (value % 2);

/** Length of a directory record with an identifier of `nameLength` bytes. */
export const calcDirectoryRecordSize = (nameLength: number, systemUseLength: number): number =>
  padToEven(padToEven(DIRECTORY_RECORD_HEADER_SIZE + nameLength) + systemUseLength);

const DOT_RECORD_SIZE = calcDirectoryRecordSize(1, XA_EXTENSION_SIZE);

/**
 * Bytes taken by a directory's records. A record that would reach into the
 * next block is charged the rest of the current block as well, so that no
 * record crosses a sector boundary.
 */
export const calculateDirectoryByteSize = (childNames: readonly string[]): number => {
  let size = 2 * DOT_RECORD_SIZE;
  for (const name of childNames) {
    let recordSize = calcDirectoryRecordSize(name.length, XA_EXTENSION_SIZE);
    if (Math.floor(size / LOGICAL_BLOCK_SIZE) !== Math.floor((size + recordSize) / LOGICAL_BLOCK_SIZE)) {
      recordSize += (LOGICAL_BLOCK_SIZE - size) % LOGICAL_BLOCK_SIZE;
    }
    size += recordSize;
  }
  return size;
};

/** Sets `numSectors` of every directory. */
export const calculateDirectorySizes = (tree: FilesystemTree): void => {
  for (const directory of tree.directories("pre-order-sorted")) {
    const names = tree.children(directory, true).map(child => child.name);
    directory.numSectors = Math.max(1, sectorsFor(calculateDirectoryByteSize(names), LOGICAL_BLOCK_SIZE));
  }
};

export type DirectoryRecordInput = {
  identifier: Uint8Array;
  extent: number;
  dataLength: number;
  flags: number;
  recordingTime: Uint8Array;
  xa: XaAttributes;
};

export const encodeDirectoryRecord = (input: DirectoryRecordInput): Uint8Array => {
  const identifierLength = input.identifier.length;
  const length = calcDirectoryRecordSize(identifierLength, XA_EXTENSION_SIZE);
  const out = new Uint8Array(length);
  out[0] = length;
  out[1] = 0;
  writeBothEndianUint32(out, 2, input.extent);
  writeBothEndianUint32(out, 10, input.dataLength);
  out.set(input.recordingTime.subarray(0, 7), 18);
  out[25] = input.flags;
  out[26] = 0;
  out[27] = 0;
  writeBothEndianUint16(out, 28, 1);
  out[32] = identifierLength;
  out.set(input.identifier, 33);
  out.set(encodeXaExtension(input.xa), padToEven(DIRECTORY_RECORD_HEADER_SIZE + identifierLength));
  return out;
};

/**
 * Appends records to a fixed-size directory extent. A record that does not
 * fit in what is left of the current block starts at the next one.
 */
export class DirectoryExtentWriter {
  readonly bytes: Uint8Array;
  private offset = 0;

  constructor(byteSize: number) {
    this.bytes = new Uint8Array(byteSize);
  }

  append(record: Uint8Array): number {
    const remaining = LOGICAL_BLOCK_SIZE - (this.offset % LOGICAL_BLOCK_SIZE);
    if (remaining < record.length) this.offset += remaining;
    if (this.offset + record.length > this.bytes.length) {
      throw new RangeError(
        `Directory record of ${record.length} bytes at offset ${this.offset} exceeds extent of ${this.bytes.length} bytes`
      );
    }
    const at = this.offset;
    this.bytes.set(record, at);
    this.offset += record.length;
    return at;
  }
}

const DOT_IDENTIFIER = new Uint8Array([0x00]);
const DOT_DOT_IDENTIFIER = new Uint8Array([0x01]);

const directoryXa: XaAttributes = { groupId: 0, userId: 0, attributes: XA_FORM1_DIR, fileNumber: 0 };

const childRecord = (node: FilesystemNode, metadata: VolumeMetadata, recordingTime: Uint8Array): DirectoryRecordInput => {
  const base = { identifier: asciiBytes(node.name), extent: node.firstSector, recordingTime };
  if (node.kind === "directory") {
    return {
      ...base,
      dataLength: node.numSectors * LOGICAL_BLOCK_SIZE,
      flags: ISO_DIRECTORY | ISO_EXISTENCE,
      xa: directoryXa
    };
  }
  const owner = { groupId: metadata.defaultGid, userId: metadata.defaultUid };
  if (node.isForm2) {
    return {
      ...base,
      dataLength: node.numSectors * LOGICAL_BLOCK_SIZE,
      flags: ISO_FILE | ISO_EXISTENCE,
      xa: { ...owner, attributes: XA_FORM2_FILE, fileNumber: 1 }
    };
  }
  return {
    ...base,
    dataLength: node.size,
    flags: ISO_FILE | ISO_EXISTENCE,
    xa: { ...owner, attributes: XA_FORM1_FILE, fileNumber: 0 }
  };
};

/** Serializes one directory; every child must already have its final sector. */
export const buildDirectoryExtent = (
  tree: FilesystemTree,
  directory: DirectoryNode,
  metadata: VolumeMetadata
): Uint8Array => {
  const recordingTime = toRecordingTime(metadata.creationDate);
  const parent = tree.parentOf(directory) ?? directory;
  const writer = new DirectoryExtentWriter(directory.numSectors * LOGICAL_BLOCK_SIZE);

  writer.append(
    encodeDirectoryRecord({
      identifier: DOT_IDENTIFIER,
      extent: directory.firstSector,
      dataLength: directory.numSectors * LOGICAL_BLOCK_SIZE,
      flags: ISO_DIRECTORY,
      recordingTime,
      xa: directoryXa
    })
  );
  writer.append(
    encodeDirectoryRecord({
      identifier: DOT_DOT_IDENTIFIER,
      extent: parent.firstSector,
      dataLength: parent.numSectors * LOGICAL_BLOCK_SIZE,
      flags: ISO_DIRECTORY,
      recordingTime,
      xa: directoryXa
    })
  );
  for (const child of tree.children(directory, true)) {
    writer.append(encodeDirectoryRecord(childRecord(child, metadata, recordingTime)));
  }
  return writer.bytes;
};

/** Fills `data` of every directory. Requires the allocation pass. */
export const buildDirectoryExtents = (tree: FilesystemTree, metadata: VolumeMetadata): void => {
  for (const directory of tree.directories("pre-order-sorted")) {
    directory.data = buildDirectoryExtent(tree, directory, metadata);
  }
};
