"use strict";

import type { PushIssue } from "../../errors.js";
import type { Iso9660DirectoryRecord, XaSystemUse } from "./types.js";
import {
  ISO9660_DESCRIPTOR_BLOCK_SIZE,
  decodeAsciiField,
  formatOffsetHex,
  readBothEndianUint16,
  readBothEndianUint32,
  readUint16Be
} from "./iso-parsing.js";

const XA_SIGNATURE_OFFSET = 6;
const XA_SYSTEM_USE_SIZE = 14;

const normalizeFileIdentifier = (value: string): { name: string; version: number | null } => {
  const match = /^(.*);([0-9]+)$/.exec(value);
  if (!match) return { name: value, version: null };
  const version = match[2] != null ? Number.parseInt(match[2], 10) : null;
  return { name: match[1] ?? value, version: Number.isFinite(version) ? version : null };
};

export const parseXaSystemUse = (bytes: Uint8Array, offset: number, length: number): XaSystemUse | null => {
  if (length < XA_SYSTEM_USE_SIZE || offset + XA_SYSTEM_USE_SIZE > bytes.length) return null;
  if (bytes[offset + XA_SIGNATURE_OFFSET] !== 0x58 || bytes[offset + XA_SIGNATURE_OFFSET + 1] !== 0x41) return null;
  return {
    groupId: readUint16Be(bytes, offset) ?? 0,
    userId: readUint16Be(bytes, offset + 2) ?? 0,
    attributes: readUint16Be(bytes, offset + 4) ?? 0,
    fileNumber: bytes[offset + 8] ?? 0
  };
};

export const parseDirectoryRecord = (
  bytes: Uint8Array,
  offset: number,
  pushIssue: PushIssue,
  opts?: { zeroIdentifierMeaning?: "root" | "dot" }
): Iso9660DirectoryRecord | null => {
  if (offset < 0 || offset + 1 > bytes.length) return null;
  const recordLength = bytes[offset] ?? 0;
  if (recordLength === 0) return null;
  if (recordLength < 34) {
    pushIssue(`Directory record at ${formatOffsetHex(offset)} is unusually short (${recordLength} bytes).`);
  }
  if (offset + recordLength > bytes.length) {
    pushIssue(`Truncated directory record at ${formatOffsetHex(offset)} (length ${recordLength}).`);
    return null;
  }

  const extendedAttributeRecordLength = bytes[offset + 1] ?? 0;
  const extentLocationLba = readBothEndianUint32(bytes, offset + 2, "Extent LBA", pushIssue);
  const dataLength = readBothEndianUint32(bytes, offset + 10, "Data length", pushIssue);
  const recordingTime = bytes.slice(offset + 18, offset + 25);
  const fileFlags = bytes[offset + 25] ?? 0;
  const volumeSequenceNumber = readBothEndianUint16(bytes, offset + 28, "Volume sequence number", pushIssue);

  const fileIdentifierLength = bytes[offset + 32] ?? 0;
  const identifierOffset = offset + 33;
  const recordEnd = offset + recordLength;
  if (identifierOffset + fileIdentifierLength > recordEnd) {
    pushIssue(`Directory record at ${formatOffsetHex(offset)} declares file identifier bytes past record end.`);
    return null;
  }

  const identifierBytes = bytes.subarray(identifierOffset, identifierOffset + fileIdentifierLength);
  const isZero = fileIdentifierLength === 1 && identifierBytes[0] === 0x00;
  const isOne = fileIdentifierLength === 1 && identifierBytes[0] === 0x01;
  const zeroMeaning = opts?.zeroIdentifierMeaning ?? "dot";

  let fileIdentifierRaw: string;
  let fileIdentifier: string;
  let fileVersion: number | null = null;
  let isDotEntry = false;
  let isDotDotEntry = false;

  if (isZero && zeroMeaning === "root") {
    fileIdentifierRaw = "";
    fileIdentifier = "";
  } else if (isZero) {
    fileIdentifierRaw = ".";
    fileIdentifier = ".";
    isDotEntry = true;
  } else if (isOne) {
    fileIdentifierRaw = "..";
    fileIdentifier = "..";
    isDotDotEntry = true;
  } else {
    fileIdentifierRaw = decodeAsciiField(identifierBytes, 0, identifierBytes.length);
    const normalized = normalizeFileIdentifier(fileIdentifierRaw);
    fileIdentifier = normalized.name;
    fileVersion = normalized.version;
  }

  const isDirectory = (fileFlags & 0x02) !== 0 || isDotEntry || isDotDotEntry || zeroMeaning === "root";
  const paddingBytes = fileIdentifierLength % 2 === 0 ? 1 : 0;
  const systemUseStart = identifierOffset + fileIdentifierLength + paddingBytes;
  const systemUseLength = Math.max(0, recordEnd - systemUseStart);

  return {
    recordLength,
    extendedAttributeRecordLength,
    extentLocationLba,
    dataLength,
    recordingTime,
    fileFlags,
    volumeSequenceNumber,
    fileIdentifierRaw,
    fileIdentifier,
    fileVersion,
    isDirectory,
    isDotEntry,
    isDotDotEntry,
    systemUseLength,
    xa: parseXaSystemUse(bytes, systemUseStart, systemUseLength)
  };
};

export type LocatedDirectoryRecord = {
  /** Byte offset of the record inside the scanned buffer. */
  offset: number;
  record: Iso9660DirectoryRecord;
};

/**
 * Walks the records of a directory extent. A zero length byte ends the
 * records of the current block; scanning resumes at the next block.
 */
export const scanDirectoryBytes = (bytes: Uint8Array, pushIssue: PushIssue): LocatedDirectoryRecord[] => {
  const records: LocatedDirectoryRecord[] = [];
  let cursor = 0;
  while (cursor < bytes.length) {
    const recordLength = bytes[cursor] ?? 0;
    if (recordLength === 0) {
      cursor = (Math.floor(cursor / ISO9660_DESCRIPTOR_BLOCK_SIZE) + 1) * ISO9660_DESCRIPTOR_BLOCK_SIZE;
      continue;
    }
    if (cursor + recordLength > bytes.length) {
      pushIssue(`Truncated directory area near ${formatOffsetHex(cursor)}.`);
      break;
    }
    const record = parseDirectoryRecord(bytes, cursor, pushIssue);
    if (record) records.push({ offset: cursor, record });
    cursor += recordLength;
  }
  return records;
};
