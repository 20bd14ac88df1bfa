"use strict";

import { toHex32 } from "../../binary-utils.js";
import type { PushIssue } from "../../errors.js";
import type { LongDateTime } from "../../builders/iso9660/types.js";

export const ISO9660_DESCRIPTOR_BLOCK_SIZE = 2048;
export const ISO9660_SYSTEM_AREA_BLOCKS = 16;

export const formatOffsetHex = (offset: number): string => toHex32(offset >>> 0, 8);

export const readUint16Le = (bytes: Uint8Array, offset: number): number | null => {
  if (offset < 0 || offset + 2 > bytes.length) return null;
  return (bytes[offset] ?? 0) | ((bytes[offset + 1] ?? 0) << 8);
};

export const readUint16Be = (bytes: Uint8Array, offset: number): number | null => {
  if (offset < 0 || offset + 2 > bytes.length) return null;
  return ((bytes[offset] ?? 0) << 8) | (bytes[offset + 1] ?? 0);
};

export const readUint32Le = (bytes: Uint8Array, offset: number): number | null => {
  if (offset < 0 || offset + 4 > bytes.length) return null;
  return (
    (bytes[offset] ?? 0) |
    ((bytes[offset + 1] ?? 0) << 8) |
    ((bytes[offset + 2] ?? 0) << 16) |
    ((bytes[offset + 3] ?? 0) << 24)
  ) >>> 0;
};

export const readUint32Be = (bytes: Uint8Array, offset: number): number | null => {
  if (offset < 0 || offset + 4 > bytes.length) return null;
  return (
    ((bytes[offset] ?? 0) << 24) |
    ((bytes[offset + 1] ?? 0) << 16) |
    ((bytes[offset + 2] ?? 0) << 8) |
    (bytes[offset + 3] ?? 0)
  ) >>> 0;
};

export const readBothEndianUint16 = (
  bytes: Uint8Array,
  offset: number,
  fieldName: string,
  pushIssue: PushIssue
): number | null => {
  const le = readUint16Le(bytes, offset);
  const be = readUint16Be(bytes, offset + 2);
  if (le == null || be == null) return null;
  if (le !== be) {
    pushIssue(`${fieldName} stores mismatched LE (${le}) and BE (${be}) values at ${formatOffsetHex(offset)}; using LE.`);
  }
  return le;
};

export const readBothEndianUint32 = (
  bytes: Uint8Array,
  offset: number,
  fieldName: string,
  pushIssue: PushIssue
): number | null => {
  const le = readUint32Le(bytes, offset);
  const be = readUint32Be(bytes, offset + 4);
  if (le == null || be == null) return null;
  if (le !== be) {
    pushIssue(`${fieldName} stores mismatched LE (${le}) and BE (${be}) values at ${formatOffsetHex(offset)}; using LE.`);
  }
  return le;
};

/** Text of a space padded a/d-character field, trailing spaces and NULs removed. */
export const decodeAsciiField = (bytes: Uint8Array, offset: number, length: number): string => {
  if (offset < 0 || length <= 0 || offset + 1 > bytes.length) return "";
  const end = Math.min(bytes.length, offset + length);
  let out = "";
  for (let index = offset; index < end; index += 1) {
    const byteValue = bytes[index] ?? 0;
    if (byteValue === 0) break;
    out += String.fromCharCode(byteValue);
  }
  return out.trimEnd();
};

const parseSignedInt8 = (value: number): number => (value & 0x80 ? value - 0x100 : value);

/** ECMA-119 8.4.26.1 long-format date; non-digit bytes read as '0'. */
export const parseLongDateTimeField = (bytes: Uint8Array, offset: number): LongDateTime => {
  let digits = "";
  for (let index = 0; index < 16; index += 1) {
    const byteValue = bytes[offset + index] ?? 0;
    digits += byteValue >= 0x30 && byteValue <= 0x39 ? String.fromCharCode(byteValue) : "0";
  }
  return { digits, gmtOffset: parseSignedInt8(bytes[offset + 16] ?? 0) };
};

export const describeVolumeDescriptorType = (typeCode: number): string => {
  switch (typeCode) {
    case 0:
      return "Boot Record";
    case 1:
      return "Primary Volume Descriptor";
    case 2:
      return "Supplementary Volume Descriptor";
    case 3:
      return "Volume Partition Descriptor";
    case 255:
      return "Volume Descriptor Set Terminator";
    default:
      return `Unknown (${typeCode})`;
  }
};
