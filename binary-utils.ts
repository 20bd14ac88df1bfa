"use strict";

export const formatHumanSize = (byteCount: number): string => {
  const base = 1024;
  const units = ["B", "KB", "MB", "GB", "TB"];
  let unitIndex = 0;
  let value = byteCount;
  while (value >= base && unitIndex < units.length - 1) {
    value /= base;
    unitIndex += 1;
  }
  const roundedValue = value >= 100 ? Math.round(value) : Math.round(value * 10) / 10;
  return `${roundedValue} ${units[unitIndex]} (${byteCount} bytes)`;
};

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

export const sectorsFor = (byteCount: number, blockSize: number): number =>
  Math.ceil(byteCount / blockSize);

export const asciiBytes = (value: string): Uint8Array => {
  const out = new Uint8Array(value.length);
  for (let i = 0; i < value.length; i += 1) out[i] = value.charCodeAt(i) & 0xff;
  return out;
};

const assertRange = (bytes: Uint8Array, offset: number, length: number): void => {
  if (offset < 0 || offset + length > bytes.length) {
    throw new RangeError(`Write of ${length} bytes at offset ${offset} exceeds buffer of ${bytes.length} bytes`);
  }
};

export const writeUint16Le = (bytes: Uint8Array, offset: number, value: number): void => {
  assertRange(bytes, offset, 2);
  bytes[offset] = value & 0xff;
  bytes[offset + 1] = (value >>> 8) & 0xff;
};

export const writeUint16Be = (bytes: Uint8Array, offset: number, value: number): void => {
  assertRange(bytes, offset, 2);
  bytes[offset] = (value >>> 8) & 0xff;
  bytes[offset + 1] = value & 0xff;
};

export const writeUint32Le = (bytes: Uint8Array, offset: number, value: number): void => {
  assertRange(bytes, offset, 4);
  bytes[offset] = value & 0xff;
  bytes[offset + 1] = (value >>> 8) & 0xff;
  bytes[offset + 2] = (value >>> 16) & 0xff;
  bytes[offset + 3] = (value >>> 24) & 0xff;
};

export const writeUint32Be = (bytes: Uint8Array, offset: number, value: number): void => {
  assertRange(bytes, offset, 4);
  bytes[offset] = (value >>> 24) & 0xff;
  bytes[offset + 1] = (value >>> 16) & 0xff;
  bytes[offset + 2] = (value >>> 8) & 0xff;
  bytes[offset + 3] = value & 0xff;
};

// ECMA-119 7.2.3 / 7.3.3: little-endian copy followed by a big-endian copy.
export const writeBothEndianUint16 = (bytes: Uint8Array, offset: number, value: number): void => {
  writeUint16Le(bytes, offset, value);
  writeUint16Be(bytes, offset + 2, value);
};

export const writeBothEndianUint32 = (bytes: Uint8Array, offset: number, value: number): void => {
  writeUint32Le(bytes, offset, value);
  writeUint32Be(bytes, offset + 4, value);
};

export const writeAsciiPadded = (bytes: Uint8Array, offset: number, length: number, value: string): void => {
  assertRange(bytes, offset, length);
  bytes.fill(0x20, offset, offset + length);
  const data = asciiBytes(value);
  bytes.set(data.subarray(0, length), offset);
};
