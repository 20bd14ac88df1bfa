"use strict";

import { DiscImageError } from "../../errors.js";
import type { LongDateTime, VolumeMetadata } from "./types.js";

const A_CHAR_EXTRAS = " !\"%&'()*+,-./:;<=>?";

export const isDChar = (char: string): boolean => /^[A-Z0-9_]$/.test(char);

export const isAChar = (char: string): boolean => isDChar(char) || (char.length === 1 && A_CHAR_EXTRAS.includes(char));

const checkCharacters = (value: string, field: string, accept: (char: string) => boolean): void => {
  for (const char of value) {
    if (!accept(char)) {
      throw new DiscImageError("validation", `Illegal character '${char}' in ${field} "${value}"`);
    }
  }
};

export const checkDString = (value: string, field: string): void => checkCharacters(value, field, isDChar);

export const checkAString = (value: string, field: string): void => checkCharacters(value, field, isAChar);

export const checkFileName = (value: string, field: string): void =>
  checkCharacters(value, field, char => isDChar(char) || char === ".");

export const EMPTY_LONG_DATE_TIME: LongDateTime = { digits: "0".repeat(16), gmtOffset: 0 };

const LONG_DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2}):(\d{2})\.(\d{2})\s+(\S+)$/;

// ECMA-119 8.4.26.1: offsets run from -48 (GMT-12) to +52 (GMT+13).
const MIN_GMT_OFFSET = -48;
const MAX_GMT_OFFSET = 52;

/** Parses "YYYY-MM-DD hh:mm:ss.cc off", where off is the GMT offset in 15-minute units. */
export const parseLongDateTime = (text: string): LongDateTime => {
  const match = LONG_DATE_TIME_PATTERN.exec(text.trim());
  if (!match) {
    throw new DiscImageError("validation", `'${text}' is not a valid date/time specification`);
  }
  const offsetText = match[8] ?? "";
  const gmtOffset = /^-?\d+$/.test(offsetText) ? Number.parseInt(offsetText, 10) : Number.NaN;
  if (!Number.isInteger(gmtOffset) || gmtOffset < MIN_GMT_OFFSET || gmtOffset > MAX_GMT_OFFSET) {
    throw new DiscImageError("validation", `'${offsetText}' is not a valid GMT offset specification`);
  }
  return { digits: match.slice(1, 8).join(""), gmtOffset };
};

export const formatLongDateTime = (value: LongDateTime): string => {
  const d = value.digits.padEnd(16, "0");
  return (
    `${d.slice(0, 4)}-${d.slice(4, 6)}-${d.slice(6, 8)} ` +
    `${d.slice(8, 10)}:${d.slice(10, 12)}:${d.slice(12, 14)}.${d.slice(14, 16)} ${value.gmtOffset}`
  );
};

export const encodeLongDateTime = (bytes: Uint8Array, offset: number, value: LongDateTime): void => {
  if (offset < 0 || offset + 17 > bytes.length) {
    throw new RangeError(`Long-format date at ${offset} exceeds buffer of ${bytes.length} bytes`);
  }
  const digits = value.digits.padEnd(16, "0");
  for (let i = 0; i < 16; i += 1) bytes[offset + i] = digits.charCodeAt(i) & 0xff;
  bytes[offset + 16] = value.gmtOffset & 0xff;
};

/**
 * Seven-byte directory record timestamp (ECMA-119 9.1.5) for a long-format
 * date. The fields are taken as written; a date with year 0 yields zeros.
 */
export const toRecordingTime = (value: LongDateTime): Uint8Array => {
  const out = new Uint8Array(7);
  const field = (start: number, length: number): number =>
    Number.parseInt(value.digits.slice(start, start + length), 10) || 0;
  const year = field(0, 4);
  if (year === 0) return out;
  out[0] = (year - 1900) & 0xff;
  out[1] = field(4, 2);
  out[2] = field(6, 2);
  out[3] = field(8, 2);
  out[4] = field(10, 2);
  out[5] = field(12, 2);
  out[6] = 0;
  return out;
};

export const createVolumeMetadata = (overrides: Partial<VolumeMetadata> = {}): VolumeMetadata => ({
  systemId: "",
  volumeId: "",
  volumeSetId: "",
  publisherId: "",
  preparerId: "",
  applicationId: "",
  copyrightFileId: "",
  abstractFileId: "",
  bibliographicFileId: "",
  creationDate: EMPTY_LONG_DATE_TIME,
  modificationDate: EMPTY_LONG_DATE_TIME,
  expirationDate: EMPTY_LONG_DATE_TIME,
  effectiveDate: EMPTY_LONG_DATE_TIME,
  defaultUid: 0,
  defaultGid: 0,
  systemArea: null,
  ...overrides
});
