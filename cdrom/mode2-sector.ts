"use strict";

import { writeUint32Le } from "../binary-utils.js";
import { DiscImageError } from "../errors.js";
import { computeEdc, writeEccParity } from "./edc-ecc.js";

export const RAW_SECTOR_SIZE = 2352;
export const MODE2_RAW_SECTOR_SIZE = 2336;
export const FORM1_DATA_SIZE = 2048;
export const FORM2_DATA_SIZE = 2324;
export const SYNC_SIZE = 12;
export const HEADER_SIZE = 4;
export const SUBHEADER_SIZE = 8;
export const PREGAP_SECTORS = 150;

const SUBHEADER_OFFSET = SYNC_SIZE + HEADER_SIZE;
export const XA_DATA_OFFSET = SUBHEADER_OFFSET + SUBHEADER_SIZE;
const FORM1_EDC_OFFSET = XA_DATA_OFFSET + FORM1_DATA_SIZE;
const FORM2_EDC_OFFSET = XA_DATA_OFFSET + FORM2_DATA_SIZE;

// Submode byte of the XA subheader
export const SM_EOR = 0x01;
export const SM_VIDEO = 0x02;
export const SM_AUDIO = 0x04;
export const SM_DATA = 0x08;
export const SM_TRIGGER = 0x10;
export const SM_FORM2 = 0x20;
export const SM_REALTIME = 0x40;
export const SM_EOF = 0x80;

export type XaSubheader = {
  fileNumber: number;
  channelNumber: number;
  submode: number;
  codingInfo: number;
};

export type DecodedMode2Sector = {
  lsn: number | null;
  mode: number;
  syncValid: boolean;
  subheader: XaSubheader;
  form: 1 | 2;
  /** 2048 bytes for Form 1, 2324 bytes for Form 2 */
  data: Uint8Array;
  /** Subheader, payload and EDC: the 2336-byte "Mode 2 raw" view */
  mode2Raw: Uint8Array;
  edcValid: boolean;
};

const SYNC_PATTERN = new Uint8Array([0x00, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x00]);

export const dataSubheader = (submode: number): XaSubheader => ({
  fileNumber: 0,
  channelNumber: 0,
  submode,
  codingInfo: 0
});

/** Submode for the sector at `index` of an extent that is `count` sectors long. */
export const extentSubmode = (index: number, count: number): number =>
  index === count - 1 ? SM_DATA | SM_EOF | SM_EOR : SM_DATA;

const toBcd = (value: number): number => ((Math.floor(value / 10) % 10) << 4) | value % 10;

const fromBcd = (value: number): number | null => {
  const high = value >> 4;
  const low = value & 0x0f;
  if (high > 9 || low > 9) return null;
  return high * 10 + low;
};

export const lsnToMsf = (lsn: number): { minute: number; second: number; frame: number } => {
  const lba = lsn + PREGAP_SECTORS;
  return {
    minute: Math.floor(lba / (60 * 75)),
    second: Math.floor(lba / 75) % 60,
    frame: lba % 75
  };
};

const writeHeader = (sector: Uint8Array, lsn: number): void => {
  const msf = lsnToMsf(lsn);
  sector[SYNC_SIZE] = toBcd(msf.minute);
  sector[SYNC_SIZE + 1] = toBcd(msf.second);
  sector[SYNC_SIZE + 2] = toBcd(msf.frame);
  sector[SYNC_SIZE + 3] = 2;
};

const readHeaderLsn = (sector: Uint8Array): number | null => {
  const minute = fromBcd(sector[SYNC_SIZE] ?? 0);
  const second = fromBcd(sector[SYNC_SIZE + 1] ?? 0);
  const frame = fromBcd(sector[SYNC_SIZE + 2] ?? 0);
  if (minute == null || second == null || frame == null) return null;
  return (minute * 60 + second) * 75 + frame - PREGAP_SECTORS;
};

/**
 * Frames one logical block as a raw 2352-byte Mode 2 sector. The FORM2 bit
 * of the submode selects the layout: 2324 payload bytes and EDC only, or
 * 2048 payload bytes with EDC and P/Q parity. Short payloads are zero filled.
 */
export const encodeMode2Sector = (
  payload: Uint8Array,
  lsn: number,
  subheader: XaSubheader,
  out: Uint8Array = new Uint8Array(RAW_SECTOR_SIZE)
): Uint8Array => {
  if (out.length !== RAW_SECTOR_SIZE) {
    throw new RangeError(`Raw sector buffer must be ${RAW_SECTOR_SIZE} bytes, got ${out.length}`);
  }
  out.fill(0);
  out.set(SYNC_PATTERN, 0);
  const subheaderBytes = [subheader.fileNumber, subheader.channelNumber, subheader.submode, subheader.codingInfo];
  for (let i = 0; i < 4; i += 1) {
    const value = (subheaderBytes[i] ?? 0) & 0xff;
    out[SUBHEADER_OFFSET + i] = value;
    out[SUBHEADER_OFFSET + 4 + i] = value;
  }

  const isForm2 = (subheader.submode & SM_FORM2) !== 0;
  const dataSize = isForm2 ? FORM2_DATA_SIZE : FORM1_DATA_SIZE;
  out.set(payload.subarray(0, dataSize), XA_DATA_OFFSET);

  if (isForm2) {
    writeHeader(out, lsn);
    writeUint32Le(out, FORM2_EDC_OFFSET, computeEdc(out, SUBHEADER_OFFSET, SUBHEADER_SIZE + FORM2_DATA_SIZE));
  } else {
    writeUint32Le(out, FORM1_EDC_OFFSET, computeEdc(out, SUBHEADER_OFFSET, SUBHEADER_SIZE + FORM1_DATA_SIZE));
    writeHeader(out, lsn);
    writeEccParity(out, true);
  }
  return out;
};

const EMPTY_FORM2_PAYLOAD = new Uint8Array(FORM2_DATA_SIZE);

export const encodeEmptyForm2Sector = (lsn: number, out?: Uint8Array): Uint8Array =>
  encodeMode2Sector(EMPTY_FORM2_PAYLOAD, lsn, dataSubheader(SM_FORM2), out);

/**
 * Frames a sector read from an XA source file: the first four bytes of the
 * 2336-byte source sector are its subheader, the payload starts after the
 * eight subheader bytes.
 */
export const encodeRawXaSector = (mode2Raw: Uint8Array, lsn: number, out?: Uint8Array): Uint8Array =>
  encodeMode2Sector(
    mode2Raw.subarray(SUBHEADER_SIZE),
    lsn,
    {
      fileNumber: mode2Raw[0] ?? 0,
      channelNumber: mode2Raw[1] ?? 0,
      submode: mode2Raw[2] ?? 0,
      codingInfo: mode2Raw[3] ?? 0
    },
    out
  );

export const decodeMode2Sector = (sector: Uint8Array): DecodedMode2Sector => {
  if (sector.length !== RAW_SECTOR_SIZE) {
    throw new DiscImageError(
      "io",
      `Raw sector must be ${RAW_SECTOR_SIZE} bytes, got ${sector.length}`
    );
  }
  let syncValid = true;
  for (let i = 0; i < SYNC_SIZE; i += 1) {
    if (sector[i] !== SYNC_PATTERN[i]) {
      syncValid = false;
      break;
    }
  }
  const subheader: XaSubheader = {
    fileNumber: sector[SUBHEADER_OFFSET] ?? 0,
    channelNumber: sector[SUBHEADER_OFFSET + 1] ?? 0,
    submode: sector[SUBHEADER_OFFSET + 2] ?? 0,
    codingInfo: sector[SUBHEADER_OFFSET + 3] ?? 0
  };
  const form = (subheader.submode & SM_FORM2) !== 0 ? 2 : 1;
  const dataSize = form === 2 ? FORM2_DATA_SIZE : FORM1_DATA_SIZE;
  const edcOffset = form === 2 ? FORM2_EDC_OFFSET : FORM1_EDC_OFFSET;
  const storedEdc =
    ((sector[edcOffset] ?? 0) |
      ((sector[edcOffset + 1] ?? 0) << 8) |
      ((sector[edcOffset + 2] ?? 0) << 16) |
      ((sector[edcOffset + 3] ?? 0) << 24)) >>>
    0;
  // An EDC field of zero in a Form 2 sector means "not computed".
  const expectedEdc = computeEdc(sector, SUBHEADER_OFFSET, SUBHEADER_SIZE + dataSize);
  const edcValid = storedEdc === expectedEdc || (form === 2 && storedEdc === 0);
  return {
    lsn: readHeaderLsn(sector),
    mode: sector[SYNC_SIZE + 3] ?? 0,
    syncValid,
    subheader,
    form,
    data: sector.subarray(XA_DATA_OFFSET, XA_DATA_OFFSET + dataSize),
    mode2Raw: sector.subarray(SUBHEADER_OFFSET, RAW_SECTOR_SIZE),
    edcValid
  };
};
