"use strict";

// CD-ROM error detection (EDC, ECMA-130 annex A) and Reed-Solomon product
// code parity (ECC P/Q, ECMA-130 annex A) over GF(2^8) with x^8+x^4+x^3+x^2+1.

const EDC_POLYNOMIAL = 0xd8018001;

const ECC_FORWARD = new Uint8Array(256);
const ECC_BACKWARD = new Uint8Array(256);
const EDC_TABLE = new Uint32Array(256);

for (let i = 0; i < 256; i += 1) {
  const j = (i << 1) ^ (i & 0x80 ? 0x11d : 0);
  ECC_FORWARD[i] = j;
  ECC_BACKWARD[i ^ j] = i;
  let edc = i;
  for (let bit = 0; bit < 8; bit += 1) {
    edc = (edc >>> 1) ^ (edc & 1 ? EDC_POLYNOMIAL : 0);
  }
  EDC_TABLE[i] = edc >>> 0;
}

export const computeEdc = (bytes: Uint8Array, offset: number, length: number): number => {
  if (offset < 0 || offset + length > bytes.length) {
    throw new RangeError(`EDC range ${offset}+${length} exceeds buffer of ${bytes.length} bytes`);
  }
  let edc = 0;
  for (let index = offset; index < offset + length; index += 1) {
    edc = (edc >>> 8) ^ (EDC_TABLE[(edc ^ (bytes[index] ?? 0)) & 0xff] ?? 0);
  }
  return edc >>> 0;
};

// Parity over the sector starting at the header (byte 12).
const ECC_BASE = 0x0c;

const computeEccBlock = (
  sector: Uint8Array,
  majorCount: number,
  minorCount: number,
  majorMultiplier: number,
  minorIncrement: number,
  destination: number
): void => {
  const size = majorCount * minorCount;
  for (let major = 0; major < majorCount; major += 1) {
    let index = (major >> 1) * majorMultiplier + (major & 1);
    let eccA = 0;
    let eccB = 0;
    for (let minor = 0; minor < minorCount; minor += 1) {
      const value = sector[ECC_BASE + index] ?? 0;
      index += minorIncrement;
      if (index >= size) index -= size;
      eccA ^= value;
      eccB ^= value;
      eccA = ECC_FORWARD[eccA] ?? 0;
    }
    eccA = ECC_BACKWARD[(ECC_FORWARD[eccA] ?? 0) ^ eccB] ?? 0;
    sector[destination + major] = eccA;
    sector[destination + major + majorCount] = eccA ^ eccB;
  }
};

export const ECC_P_OFFSET = 0x81c;
export const ECC_Q_OFFSET = 0x8c8;

/**
 * Writes P and Q parity into a 2352-byte sector. Mode 2 Form 1 computes the
 * parity as if the four header bytes were zero; the header is restored after.
 */
export const writeEccParity = (sector: Uint8Array, zeroHeader: boolean): void => {
  const savedHeader = sector.slice(ECC_BASE, ECC_BASE + 4);
  if (zeroHeader) sector.fill(0, ECC_BASE, ECC_BASE + 4);
  computeEccBlock(sector, 86, 24, 2, 86, ECC_P_OFFSET);
  computeEccBlock(sector, 52, 43, 86, 88, ECC_Q_OFFSET);
  if (zeroHeader) sector.set(savedHeader, ECC_BASE);
};
