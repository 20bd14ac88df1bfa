"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { DiscImageError } from "../../errors.js";
import { ECC_P_OFFSET, computeEdc } from "../../cdrom/edc-ecc.js";
import {
  FORM2_DATA_SIZE,
  RAW_SECTOR_SIZE,
  SM_DATA,
  SM_EOF,
  SM_EOR,
  SM_FORM2,
  dataSubheader,
  decodeMode2Sector,
  encodeEmptyForm2Sector,
  encodeMode2Sector,
  encodeRawXaSector,
  extentSubmode,
  lsnToMsf
} from "../../cdrom/mode2-sector.js";

const payload = (length: number, seed: number): Uint8Array => {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i += 1) bytes[i] = (i * 7 + seed) & 0xff;
  return bytes;
};

void test("computeEdc of an empty range is zero", () => {
  assert.strictEqual(computeEdc(new Uint8Array(16), 4, 0), 0);
  assert.throws(() => computeEdc(new Uint8Array(4), 2, 4), RangeError);
});

void test("lsnToMsf adds the two second pregap", () => {
  assert.deepStrictEqual(lsnToMsf(0), { minute: 0, second: 2, frame: 0 });
  assert.deepStrictEqual(lsnToMsf(16), { minute: 0, second: 2, frame: 16 });
  assert.deepStrictEqual(lsnToMsf(4350), { minute: 1, second: 0, frame: 0 });
});

void test("extentSubmode marks only the last sector of an extent", () => {
  assert.strictEqual(extentSubmode(0, 3), SM_DATA);
  assert.strictEqual(extentSubmode(2, 3), SM_DATA | SM_EOF | SM_EOR);
  assert.strictEqual(extentSubmode(0, 1), 0x89);
});

void test("encodeMode2Sector writes sync, BCD header and a doubled subheader", () => {
  const sector = encodeMode2Sector(payload(2048, 1), 16, dataSubheader(SM_DATA | SM_EOR));
  assert.strictEqual(sector.length, RAW_SECTOR_SIZE);
  assert.deepStrictEqual([...sector.subarray(0, 12)], [0, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 0]);
  assert.deepStrictEqual([...sector.subarray(12, 16)], [0x00, 0x02, 0x16, 0x02]);
  assert.deepStrictEqual([...sector.subarray(16, 24)], [0, 0, 0x09, 0, 0, 0, 0x09, 0]);
});

void test("decodeMode2Sector reads back a Form 1 sector", () => {
  const data = payload(2048, 3);
  const decoded = decodeMode2Sector(encodeMode2Sector(data, 1234, dataSubheader(SM_DATA)));
  assert.strictEqual(decoded.syncValid, true);
  assert.strictEqual(decoded.mode, 2);
  assert.strictEqual(decoded.lsn, 1234);
  assert.strictEqual(decoded.form, 1);
  assert.strictEqual(decoded.subheader.submode, SM_DATA);
  assert.strictEqual(decoded.edcValid, true);
  assert.deepStrictEqual(decoded.data, data);
  assert.strictEqual(decoded.mode2Raw.length, 2336);
});

void test("decodeMode2Sector detects a corrupted payload through the EDC", () => {
  const sector = encodeMode2Sector(payload(2048, 5), 20, dataSubheader(SM_DATA));
  sector[100] = (sector[100] ?? 0) ^ 0xff;
  assert.strictEqual(decodeMode2Sector(sector).edcValid, false);
});

void test("Form 1 parity does not depend on the sector address", () => {
  const data = payload(2048, 9);
  const first = encodeMode2Sector(data, 100, dataSubheader(SM_DATA));
  const second = encodeMode2Sector(data, 2000, dataSubheader(SM_DATA));
  assert.notDeepStrictEqual(first.subarray(12, 16), second.subarray(12, 16));
  assert.deepStrictEqual(first.subarray(ECC_P_OFFSET), second.subarray(ECC_P_OFFSET));
});

void test("encodeMode2Sector zero fills a short payload", () => {
  const sector = encodeMode2Sector(new Uint8Array([1, 2, 3]), 0, dataSubheader(SM_DATA));
  const decoded = decodeMode2Sector(sector);
  assert.deepStrictEqual([...decoded.data.subarray(0, 4)], [1, 2, 3, 0]);
  assert.ok(decoded.data.subarray(3).every(value => value === 0));
});

void test("encodeMode2Sector rejects an output buffer of the wrong size", () => {
  assert.throws(() => encodeMode2Sector(new Uint8Array(0), 0, dataSubheader(SM_DATA), new Uint8Array(2048)), RangeError);
});

void test("encodeEmptyForm2Sector produces a Form 2 sector with a valid EDC", () => {
  const decoded = decodeMode2Sector(encodeEmptyForm2Sector(5));
  assert.strictEqual(decoded.form, 2);
  assert.strictEqual(decoded.subheader.submode, SM_FORM2);
  assert.strictEqual(decoded.lsn, 5);
  assert.strictEqual(decoded.data.length, FORM2_DATA_SIZE);
  assert.ok(decoded.data.every(value => value === 0));
  assert.strictEqual(decoded.edcValid, true);
});

void test("encodeRawXaSector takes the subheader from the source sector", () => {
  const source = new Uint8Array(2336);
  source.set([1, 2, 0x64, 0x01, 1, 2, 0x64, 0x01], 0);
  source.fill(0x5a, 8, 8 + FORM2_DATA_SIZE);
  const decoded = decodeMode2Sector(encodeRawXaSector(source, 40));
  assert.deepStrictEqual(decoded.subheader, { fileNumber: 1, channelNumber: 2, submode: 0x64, codingInfo: 0x01 });
  assert.strictEqual(decoded.form, 2);
  assert.strictEqual(decoded.edcValid, true);
  assert.deepStrictEqual(decoded.mode2Raw.subarray(0, 2332), source.subarray(0, 2332));
});

void test("decodeMode2Sector accepts a zero Form 2 EDC and rejects short input", () => {
  const sector = encodeEmptyForm2Sector(0);
  sector.fill(0, 2348, 2352);
  assert.strictEqual(decodeMode2Sector(sector).edcValid, true);
  assert.throws(
    () => decodeMode2Sector(new Uint8Array(2048)),
    (error: unknown) => error instanceof DiscImageError && error.kind === "io"
  );
});
