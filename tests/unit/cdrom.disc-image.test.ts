"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { DiscImageError } from "../../errors.js";
import { DiscImage, formatCueSheet, parseCueSheet } from "../../cdrom/disc-image.js";
import { MemoryHostFileSystem } from "../helpers/memory-host.js";
import { buildSampleImage, cookImage, createSampleHost } from "../fixtures/psx-disc-fixtures.js";

const isKind = (kind: string) => (error: unknown) => error instanceof DiscImageError && error.kind === kind;

void test("formatCueSheet describes one Mode 2 track", () => {
  assert.strictEqual(
    formatCueSheet("game.bin"),
    `FILE "game.bin" BINARY\r\n  TRACK 01 MODE2/2352\r\n    INDEX 01 00:00:00\r\n`
  );
});

void test("parseCueSheet reads the file and the tracks", () => {
  assert.deepStrictEqual(parseCueSheet(formatCueSheet("game.bin")), {
    binFile: "game.bin",
    tracks: [{ number: 1, mode: "MODE2/2352", format: "xa", sectorSize: 2352 }]
  });
  const sheet = parseCueSheet("FILE disc.img BINARY\n TRACK 1 mode1/2048\n TRACK 2 AUDIO\n");
  assert.strictEqual(sheet.binFile, "disc.img");
  assert.deepStrictEqual(
    sheet.tracks.map(track => [track.number, track.format, track.sectorSize]),
    [
      [1, "data", 2048],
      [2, "audio", 2352]
    ]
  );
});

void test("parseCueSheet rejects unsupported modes and incomplete sheets", () => {
  assert.throws(() => parseCueSheet(`FILE "a.bin" BINARY\nTRACK 01 CDG\n`), isKind("validation"));
  assert.throws(() => parseCueSheet("TRACK 01 MODE2/2352\n"), /Cue sheet has no FILE line/);
  assert.throws(() => parseCueSheet(`FILE "a.bin" BINARY\n`), /Cue sheet has no TRACK line/);
});

void test("DiscImage opens a cue sheet and resolves the bin beside it", () => {
  const host = createSampleHost();
  buildSampleImage(host);
  host.addFile("images/copy.cue", formatCueSheet("out.bin"));
  host.addFile("images/out.bin", host.readFile("out.bin"));
  const image = DiscImage.open("images/copy.cue", host);
  try {
    assert.strictEqual(image.info.binPath, "images/out.bin");
    assert.strictEqual(image.isRawMode2, true);
    assert.strictEqual(image.sectorCount, 25);
    assert.strictEqual(image.readMode2Sector(16).subheader.submode, 0x09);
    assert.strictEqual(String.fromCharCode(...image.readDataSector(16).subarray(1, 6)), "CD001");
  } finally {
    image.close();
  }
});

void test("DiscImage treats a bin that is not a multiple of 2352 bytes as cooked", () => {
  const host = createSampleHost();
  buildSampleImage(host);
  host.addFile("cooked.iso", cookImage(host.readFile("out.bin")));
  const image = DiscImage.open("cooked.iso", host);
  try {
    assert.deepStrictEqual(image.info, {
      binPath: "cooked.iso",
      firstTrack: 1,
      format: "data",
      sectorSize: 2048,
      dataOffset: 0
    });
    assert.strictEqual(image.isRawMode2, false);
    assert.strictEqual(image.sectorCount, 25);
    assert.strictEqual(String.fromCharCode(...image.readDataSector(16).subarray(1, 6)), "CD001");
    assert.throws(() => image.readMode2Sector(16), isKind("validation"));
  } finally {
    image.close();
  }
});

void test("DiscImage reports reads outside the image as I/O errors", () => {
  const host = new MemoryHostFileSystem();
  host.addFile("small.bin", new Uint8Array(2352 * 2));
  const image = DiscImage.open("small.bin", host);
  assert.strictEqual(image.sectorCount, 2);
  assert.throws(
    () => image.readDataSector(2),
    (error: unknown) =>
      error instanceof DiscImageError &&
      error.kind === "io" &&
      error.message === `Error reading sector 2 of image file "small.bin": outside the 2 sectors of the image`
  );
  assert.deepStrictEqual(image.readDataSectors(0, 2).length, 4096);
  image.close();
});

void test("DiscImage.open fails for a missing image", () => {
  assert.throws(() => DiscImage.open("missing.bin", new MemoryHostFileSystem()), isKind("io"));
});
