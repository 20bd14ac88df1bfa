"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { DiscImageError } from "../../errors.js";
import { DiscImage, formatCueSheet } from "../../cdrom/disc-image.js";
import { SM_DATA, SM_EOF, SM_EOR, decodeMode2Sector } from "../../cdrom/mode2-sector.js";
import { Iso9660Volume } from "../../analyzers/iso9660/index.js";
import { findFileRecord, injectFile } from "../../tools/inject.js";
import { buildDiscImage } from "../../tools/build.js";
import { MemoryHostFileSystem, createRecordingReporter } from "../helpers/memory-host.js";
import {
  buildSampleImage,
  cookImage,
  createSampleHost,
  createXaHost,
  createXaSource
} from "../fixtures/psx-disc-fixtures.js";

const errorWith = (kind: string, message: string) => (error: unknown) =>
  error instanceof DiscImageError && error.kind === kind && error.message === message;

const sampleWithImage = (): MemoryHostFileSystem => {
  const host = createSampleHost();
  buildSampleImage(host);
  return host;
};

const statOf = (host: MemoryHostFileSystem, imagePath: string, path: string) => {
  const image = DiscImage.open(imagePath, host);
  try {
    return Iso9660Volume.open(image).stat(path);
  } finally {
    image.close();
  }
};

void test("findFileRecord locates a file record and skips directories", () => {
  const host = sampleWithImage();
  const image = DiscImage.open("out.bin", host);
  try {
    const root = image.readDataSector(22);
    assert.strictEqual(findFileRecord(root, "A.TXT;1"), 96);
    assert.strictEqual(findFileRecord(root, "SUB"), null);
    assert.strictEqual(findFileRecord(root, "B.TXT;1"), null);
  } finally {
    image.close();
  }
});

void test("injectFile replaces a Form 1 file and patches its size", () => {
  const host = sampleWithImage();
  host.addFile("new.txt", "REPLACED CONTENT 20B");
  const reporter = createRecordingReporter();
  const result = injectFile({ imagePath: "out.bin", targetPath: "A.TXT", newFilePath: "new.txt", host, reporter });

  assert.deepStrictEqual(result, {
    lsn: 23,
    sectors: 1,
    size: 20,
    isForm2: false,
    directorySector: 22,
    recordOffset: 96
  });
  assert.deepStrictEqual(reporter.messages("info"), [`File 'A.TXT' replaced in "out.bin"`]);
  assert.strictEqual(host.fileSize("out.bin"), 25 * 2352);

  const bytes = host.readFile("out.bin");
  const data = decodeMode2Sector(bytes.subarray(23 * 2352, 24 * 2352));
  assert.strictEqual(new TextDecoder().decode(data.data.subarray(0, 20)), "REPLACED CONTENT 20B");
  assert.strictEqual(data.subheader.submode, SM_DATA | SM_EOF | SM_EOR);
  assert.strictEqual(data.edcValid, true);
  const directory = decodeMode2Sector(bytes.subarray(22 * 2352, 23 * 2352));
  assert.strictEqual(directory.subheader.submode, SM_DATA | SM_EOF | SM_EOR);
  assert.strictEqual(directory.edcValid, true);

  assert.strictEqual(statOf(host, "out.bin", "A.TXT;1")?.size, 20);
});

void test("injectFile checks the capacity before touching the image", () => {
  const host = sampleWithImage();
  const before = host.readFile("out.bin").slice();
  host.addFile("big.txt", new Uint8Array(3000));
  assert.throws(
    () => injectFile({ imagePath: "out.bin", targetPath: "A.TXT", newFilePath: "big.txt", host }),
    errorWith("capacity", "big.txt would require 2 sectors but there is only room for 1 sectors (2048 bytes)")
  );
  assert.deepStrictEqual(host.readFile("out.bin"), before);
});

void test("injectFile reports paths that are missing or not files", () => {
  const host = sampleWithImage();
  host.addFile("new.txt", "X");
  assert.throws(
    () => injectFile({ imagePath: "out.bin", targetPath: "B.TXT", newFilePath: "new.txt", host }),
    errorWith("validation", "Cannot find 'B.TXT' in image")
  );
  assert.throws(
    () => injectFile({ imagePath: "out.bin", targetPath: "SUB/A.TXT", newFilePath: "new.txt", host }),
    errorWith("validation", "Cannot find 'SUB/A.TXT' in image")
  );
  assert.throws(
    () => injectFile({ imagePath: "out.bin", targetPath: "/", newFilePath: "new.txt", host }),
    errorWith("validation", "'/' does not refer to a file")
  );
});

void test("injectFile writes an empty file as one zero sector with size 0", () => {
  const host = sampleWithImage();
  host.addFile("empty.txt", new Uint8Array(0));
  const result = injectFile({ imagePath: "out.bin", targetPath: "/A.TXT", newFilePath: "empty.txt", host });
  assert.strictEqual(result.sectors, 1);
  assert.strictEqual(result.size, 0);
  const data = decodeMode2Sector(host.readFile("out.bin").subarray(23 * 2352, 24 * 2352)).data;
  assert.ok(data.every(value => value === 0));
});

void test("injectFile accepts a cue sheet and patches the bin it names", () => {
  const host = sampleWithImage();
  host.addFile("out.cue", formatCueSheet("out.bin"));
  host.addFile("new.txt", "FROM CUE");
  const result = injectFile({ imagePath: "out.cue", targetPath: "A.TXT", newFilePath: "new.txt", host });
  assert.strictEqual(result.size, 8);
  assert.strictEqual(statOf(host, "out.cue", "A.TXT;1")?.size, 8);
});

void test("injectFile patches a 2048-byte image in place", () => {
  const host = sampleWithImage();
  host.addFile("disc.iso", cookImage(host.readFile("out.bin")));
  host.addFile("new.txt", "COOKED");
  injectFile({ imagePath: "disc.iso", targetPath: "A.TXT", newFilePath: "new.txt", host });
  const bytes = host.readFile("disc.iso");
  assert.strictEqual(bytes.length, 25 * 2048);
  assert.strictEqual(new TextDecoder().decode(bytes.subarray(23 * 2048, 23 * 2048 + 6)), "COOKED");
  assert.strictEqual(statOf(host, "disc.iso", "A.TXT;1")?.size, 6);
});

void test("injectFile replaces a Form 2 file sector by sector", () => {
  const host = createXaHost();
  buildDiscImage({ catalogPath: "disc.cat", outputBase: "out", writeCue: false, host });
  const replacement = createXaSource(1);
  replacement.fill(0x7e, 8, 8 + 2324);
  host.addFile("new.str", replacement);

  const result = injectFile({ imagePath: "out.bin", targetPath: "MOVIE.STR", newFilePath: "new.str", host });
  assert.deepStrictEqual(result, {
    lsn: 30,
    sectors: 1,
    size: 2048,
    isForm2: true,
    directorySector: 22,
    recordOffset: 150
  });
  const decoded = decodeMode2Sector(host.readFile("out.bin").subarray(30 * 2352, 31 * 2352));
  assert.strictEqual(decoded.form, 2);
  assert.strictEqual(decoded.subheader.submode, 0x64);
  assert.strictEqual(decoded.data[0], 0x7e);
  assert.strictEqual(decoded.edcValid, true);
  assert.strictEqual(statOf(host, "out.bin", "MOVIE.STR;1")?.size, 2048);
});

void test("injectFile requires whole Form 2 sectors and a raw image for Form 2 files", () => {
  const host = createXaHost();
  buildDiscImage({ catalogPath: "disc.cat", outputBase: "out", writeCue: false, host });
  host.addFile("odd.str", new Uint8Array(100));
  assert.throws(
    () => injectFile({ imagePath: "out.bin", targetPath: "MOVIE.STR", newFilePath: "odd.str", host }),
    errorWith("validation", "'MOVIE.STR' is a form 2 file but the size of odd.str is not a multiple of 2336 bytes")
  );
  host.addFile("disc.iso", cookImage(host.readFile("out.bin")));
  assert.throws(
    () => injectFile({ imagePath: "disc.iso", targetPath: "MOVIE.STR", newFilePath: "odd.str", host }),
    errorWith("validation", "'MOVIE.STR' is a form 2 file but 'disc.iso' is not a raw mode 2 image")
  );
});

void test("injectFile rejects an image whose first track is audio", () => {
  const host = sampleWithImage();
  host.addFile("audio.cue", `FILE "out.bin" BINARY\r\n  TRACK 01 AUDIO\r\n    INDEX 01 00:00:00\r\n`);
  host.addFile("new.txt", "X");
  assert.throws(
    () => injectFile({ imagePath: "audio.cue", targetPath: "A.TXT", newFilePath: "new.txt", host }),
    errorWith("validation", "First track (1) is not a data track")
  );
});
