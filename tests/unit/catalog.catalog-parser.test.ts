"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { DiscImageError } from "../../errors.js";
import { checkStartLbn, parseCatalog } from "../../catalog/catalog-parser.js";
import { MemoryHostFileSystem } from "../helpers/memory-host.js";

const hostWithFiles = (): MemoryHostFileSystem => {
  const host = new MemoryHostFileSystem();
  host.addFile("disc/SYSTEM.CNF", "BOOT = cdrom:\\MAIN.EXE;1\r\n");
  host.addFile("disc/MAIN.EXE", new Uint8Array(4096));
  host.addFile("disc/DATA/MOVIE.STR", new Uint8Array(2336 * 3));
  host.addFile("disc/DATA/LEVEL1.BIN", new Uint8Array(100));
  return host;
};

const validationError = (message: string) => (error: unknown) =>
  error instanceof DiscImageError && error.kind === "validation" && error.message === message;

const parse = (text: string, host: MemoryHostFileSystem = hostWithFiles()) =>
  parseCatalog(text, { basePath: "disc", host });

const FULL_CATALOG = `
system_area {
  file "disc.sys"
}

volume {
  system_id [PLAYSTATION]
  volume_id [TESTDISC]
  volume_set_id [TESTDISC]
  publisher_id [TEST PUBLISHER]
  preparer_id [TEST PREPARER]
  application_id [PLAYSTATION]
  copyright_file_id [COPY]
  abstract_file_id []
  bibliographic_file_id []
  creation_date 2024-01-02 03:04:05.06 4
  modification_date 2024-01-03 00:00:00.00 0
  default_uid 1000
  default_gid 200
}

dir {
  file SYSTEM.CNF
  file MAIN.EXE @30
  dir DATA {
    xafile MOVIE.STR
    file LEVEL1.BIN
  }
}
`;

void test("parseCatalog reads all sections", () => {
  const catalog = parse(FULL_CATALOG);
  assert.strictEqual(catalog.systemAreaFile, "disc.sys");
  const { metadata, tree } = catalog;
  assert.strictEqual(metadata.systemId, "PLAYSTATION");
  assert.strictEqual(metadata.publisherId, "TEST PUBLISHER");
  assert.strictEqual(metadata.copyrightFileId, "COPY");
  assert.strictEqual(metadata.abstractFileId, "");
  assert.deepStrictEqual(metadata.creationDate, { digits: "2024010203040506", gmtOffset: 4 });
  assert.deepStrictEqual(metadata.modificationDate, { digits: "2024010300000000", gmtOffset: 0 });
  assert.deepStrictEqual(metadata.expirationDate, { digits: "0000000000000000", gmtOffset: 0 });
  assert.strictEqual(metadata.defaultUid, 1000);
  assert.strictEqual(metadata.defaultGid, 200);

  assert.strictEqual(tree.root.hostPath, "disc");
  assert.deepStrictEqual(
    [...tree.traverse("pre-order")].map(node => [
      node.name,
      node.hostPath,
      node.requestedStartSector,
      node.kind === "file" ? node.size : -1,
      node.kind === "file" && node.isForm2
    ]),
    [
      ["", "disc", 0, -1, false],
      ["SYSTEM.CNF;1", "disc/SYSTEM.CNF", 0, 26, false],
      ["MAIN.EXE;1", "disc/MAIN.EXE", 30, 4096, false],
      ["DATA", "disc/DATA", 0, -1, false],
      ["MOVIE.STR;1", "disc/DATA/MOVIE.STR", 0, 7008, true],
      ["LEVEL1.BIN;1", "disc/DATA/LEVEL1.BIN", 0, 100, false]
    ]
  );
});

void test("parseCatalog accepts a directory start sector and no optional sections", () => {
  const host = hostWithFiles();
  const catalog = parse("dir {\n dir DATA @40 {\n  file LEVEL1.BIN\n }\n}\n", host);
  assert.strictEqual(catalog.systemAreaFile, null);
  assert.strictEqual(catalog.metadata.volumeId, "");
  const data = catalog.tree.directory(1);
  assert.strictEqual(data.requestedStartSector, 40);
});

void test("parseCatalog reports unterminated sections", () => {
  assert.throws(
    () => parse("system_area {\n file \"x\"\n"),
    validationError("Syntax error in catalog file: unterminated system_area section")
  );
  assert.throws(
    () => parse("volume {\n volume_id [X]\n"),
    validationError("Syntax error in catalog file: unterminated volume section")
  );
  assert.throws(
    () => parse("dir {\n dir DATA {\n }\n"),
    validationError(`Syntax error in catalog file: unterminated directory section ""`)
  );
});

void test("parseCatalog reports unrecognized lines with their section", () => {
  assert.throws(() => parse("bogus\n"), validationError(`Syntax error in catalog file: "bogus" unrecognized`));
  assert.throws(
    () => parse("volume {\n volume_name [X]\n}\n"),
    validationError(`Syntax error in catalog file: "volume_name [X]" unrecognized in volume section`)
  );
  assert.throws(
    () => parse("dir {\n link A B\n}\n"),
    validationError(`Syntax error in catalog file: "link A B" unrecognized in directory section`)
  );
  assert.throws(
    () => parse("system_area {\n path x\n}\n"),
    validationError(`Syntax error in catalog file: "path x" unrecognized in system_area section`)
  );
});

void test("parseCatalog requires exactly one root directory", () => {
  assert.throws(() => parse("volume {\n}\n"), validationError("No root directory specified in catalog file"));
  assert.throws(
    () => parse("dir {\n}\ndir {\n}\n"),
    validationError("More than one root directory section in catalog file")
  );
});

void test("parseCatalog validates identifiers and ids", () => {
  assert.throws(
    () => parse("volume {\n volume_id [Test]\n}\ndir {\n}\n"),
    validationError(`Illegal character 'e' in volume_id "Test"`)
  );
  assert.throws(
    () => parse("volume {\n default_uid 70000\n}\ndir {\n}\n"),
    validationError("'70000' is not a valid user ID")
  );
  assert.throws(
    () => parse("volume {\n creation_date tomorrow\n}\ndir {\n}\n"),
    validationError("'tomorrow' is not a valid date/time specification")
  );
  assert.throws(() => parse("dir {\n file main.exe\n}\n"), validationError(`Illegal character 'm' in file name "main.exe"`));
});

void test("parseCatalog rejects duplicate entries and missing host files", () => {
  assert.throws(
    () => parse("dir {\n file MAIN.EXE\n file MAIN.EXE\n}\n"),
    validationError(`Duplicate entry "MAIN.EXE;1" in directory "/"`)
  );
  assert.throws(
    () => parse("dir {\n file GONE.BIN\n}\n"),
    (error: unknown) => error instanceof DiscImageError && error.kind === "io"
  );
});

void test("checkStartLbn accepts sectors after the descriptors only", () => {
  assert.strictEqual(checkStartLbn(undefined, "A"), 0);
  assert.strictEqual(checkStartLbn("18", "A"), 18);
  assert.strictEqual(checkStartLbn("332999", "A"), 332999);
  assert.throws(
    () => checkStartLbn("17", "A"),
    validationError("Start LBN '17' of 'A' is outside the valid range 17..333000")
  );
  assert.throws(
    () => checkStartLbn("333000", "A"),
    validationError("Start LBN '333000' of 'A' is outside the valid range 17..333000")
  );
  assert.throws(
    () => checkStartLbn("99999999999", "A"),
    validationError("Invalid start LBN '99999999999' specified for 'A'")
  );
});
