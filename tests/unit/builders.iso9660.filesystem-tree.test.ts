"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { DiscImageError } from "../../errors.js";
import { FilesystemTree } from "../../builders/iso9660/filesystem-tree.js";
import { SectorAllocator, allocateSectors } from "../../builders/iso9660/sector-allocator.js";

const createTree = (): FilesystemTree => {
  const tree = new FilesystemTree("disc");
  tree.addFile(0, { name: "ZETA.BIN;1", hostPath: "disc/ZETA.BIN", size: 5000 });
  const data = tree.addDirectory(0, "DATA", "disc/DATA");
  tree.addFile(data.id, { name: "LEVEL.BIN;1", hostPath: "disc/DATA/LEVEL.BIN", size: 0 });
  tree.addFile(0, { name: "ALPHA.STR;1", hostPath: "disc/ALPHA.STR", size: 4672, isForm2: true });
  return tree;
};

void test("FilesystemTree keeps declaration order and a sorted view", () => {
  const tree = createTree();
  assert.deepStrictEqual(
    tree.children(tree.root, false).map(node => node.name),
    ["ZETA.BIN;1", "DATA", "ALPHA.STR;1"]
  );
  assert.deepStrictEqual(
    tree.children(tree.root, true).map(node => node.name),
    ["ALPHA.STR;1", "DATA", "ZETA.BIN;1"]
  );
});

void test("FilesystemTree sizes files in sectors of their form", () => {
  const tree = createTree();
  const [zeta, data, alpha] = tree.children(tree.root, false);
  assert.strictEqual(zeta?.numSectors, 3);
  assert.strictEqual(alpha?.numSectors, 2);
  assert.ok(data && data.kind === "directory");
  const [level] = tree.children(data, false);
  // empty files still take a sector
  assert.strictEqual(level?.numSectors, 1);
  assert.strictEqual(level ? tree.pathOf(level) : "", "/DATA/LEVEL.BIN;1");
});

void test("FilesystemTree traversals visit every node once", () => {
  const tree = createTree();
  const names = (order: "pre-order" | "pre-order-sorted" | "breadth-first-sorted") =>
    [...tree.traverse(order)].map(node => node.name);
  assert.deepStrictEqual(names("pre-order"), ["", "ZETA.BIN;1", "DATA", "LEVEL.BIN;1", "ALPHA.STR;1"]);
  assert.deepStrictEqual(names("pre-order-sorted"), ["", "ALPHA.STR;1", "DATA", "LEVEL.BIN;1", "ZETA.BIN;1"]);
  assert.deepStrictEqual(names("breadth-first-sorted"), ["", "ALPHA.STR;1", "DATA", "ZETA.BIN;1", "LEVEL.BIN;1"]);
  assert.deepStrictEqual(
    [...tree.directories("breadth-first-sorted")].map(node => node.name),
    ["", "DATA"]
  );
});

void test("FilesystemTree rejects duplicate names in one directory", () => {
  const tree = createTree();
  assert.throws(
    () => tree.addFile(0, { name: "ZETA.BIN;1", hostPath: "disc/ZETA.BIN", size: 1 }),
    (error: unknown) =>
      error instanceof DiscImageError &&
      error.kind === "validation" &&
      error.message === `Duplicate entry "ZETA.BIN;1" in directory "/"`
  );
  assert.throws(() => tree.directory(1), TypeError);
  assert.throws(() => tree.node(99), RangeError);
});

void test("allocateSectors places nodes back to back in pre-order", () => {
  const tree = createTree();
  tree.root.numSectors = 1;
  tree.directory(2).numSectors = 1;
  const allocator = allocateSectors(tree, 22, () => undefined);
  assert.deepStrictEqual(
    [...tree.traverse("pre-order")].map(node => [node.name, node.firstSector]),
    [
      ["", 22],
      ["ZETA.BIN;1", 23],
      ["DATA", 26],
      ["LEVEL.BIN;1", 27],
      ["ALPHA.STR;1", 28]
    ]
  );
  assert.strictEqual(allocator.currentSector, 30);
  assert.deepStrictEqual(allocator.overrides, []);
});

void test("SectorAllocator honours later start sectors and overrides earlier ones", () => {
  const tree = new FilesystemTree("disc");
  const gap = tree.addFile(0, { name: "GAP.BIN;1", hostPath: "disc/GAP.BIN", size: 10, requestedStartSector: 40 });
  const early = tree.addFile(0, { name: "EARLY.BIN;1", hostPath: "disc/EARLY.BIN", size: 10, requestedStartSector: 30 });
  const issues: string[] = [];
  const allocator = new SectorAllocator(22);
  allocator.place(gap, gap.hostPath, message => issues.push(message));
  allocator.place(early, early.hostPath, message => issues.push(message));
  assert.strictEqual(gap.firstSector, 40);
  assert.strictEqual(early.firstSector, 41);
  assert.strictEqual(allocator.currentSector, 42);
  assert.deepStrictEqual(issues, ["disc/EARLY.BIN will start at sector 41 instead of 30"]);
  assert.deepStrictEqual(allocator.overrides, [{ path: "disc/EARLY.BIN", requested: 30, actual: 41 }]);
});
