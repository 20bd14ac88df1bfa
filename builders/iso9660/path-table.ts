"use strict";

import { asciiBytes, writeUint16Be, writeUint16Le, writeUint32Be, writeUint32Le } from "../../binary-utils.js";
import { DiscImageError } from "../../errors.js";
import type { FilesystemTree } from "./filesystem-tree.js";

export const PATH_TABLE_MAX_SIZE = 2048;
const PATH_TABLE_ENTRY_HEADER_SIZE = 8;

/**
 * Type L (little-endian) and type M (big-endian) path tables, built side by
 * side. Both are limited to one logical block.
 */
export class PathTableBuilder {
  private readonly lTable = new Uint8Array(PATH_TABLE_MAX_SIZE);
  private readonly mTable = new Uint8Array(PATH_TABLE_MAX_SIZE);
  private used = 0;
  private entries = 0;
  private lastParent = 0;

  get size(): number {
    return this.used;
  }

  get entryCount(): number {
    return this.entries;
  }

  /** Appends a directory and returns its 1-based record number. */
  addEntry(name: string, extent: number, parentRecordNumber: number): number {
    // The root directory is recorded under a single 0x00 byte.
    const identifier = name.length ? asciiBytes(name) : new Uint8Array([0x00]);
    const entrySize = PATH_TABLE_ENTRY_HEADER_SIZE + identifier.length + (identifier.length % 2);
    if (this.used + entrySize > PATH_TABLE_MAX_SIZE) {
      throw new DiscImageError("layout", "The path table is larger than one sector. This is currently not supported.");
    }
    if (parentRecordNumber < this.lastParent) {
      throw new DiscImageError(
        "layout",
        `Path table entry "${name}" refers to parent ${parentRecordNumber} after parent ${this.lastParent}`
      );
    }
    const offset = this.used;
    for (const table of [this.lTable, this.mTable]) {
      table[offset] = identifier.length;
      table[offset + 1] = 0;
      table.set(identifier, offset + PATH_TABLE_ENTRY_HEADER_SIZE);
    }
    writeUint32Le(this.lTable, offset + 2, extent);
    writeUint16Le(this.lTable, offset + 6, parentRecordNumber);
    writeUint32Be(this.mTable, offset + 2, extent);
    writeUint16Be(this.mTable, offset + 6, parentRecordNumber);
    this.used += entrySize;
    this.lastParent = parentRecordNumber;
    this.entries += 1;
    return this.entries;
  }

  /** The full type L sector, zero padded. */
  get typeL(): Uint8Array {
    return this.lTable.slice();
  }

  /** The full type M sector, zero padded. */
  get typeM(): Uint8Array {
    return this.mTable.slice();
  }
}

/**
 * Records every directory breadth-first so that a parent's record number is
 * known before its children are added. Sets `recordNumber` on each directory.
 */
export const buildPathTables = (tree: FilesystemTree): PathTableBuilder => {
  const builder = new PathTableBuilder();
  for (const directory of tree.directories("breadth-first-sorted")) {
    const parent = tree.parentOf(directory);
    directory.recordNumber = builder.addEntry(directory.name, directory.firstSector, parent ? parent.recordNumber : 1);
  }
  return builder;
};
