"use strict";

import type { PushIssue } from "../../errors.js";
import type { FilesystemTree } from "./filesystem-tree.js";
import type { FilesystemNode } from "./types.js";

export type StartSectorOverride = {
  path: string;
  requested: number;
  actual: number;
};

/**
 * Hands out sectors from one linear address space. A requested start at or
 * past the cursor is honoured and leaves a gap; an earlier one would overlap
 * data already placed, so the node goes to the cursor instead.
 */
export class SectorAllocator {
  private cursor: number;
  readonly overrides: StartSectorOverride[] = [];

  constructor(startSector: number) {
    this.cursor = startSector;
  }

  get currentSector(): number {
    return this.cursor;
  }

  place(node: FilesystemNode, path: string, pushIssue: PushIssue): void {
    const requested = node.requestedStartSector;
    if (requested && requested < this.cursor) {
      node.firstSector = this.cursor;
      this.overrides.push({ path, requested, actual: node.firstSector });
      pushIssue(`${path} will start at sector ${node.firstSector} instead of ${requested}`);
    } else if (requested) {
      node.firstSector = requested;
    } else {
      node.firstSector = this.cursor;
    }
    this.cursor = node.firstSector + node.numSectors;
  }
}

/**
 * Assigns `firstSector` to every node in pre-order, declaration order, which
 * is the order the image writer emits extents in. Returns the allocator so the
 * caller can read the final cursor (the volume size) and the overrides.
 */
export const allocateSectors = (
  tree: FilesystemTree,
  startSector: number,
  pushIssue: PushIssue
): SectorAllocator => {
  const allocator = new SectorAllocator(startSector);
  for (const node of tree.traverse("pre-order")) {
    allocator.place(node, node.hostPath, pushIssue);
  }
  return allocator;
};
