"use strict";

import { DiscImageError } from "../../errors.js";
import { sectorsFor } from "../../binary-utils.js";
import { FORM1_DATA_SIZE, MODE2_RAW_SECTOR_SIZE } from "../../cdrom/mode2-sector.js";
import type { DirectoryNode, FileNode, FilesystemNode, NodeId, TraversalOrder } from "./types.js";

export const compareNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export type NewFile = {
  name: string;
  hostPath: string;
  size: number;
  isForm2?: boolean;
  requestedStartSector?: number;
};

/**
 * Arena of filesystem nodes. Nodes refer to each other by id; the root is
 * always id 0. Layout passes fill in the sector fields in place.
 */
export class FilesystemTree {
  private readonly nodes: FilesystemNode[] = [];

  constructor(rootHostPath: string, requestedStartSector = 0) {
    this.nodes.push(this.createDirectory("", rootHostPath, null, requestedStartSector));
  }

  get root(): DirectoryNode {
    return this.directory(0);
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  node(id: NodeId): FilesystemNode {
    const node = this.nodes[id];
    if (!node) throw new RangeError(`No filesystem node with id ${id}`);
    return node;
  }

  directory(id: NodeId): DirectoryNode {
    const node = this.node(id);
    if (node.kind !== "directory") throw new TypeError(`Node ${node.hostPath} is not a directory`);
    return node;
  }

  parentOf(node: FilesystemNode): DirectoryNode | null {
    return node.parent == null ? null : this.directory(node.parent);
  }

  /** Absolute path inside the image, e.g. "/DATA/LEVEL1.BIN;1". */
  pathOf(node: FilesystemNode): string {
    const parts: string[] = [];
    let current: FilesystemNode | null = node;
    while (current && current.parent != null) {
      parts.unshift(current.name);
      current = this.parentOf(current);
    }
    return "/" + parts.join("/");
  }

  addDirectory(parentId: NodeId, name: string, hostPath: string, requestedStartSector = 0): DirectoryNode {
    const directory = this.createDirectory(name, hostPath, parentId, requestedStartSector);
    this.attach(parentId, directory);
    return directory;
  }

  addFile(parentId: NodeId, file: NewFile): FileNode {
    const isForm2 = file.isForm2 ?? false;
    const blockSize = isForm2 ? MODE2_RAW_SECTOR_SIZE : FORM1_DATA_SIZE;
    const node: FileNode = {
      kind: "file",
      id: this.nodes.length,
      name: file.name,
      hostPath: file.hostPath,
      parent: parentId,
      firstSector: 0,
      // empty files still occupy one sector
      numSectors: Math.max(1, sectorsFor(file.size, blockSize)),
      requestedStartSector: file.requestedStartSector ?? 0,
      size: file.size,
      isForm2
    };
    this.attach(parentId, node);
    return node;
  }

  children(directory: DirectoryNode, sorted: boolean): FilesystemNode[] {
    return (sorted ? directory.sortedChildren : directory.children).map(id => this.node(id));
  }

  /** Visits every node exactly once in the given order. */
  *traverse(order: TraversalOrder): Generator<FilesystemNode> {
    const sorted = order !== "pre-order";
    const pending: NodeId[] = [0];
    while (pending.length) {
      const id = order === "breadth-first-sorted" ? pending.shift() : pending.pop();
      if (id === undefined) break;
      const node = this.node(id);
      yield node;
      if (node.kind !== "directory") continue;
      const childIds = sorted ? node.sortedChildren : node.children;
      if (order === "breadth-first-sorted") {
        pending.push(...childIds);
      } else {
        for (let i = childIds.length - 1; i >= 0; i -= 1) {
          const childId = childIds[i];
          if (childId !== undefined) pending.push(childId);
        }
      }
    }
  }

  *directories(order: TraversalOrder): Generator<DirectoryNode> {
    for (const node of this.traverse(order)) {
      if (node.kind === "directory") yield node;
    }
  }

  private createDirectory(
    name: string,
    hostPath: string,
    parent: NodeId | null,
    requestedStartSector: number
  ): DirectoryNode {
    return {
      kind: "directory",
      id: this.nodes.length,
      name,
      hostPath,
      parent,
      firstSector: 0,
      numSectors: 0,
      requestedStartSector,
      children: [],
      sortedChildren: [],
      data: null,
      recordNumber: 0
    };
  }

  private attach(parentId: NodeId, node: FilesystemNode): void {
    const parent = this.directory(parentId);
    const duplicate = parent.children.some(childId => this.node(childId).name === node.name);
    if (duplicate) {
      throw new DiscImageError("validation", `Duplicate entry "${node.name}" in directory "${this.pathOf(parent)}"`);
    }
    this.nodes.push(node);
    parent.children.push(node.id);
    const insertAt = parent.sortedChildren.findIndex(childId => compareNames(node.name, this.node(childId).name) < 0);
    if (insertAt === -1) {
      parent.sortedChildren.push(node.id);
    } else {
      parent.sortedChildren.splice(insertAt, 0, node.id);
    }
  }
}
