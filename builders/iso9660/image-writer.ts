"use strict";

import { DiscImageError } from "../../errors.js";
import {
  FORM1_DATA_SIZE,
  MODE2_RAW_SECTOR_SIZE,
  RAW_SECTOR_SIZE,
  SM_DATA,
  SM_EOF,
  SM_EOR,
  dataSubheader,
  encodeEmptyForm2Sector,
  encodeMode2Sector,
  encodeRawXaSector,
  extentSubmode
} from "../../cdrom/mode2-sector.js";
import { readFully, type HostFile, type HostFileSystem } from "../../host/host-files.js";
import type { FilesystemTree } from "./filesystem-tree.js";
import { ISO_PVD_SECTOR, PATH_TABLE_SECTOR, ROOT_DIRECTORY_SECTOR } from "./volume-descriptors.js";
import type { DirectoryNode, FileNode } from "./types.js";

export const SYSTEM_AREA_SECTORS = 16;
export const SYSTEM_AREA_SIZE = SYSTEM_AREA_SECTORS * FORM1_DATA_SIZE;

/** Receives frames strictly in sector order. The frame buffer is reused; copy it if you keep it. */
export interface SectorSink {
  write(frame: Uint8Array): void;
}

export type ImageWriterState =
  | "system-area"
  | "primary-descriptor"
  | "terminator"
  | "path-tables"
  | "extents"
  | "closed";

/**
 * Emits a disc image front to back. Each step may run once, in order; the
 * extent step fills gaps with empty sectors instead of seeking because every
 * frame carries its own sector address.
 */
export class ImageWriter {
  private state: ImageWriterState = "system-area";
  private sector = 0;
  private readonly frame = new Uint8Array(RAW_SECTOR_SIZE);
  private readonly sink: SectorSink;
  private readonly log: (message: string) => void;

  constructor(sink: SectorSink, log: (message: string) => void = () => undefined) {
    this.sink = sink;
    this.log = log;
  }

  get currentSector(): number {
    return this.sector;
  }

  get currentState(): ImageWriterState {
    return this.state;
  }

  writeSystemArea(data: Uint8Array | null): void {
    this.enter("system-area", "primary-descriptor");
    const payload = data ? data.subarray(0, SYSTEM_AREA_SIZE) : new Uint8Array(0);
    const dataSectors = Math.ceil(payload.length / FORM1_DATA_SIZE);
    for (let index = 0; index < dataSectors; index += 1) {
      const start = index * FORM1_DATA_SIZE;
      this.emit(payload.subarray(start, start + FORM1_DATA_SIZE), SM_DATA);
    }
    this.writeGap(ISO_PVD_SECTOR);
  }

  writePrimaryDescriptor(descriptor: Uint8Array): void {
    this.enter("primary-descriptor", "terminator");
    this.emit(descriptor, SM_DATA | SM_EOR);
  }

  writeTerminator(descriptor: Uint8Array): void {
    this.enter("terminator", "path-tables");
    this.emit(descriptor, SM_DATA | SM_EOF | SM_EOR);
  }

  writePathTables(typeL: Uint8Array, typeM: Uint8Array): void {
    this.enter("path-tables", "extents");
    if (this.sector !== PATH_TABLE_SECTOR) {
      throw new DiscImageError("layout", `Path tables must start at sector ${PATH_TABLE_SECTOR}, writer is at ${this.sector}`);
    }
    for (const table of [typeL, typeL, typeM, typeM]) {
      this.emit(table, SM_DATA | SM_EOF | SM_EOR);
    }
  }

  /** Writes every extent in the allocation order, then closes the writer. */
  writeExtents(tree: FilesystemTree, host: HostFileSystem): void {
    this.enter("extents", "closed");
    if (this.sector !== ROOT_DIRECTORY_SECTOR) {
      throw new DiscImageError("layout", `Extents must start at sector ${ROOT_DIRECTORY_SECTOR}, writer is at ${this.sector}`);
    }
    for (const node of tree.traverse("pre-order")) {
      if (node.kind === "directory") {
        this.writeDirectory(node);
      } else {
        this.writeFile(node, host);
      }
    }
  }

  private writeDirectory(directory: DirectoryNode): void {
    const data = directory.data;
    if (!data) {
      throw new DiscImageError("layout", `Directory "${directory.hostPath}" has no extent data`);
    }
    this.writeGap(directory.firstSector);
    for (let index = 0; index < directory.numSectors; index += 1) {
      const start = index * FORM1_DATA_SIZE;
      this.emit(data.subarray(start, start + FORM1_DATA_SIZE), extentSubmode(index, directory.numSectors));
    }
  }

  private writeFile(file: FileNode, host: HostFileSystem): void {
    this.log(`Writing "${file.hostPath}"...`);
    const source: HostFile = host.openRead(file.hostPath);
    try {
      this.writeGap(file.firstSector);
      const blockSize = file.isForm2 ? MODE2_RAW_SECTOR_SIZE : FORM1_DATA_SIZE;
      const block = new Uint8Array(blockSize);
      for (let index = 0; index < file.numSectors; index += 1) {
        readFully(source, block, index * blockSize);
        if (file.isForm2) {
          encodeRawXaSector(block, this.sector, this.frame);
          this.push();
        } else {
          this.emit(block, extentSubmode(index, file.numSectors));
        }
      }
    } finally {
      source.close();
    }
  }

  private writeGap(until: number): void {
    if (until < this.sector) {
      throw new DiscImageError("layout", `Extent at sector ${until} overlaps data already written up to sector ${this.sector}`);
    }
    while (this.sector < until) {
      encodeEmptyForm2Sector(this.sector, this.frame);
      this.push();
    }
  }

  private emit(payload: Uint8Array, submode: number): void {
    encodeMode2Sector(payload, this.sector, dataSubheader(submode), this.frame);
    this.push();
  }

  private push(): void {
    this.sink.write(this.frame);
    this.sector += 1;
  }

  private enter(expected: ImageWriterState, next: ImageWriterState): void {
    if (this.state !== expected) {
      throw new DiscImageError("layout", `Image writer cannot write ${expected} while in state ${this.state}`);
    }
    this.state = next;
  }
}

/** Batches frames into larger sequential writes on a host file. */
export class HostFileSectorSink implements SectorSink {
  private readonly buffer: Uint8Array;
  private used = 0;
  private readonly file: HostFile;

  constructor(file: HostFile, sectorsPerWrite = 64) {
    this.file = file;
    this.buffer = new Uint8Array(sectorsPerWrite * RAW_SECTOR_SIZE);
  }

  write(frame: Uint8Array): void {
    if (this.used + frame.length > this.buffer.length) this.flush();
    this.buffer.set(frame, this.used);
    this.used += frame.length;
  }

  flush(): void {
    if (!this.used) return;
    this.file.write(this.buffer.subarray(0, this.used));
    this.used = 0;
  }
}
