"use strict";

import {
  closeSync,
  fstatSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  statSync,
  writeFileSync,
  writeSync
} from "node:fs";

import { DiscImageError, describeCause } from "../errors.js";

export interface HostFile {
  readonly path: string;
  readonly size: number;
  /** Reads up to `buffer.length` bytes at `position`; returns the count read (0 at end of file). */
  read(buffer: Uint8Array, position: number): number;
  /** Writes at `position`, or at the current end of a sequential write when omitted. */
  write(bytes: Uint8Array, position?: number): void;
  close(): void;
}

export interface HostFileSystem {
  fileSize(path: string): number;
  exists(path: string): boolean;
  openRead(path: string): HostFile;
  openWrite(path: string): HostFile;
  openReadWrite(path: string): HostFile;
  readText(path: string): string;
  writeText(path: string, text: string): void;
  makeDirectory(path: string): void;
}

/** Fills `buffer` as far as the file allows; the rest is zeroed. */
export const readFully = (file: HostFile, buffer: Uint8Array, position: number): number => {
  buffer.fill(0);
  let total = 0;
  while (total < buffer.length) {
    const count = file.read(buffer.subarray(total), position + total);
    if (count <= 0) break;
    total += count;
  }
  return total;
};

const ioError = (message: string, path: string, cause: unknown): DiscImageError =>
  new DiscImageError("io", `${message} "${path}": ${describeCause(cause)}`, { cause });

class NodeHostFile implements HostFile {
  readonly path: string;
  private fd: number | null;
  private appendPosition = 0;

  constructor(path: string, fd: number) {
    this.path = path;
    this.fd = fd;
  }

  private get descriptor(): number {
    if (this.fd == null) throw new DiscImageError("io", `File "${this.path}" is already closed`);
    return this.fd;
  }

  get size(): number {
    return fstatSync(this.descriptor).size;
  }

  read(buffer: Uint8Array, position: number): number {
    try {
      return readSync(this.descriptor, buffer, 0, buffer.length, position);
    } catch (error) {
      throw ioError("Error reading", this.path, error);
    }
  }

  write(bytes: Uint8Array, position?: number): void {
    const start = position ?? this.appendPosition;
    let written = 0;
    try {
      while (written < bytes.length) {
        written += writeSync(this.descriptor, bytes, written, bytes.length - written, start + written);
      }
    } catch (error) {
      throw ioError("Error writing to", this.path, error);
    }
    if (position === undefined) this.appendPosition += bytes.length;
  }

  close(): void {
    if (this.fd == null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      throw ioError("Error closing", this.path, error);
    }
  }
}

const openWithFlags = (path: string, flags: string, action: string): HostFile => {
  try {
    return new NodeHostFile(path, openSync(path, flags));
  } catch (error) {
    throw ioError(action, path, error);
  }
};

export const nodeHostFileSystem: HostFileSystem = {
  fileSize(path) {
    try {
      const stats = statSync(path);
      if (!stats.isFile()) throw new Error("not a regular file");
      return stats.size;
    } catch (error) {
      throw ioError("Cannot stat file", path, error);
    }
  },
  exists(path) {
    try {
      statSync(path);
      return true;
    } catch {
      return false;
    }
  },
  openRead: path => openWithFlags(path, "r", "Cannot open file"),
  openWrite: path => openWithFlags(path, "w", "Cannot create file"),
  openReadWrite: path => openWithFlags(path, "r+", "Cannot open file for writing"),
  readText(path) {
    try {
      return readFileSync(path, "utf8");
    } catch (error) {
      throw ioError("Cannot read file", path, error);
    }
  },
  writeText(path, text) {
    try {
      writeFileSync(path, text, "utf8");
    } catch (error) {
      throw ioError("Cannot write file", path, error);
    }
  },
  makeDirectory(path) {
    try {
      mkdirSync(path, { recursive: true });
    } catch (error) {
      throw ioError("Cannot create directory", path, error);
    }
  }
};
