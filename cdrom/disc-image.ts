"use strict";

import { basename, dirname, extname, isAbsolute, join } from "node:path";

import { DiscImageError } from "../errors.js";
import { readFully, type HostFile, type HostFileSystem } from "../host/host-files.js";
import {
  FORM1_DATA_SIZE,
  RAW_SECTOR_SIZE,
  SYNC_SIZE,
  HEADER_SIZE,
  XA_DATA_OFFSET,
  decodeMode2Sector,
  type DecodedMode2Sector
} from "./mode2-sector.js";

export type TrackFormat = "xa" | "data" | "audio";

export type CueTrack = {
  number: number;
  mode: string;
  format: TrackFormat;
  sectorSize: number;
};

export type CueSheet = {
  binFile: string;
  tracks: CueTrack[];
};

const TRACK_MODES: Record<string, { format: TrackFormat; sectorSize: number }> = {
  "MODE2/2352": { format: "xa", sectorSize: RAW_SECTOR_SIZE },
  "MODE1/2352": { format: "data", sectorSize: RAW_SECTOR_SIZE },
  "MODE1/2048": { format: "data", sectorSize: FORM1_DATA_SIZE },
  AUDIO: { format: "audio", sectorSize: RAW_SECTOR_SIZE }
};

/** Reads the first FILE line and every TRACK line of a cue sheet. */
export const parseCueSheet = (text: string): CueSheet => {
  let binFile: string | null = null;
  const tracks: CueTrack[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const file = /^FILE\s+(?:"([^"]+)"|(\S+))\s+(\S+)$/i.exec(line);
    if (file) {
      if (binFile == null) binFile = file[1] ?? file[2] ?? null;
      continue;
    }
    const track = /^TRACK\s+(\d+)\s+(\S+)$/i.exec(line);
    if (track) {
      const mode = (track[2] ?? "").toUpperCase();
      const known = TRACK_MODES[mode];
      if (!known) throw new DiscImageError("validation", `Unsupported track mode "${mode}" in cue sheet`);
      tracks.push({ number: Number.parseInt(track[1] ?? "0", 10), mode, ...known });
    }
  }
  if (binFile == null) throw new DiscImageError("validation", "Cue sheet has no FILE line");
  if (!tracks.length) throw new DiscImageError("validation", "Cue sheet has no TRACK line");
  return { binFile, tracks };
};

export const formatCueSheet = (binFileName: string): string =>
  `FILE "${binFileName}" BINARY\r\n` + "  TRACK 01 MODE2/2352\r\n" + "    INDEX 01 00:00:00\r\n";

export type DiscImageInfo = {
  binPath: string;
  firstTrack: number;
  format: TrackFormat;
  sectorSize: number;
  /** Byte offset of the 2048-byte user data inside one stored sector. */
  dataOffset: number;
};

const dataOffsetFor = (mode: string): number => {
  if (mode === "MODE2/2352") return XA_DATA_OFFSET;
  if (mode === "MODE1/2352") return SYNC_SIZE + HEADER_SIZE;
  return 0;
};

const describeImage = (path: string, host: HostFileSystem): DiscImageInfo => {
  if (extname(path).toLowerCase() === ".cue") {
    const cue = parseCueSheet(host.readText(path));
    const first = cue.tracks[0];
    if (!first) throw new DiscImageError("validation", `Cue sheet "${path}" has no tracks`);
    const binPath = isAbsolute(cue.binFile) ? cue.binFile : join(dirname(path), basename(cue.binFile));
    return {
      binPath,
      firstTrack: first.number,
      format: first.format,
      sectorSize: first.sectorSize,
      dataOffset: dataOffsetFor(first.mode)
    };
  }
  const size = host.fileSize(path);
  if (size % RAW_SECTOR_SIZE === 0) {
    return { binPath: path, firstTrack: 1, format: "xa", sectorSize: RAW_SECTOR_SIZE, dataOffset: XA_DATA_OFFSET };
  }
  return { binPath: path, firstTrack: 1, format: "data", sectorSize: FORM1_DATA_SIZE, dataOffset: 0 };
};


/**
 * Sector-addressed view of a single-bin disc image. Sector 0 is the first
 * stored sector; images start at the first track's INDEX 01.
 */
export class DiscImage {
  readonly info: DiscImageInfo;
  private readonly file: HostFile;

  private constructor(info: DiscImageInfo, file: HostFile) {
    this.info = info;
    this.file = file;
  }

  /** Opens `<path>.cue` or a bare `.bin` image for reading. */
  static open(path: string, host: HostFileSystem): DiscImage {
    const info = describeImage(path, host);
    return new DiscImage(info, host.openRead(info.binPath));
  }

  get isRawMode2(): boolean {
    return this.info.format === "xa" && this.info.sectorSize === RAW_SECTOR_SIZE;
  }

  get sectorCount(): number {
    return Math.floor(this.file.size / this.info.sectorSize);
  }

  /** The stored sector as is: 2352 bytes for raw images, 2048 for cooked ones. */
  readStoredSector(lsn: number): Uint8Array {
    this.assertInRange(lsn);
    const out = new Uint8Array(this.info.sectorSize);
    const count = readFully(this.file, out, lsn * this.info.sectorSize);
    if (count < out.length) {
      throw new DiscImageError("io", `Error reading sector ${lsn} of image file "${this.info.binPath}": short read`);
    }
    return out;
  }

  /** 2048 bytes of user data. */
  readDataSector(lsn: number): Uint8Array {
    const stored = this.readStoredSector(lsn);
    return stored.slice(this.info.dataOffset, this.info.dataOffset + FORM1_DATA_SIZE);
  }

  readMode2Sector(lsn: number): DecodedMode2Sector {
    if (!this.isRawMode2) {
      throw new DiscImageError("validation", `Image "${this.info.binPath}" does not hold raw Mode 2 sectors`);
    }
    return decodeMode2Sector(this.readStoredSector(lsn));
  }

  /** Reads `count` consecutive data sectors into one buffer. */
  readDataSectors(lsn: number, count: number): Uint8Array {
    const out = new Uint8Array(count * FORM1_DATA_SIZE);
    for (let index = 0; index < count; index += 1) {
      out.set(this.readDataSector(lsn + index), index * FORM1_DATA_SIZE);
    }
    return out;
  }

  close(): void {
    this.file.close();
  }

  private assertInRange(lsn: number): void {
    if (!Number.isInteger(lsn) || lsn < 0 || lsn >= this.sectorCount) {
      throw new DiscImageError(
        "io",
        `Error reading sector ${lsn} of image file "${this.info.binPath}": outside the ${this.sectorCount} sectors of the image`
      );
    }
  }
}
