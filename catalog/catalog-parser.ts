"use strict";

import { join } from "node:path";

import { DiscImageError } from "../errors.js";
import type { HostFileSystem } from "../host/host-files.js";
import { FilesystemTree } from "../builders/iso9660/filesystem-tree.js";
import { MAX_ISO_SECTORS } from "../builders/iso9660/index.js";
import {
  checkAString,
  checkDString,
  checkFileName,
  createVolumeMetadata,
  parseLongDateTime
} from "../builders/iso9660/identifiers.js";
import type { DirectoryNode, VolumeMetadata } from "../builders/iso9660/types.js";
import { ISO_TERMINATOR_SECTOR } from "../builders/iso9660/volume-descriptors.js";

export type Catalog = {
  systemAreaFile: string | null;
  metadata: VolumeMetadata;
  tree: FilesystemTree;
};

export type ParseCatalogOptions = {
  /** Host directory that holds the root's contents. */
  basePath: string;
  host: HostFileSystem;
};

const syntaxError = (message: string): DiscImageError =>
  new DiscImageError("validation", `Syntax error in catalog file: ${message}`);

/** Hands out trimmed, non-empty lines; null at the end of the text. */
class CatalogLines {
  private readonly lines: string[];
  private index = 0;

  constructor(text: string) {
    this.lines = text.split(/\r?\n/);
  }

  next(): string | null {
    while (this.index < this.lines.length) {
      const line = (this.lines[this.index] ?? "").trim();
      this.index += 1;
      if (line.length) return line;
    }
    return null;
  }
}

const MAX_ID = 0xffff;
const MAX_UINT32 = 0xffffffff;

/** Parses an optional "@n" start sector; 0 when absent. */
export const checkStartLbn = (text: string | undefined, itemName: string): number => {
  if (text === undefined || !text.length) return 0;
  const lbn = Number(text);
  if (!Number.isSafeInteger(lbn) || lbn > MAX_UINT32) {
    throw new DiscImageError("validation", `Invalid start LBN '${text}' specified for '${itemName}'`);
  }
  if (lbn <= ISO_TERMINATOR_SECTOR || lbn >= MAX_ISO_SECTORS) {
    throw new DiscImageError(
      "validation",
      `Start LBN '${text}' of '${itemName}' is outside the valid range ${ISO_TERMINATOR_SECTOR}..${MAX_ISO_SECTORS}`
    );
  }
  return lbn;
};

const parseId = (text: string, kind: "user" | "group"): number => {
  const value = Number(text);
  if (!Number.isSafeInteger(value) || value > MAX_ID) {
    throw new DiscImageError("validation", `'${text}' is not a valid ${kind} ID`);
  }
  return value;
};

const parseSystemArea = (lines: CatalogLines): string | null => {
  let file: string | null = null;
  for (;;) {
    const line = lines.next();
    if (line == null) throw syntaxError("unterminated system_area section");
    if (line === "}") return file;
    const match = /^file\s*"(.+)"$/.exec(line);
    if (!match) throw syntaxError(`"${line}" unrecognized in system_area section`);
    file = match[1] ?? null;
  }
};

type IdField = {
  key: keyof Pick<
    VolumeMetadata,
    | "systemId"
    | "volumeId"
    | "volumeSetId"
    | "publisherId"
    | "preparerId"
    | "applicationId"
    | "copyrightFileId"
    | "abstractFileId"
    | "bibliographicFileId"
  >;
  charset: "a" | "d";
};

const ID_FIELDS: Record<string, IdField> = {
  system_id: { key: "systemId", charset: "a" },
  volume_id: { key: "volumeId", charset: "d" },
  volume_set_id: { key: "volumeSetId", charset: "d" },
  publisher_id: { key: "publisherId", charset: "a" },
  preparer_id: { key: "preparerId", charset: "a" },
  application_id: { key: "applicationId", charset: "a" },
  copyright_file_id: { key: "copyrightFileId", charset: "d" },
  abstract_file_id: { key: "abstractFileId", charset: "d" },
  bibliographic_file_id: { key: "bibliographicFileId", charset: "d" }
};

type DateKey = keyof Pick<VolumeMetadata, "creationDate" | "modificationDate" | "expirationDate" | "effectiveDate">;

const DATE_FIELDS: Record<string, DateKey> = {
  creation_date: "creationDate",
  modification_date: "modificationDate",
  expiration_date: "expirationDate",
  effective_date: "effectiveDate"
};

const parseVolume = (lines: CatalogLines, metadata: VolumeMetadata): void => {
  for (;;) {
    const line = lines.next();
    if (line == null) throw syntaxError("unterminated volume section");
    if (line === "}") return;

    const id = /^([a-z_]+)\s*\[(.*)\]$/.exec(line);
    const idField = id ? ID_FIELDS[id[1] ?? ""] : undefined;
    if (id && idField) {
      const value = id[2] ?? "";
      if (idField.charset === "a") {
        checkAString(value, id[1] ?? "");
      } else {
        checkDString(value, id[1] ?? "");
      }
      metadata[idField.key] = value;
      continue;
    }

    const date = /^([a-z_]+_date)\s*(.*)$/.exec(line);
    const dateKey = date ? DATE_FIELDS[date[1] ?? ""] : undefined;
    if (date && dateKey) {
      metadata[dateKey] = parseLongDateTime(date[2] ?? "");
      continue;
    }

    const uid = /^default_uid\s*(\d+)$/.exec(line);
    if (uid) {
      metadata.defaultUid = parseId(uid[1] ?? "", "user");
      continue;
    }
    const gid = /^default_gid\s*(\d+)$/.exec(line);
    if (gid) {
      metadata.defaultGid = parseId(gid[1] ?? "", "group");
      continue;
    }

    throw syntaxError(`"${line}" unrecognized in volume section`);
  }
};

const FILE_LINE = /^file\s*(\S+)(?:\s*@(\d+))?$/;
const XA_FILE_LINE = /^xafile\s*(\S+)(?:\s*@(\d+))?$/;
const DIR_START = /^dir\s*(\S+)(?:\s*@(\d+))?\s*\{$/;

const parseDirectory = (
  lines: CatalogLines,
  tree: FilesystemTree,
  directory: DirectoryNode,
  host: HostFileSystem
): void => {
  for (;;) {
    const line = lines.next();
    if (line == null) throw syntaxError(`unterminated directory section "${directory.name}"`);
    if (line === "}") return;

    const file = FILE_LINE.exec(line) ?? XA_FILE_LINE.exec(line);
    if (file) {
      const fileName = file[1] ?? "";
      checkFileName(fileName, "file name");
      const requestedStartSector = checkStartLbn(file[2], fileName);
      const hostPath = join(directory.hostPath, fileName);
      tree.addFile(directory.id, {
        name: `${fileName};1`,
        hostPath,
        size: host.fileSize(hostPath),
        isForm2: line.startsWith("xafile"),
        requestedStartSector
      });
      continue;
    }

    const dir = DIR_START.exec(line);
    if (dir) {
      const dirName = dir[1] ?? "";
      checkDString(dirName, "directory name");
      const requestedStartSector = checkStartLbn(dir[2], dirName);
      const child = tree.addDirectory(directory.id, dirName, join(directory.hostPath, dirName), requestedStartSector);
      parseDirectory(lines, tree, child, host);
      continue;
    }

    throw syntaxError(`"${line}" unrecognized in directory section`);
  }
};

/**
 * Reads a catalog: an optional system_area section, an optional volume
 * section and exactly one root dir section. File sizes are taken from the
 * host while parsing.
 */
export const parseCatalog = (text: string, options: ParseCatalogOptions): Catalog => {
  const lines = new CatalogLines(text);
  const metadata = createVolumeMetadata();
  let systemAreaFile: string | null = null;
  let tree: FilesystemTree | null = null;

  for (let line = lines.next(); line != null; line = lines.next()) {
    if (/^system_area\s*\{$/.test(line)) {
      systemAreaFile = parseSystemArea(lines);
    } else if (/^volume\s*\{$/.test(line)) {
      parseVolume(lines, metadata);
    } else if (/^dir\s*\{$/.test(line)) {
      if (tree) throw new DiscImageError("validation", "More than one root directory section in catalog file");
      tree = new FilesystemTree(options.basePath);
      parseDirectory(lines, tree, tree.root, options.host);
    } else {
      throw syntaxError(`"${line}" unrecognized`);
    }
  }

  if (!tree) throw new DiscImageError("validation", "No root directory specified in catalog file");
  return { systemAreaFile, metadata, tree };
};
