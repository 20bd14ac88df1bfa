"use strict";

import { formatLongDateTime } from "../builders/iso9660/identifiers.js";
import type { LongDateTime } from "../builders/iso9660/types.js";

export type CatalogVolume = {
  systemId: string;
  volumeId: string;
  volumeSetId: string;
  publisherId: string;
  preparerId: string;
  applicationId: string;
  copyrightFileId: string;
  abstractFileId: string;
  bibliographicFileId: string;
  creationDate: LongDateTime;
  modificationDate: LongDateTime;
  expirationDate: LongDateTime;
  effectiveDate: LongDateTime;
};

/**
 * Produces catalog text in the grammar `parseCatalog` reads. Directory
 * sections are opened and closed in the order the caller walks the tree.
 */
export class CatalogWriter {
  private readonly lines: string[] = [];
  private depth = 0;
  private readonly writeLbns: boolean;

  constructor(options: { writeLbns?: boolean } = {}) {
    this.writeLbns = options.writeLbns ?? false;
  }

  systemArea(file: string): void {
    this.lines.push("system_area {", `  file "${file}"`, "}", "");
  }

  volume(volume: CatalogVolume): void {
    this.lines.push(
      "volume {",
      `  system_id [${volume.systemId}]`,
      `  volume_id [${volume.volumeId}]`,
      `  volume_set_id [${volume.volumeSetId}]`,
      `  publisher_id [${volume.publisherId}]`,
      `  preparer_id [${volume.preparerId}]`,
      `  application_id [${volume.applicationId}]`,
      `  copyright_file_id [${volume.copyrightFileId}]`,
      `  abstract_file_id [${volume.abstractFileId}]`,
      `  bibliographic_file_id [${volume.bibliographicFileId}]`,
      `  creation_date ${formatLongDateTime(volume.creationDate)}`,
      `  modification_date ${formatLongDateTime(volume.modificationDate)}`,
      `  expiration_date ${formatLongDateTime(volume.expirationDate)}`,
      `  effective_date ${formatLongDateTime(volume.effectiveDate)}`,
      "}",
      ""
    );
  }

  /** The root section never carries a start sector. */
  openDirectory(name: string, lbn?: number): void {
    if (this.depth === 0) {
      this.lines.push("dir {");
    } else {
      this.lines.push(`${this.indent(this.depth)}dir ${name}${this.lbnSuffix(lbn)} {`);
    }
    this.depth += 1;
  }

  closeDirectory(): void {
    if (this.depth === 0) throw new RangeError("No open directory section");
    this.depth -= 1;
    this.lines.push(`${this.indent(this.depth)}}`);
  }

  file(name: string, isForm2: boolean, lbn?: number): void {
    this.lines.push(`${this.indent(this.depth)}${isForm2 ? "xa" : ""}file ${name}${this.lbnSuffix(lbn)}`);
  }

  toString(): string {
    return this.lines.map(line => `${line}\n`).join("");
  }

  private indent(level: number): string {
    return " ".repeat(level * 2);
  }

  private lbnSuffix(lbn: number | undefined): string {
    return this.writeLbns && lbn !== undefined ? ` @${lbn}` : "";
  }
}
