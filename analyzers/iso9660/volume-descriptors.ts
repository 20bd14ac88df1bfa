"use strict";

import type { PushIssue } from "../../errors.js";
import type { Iso9660PrimaryVolumeDescriptor, Iso9660VolumeDescriptorSummary } from "./types.js";
import {
  decodeAsciiField,
  describeVolumeDescriptorType,
  parseLongDateTimeField,
  readBothEndianUint16,
  readBothEndianUint32,
  readUint32Be,
  readUint32Le
} from "./iso-parsing.js";
import { parseDirectoryRecord } from "./directory-records.js";

const XA_MARKER_OFFSET = 1024;

export const parseDescriptorSummary = (bytes: Uint8Array, sector: number): Iso9660VolumeDescriptorSummary | null => {
  if (bytes.length < 7) return null;
  const typeCode = bytes[0] ?? 0;
  const identifier = decodeAsciiField(bytes, 1, 5);
  return {
    sector,
    typeCode,
    typeName: describeVolumeDescriptorType(typeCode),
    identifier: identifier.length ? identifier : null,
    version: bytes[6] ?? null
  };
};

export const parsePrimaryVolumeDescriptor = (bytes: Uint8Array, pushIssue: PushIssue): Iso9660PrimaryVolumeDescriptor => ({
  systemIdentifier: decodeAsciiField(bytes, 8, 32),
  volumeIdentifier: decodeAsciiField(bytes, 40, 32),
  volumeSpaceSizeBlocks: readBothEndianUint32(bytes, 80, "Volume space size", pushIssue),
  volumeSetSize: readBothEndianUint16(bytes, 120, "Volume set size", pushIssue),
  volumeSequenceNumber: readBothEndianUint16(bytes, 124, "Volume sequence number", pushIssue),
  logicalBlockSize: readBothEndianUint16(bytes, 128, "Logical block size", pushIssue),
  pathTableSize: readBothEndianUint32(bytes, 132, "Path table size", pushIssue),
  typeLPathTableLocation: readUint32Le(bytes, 140),
  optionalTypeLPathTableLocation: readUint32Le(bytes, 144),
  typeMPathTableLocation: readUint32Be(bytes, 148),
  optionalTypeMPathTableLocation: readUint32Be(bytes, 152),
  rootDirectoryRecord: parseDirectoryRecord(bytes, 156, pushIssue, { zeroIdentifierMeaning: "root" }),
  volumeSetIdentifier: decodeAsciiField(bytes, 190, 128),
  publisherIdentifier: decodeAsciiField(bytes, 318, 128),
  dataPreparerIdentifier: decodeAsciiField(bytes, 446, 128),
  applicationIdentifier: decodeAsciiField(bytes, 574, 128),
  copyrightFileIdentifier: decodeAsciiField(bytes, 702, 37),
  abstractFileIdentifier: decodeAsciiField(bytes, 739, 37),
  bibliographicFileIdentifier: decodeAsciiField(bytes, 776, 37),
  volumeCreationDateTime: parseLongDateTimeField(bytes, 813),
  volumeModificationDateTime: parseLongDateTimeField(bytes, 830),
  volumeExpirationDateTime: parseLongDateTimeField(bytes, 847),
  volumeEffectiveDateTime: parseLongDateTimeField(bytes, 864),
  fileStructureVersion: bytes.length > 881 ? (bytes[881] ?? 0) : null,
  isXa: decodeAsciiField(bytes, XA_MARKER_OFFSET, 8) === "CD-XA001"
});
