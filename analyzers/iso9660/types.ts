"use strict";

import type { LongDateTime } from "../../builders/iso9660/types.js";

export type Iso9660VolumeDescriptorSummary = {
  sector: number;
  typeCode: number;
  typeName: string;
  identifier: string | null;
  version: number | null;
};

/** CD-ROM XA system use field of a directory record. */
export type XaSystemUse = {
  groupId: number;
  userId: number;
  attributes: number;
  fileNumber: number;
};

export type Iso9660DirectoryRecord = {
  recordLength: number;
  extendedAttributeRecordLength: number;
  extentLocationLba: number | null;
  dataLength: number | null;
  recordingTime: Uint8Array;
  fileFlags: number;
  volumeSequenceNumber: number | null;
  /** Identifier as stored, version suffix included; "." and ".." for the special entries. */
  fileIdentifierRaw: string;
  fileIdentifier: string;
  fileVersion: number | null;
  isDirectory: boolean;
  isDotEntry: boolean;
  isDotDotEntry: boolean;
  systemUseLength: number;
  xa: XaSystemUse | null;
};

export type Iso9660PrimaryVolumeDescriptor = {
  systemIdentifier: string;
  volumeIdentifier: string;
  volumeSpaceSizeBlocks: number | null;
  volumeSetSize: number | null;
  volumeSequenceNumber: number | null;
  logicalBlockSize: number | null;
  pathTableSize: number | null;
  typeLPathTableLocation: number | null;
  optionalTypeLPathTableLocation: number | null;
  typeMPathTableLocation: number | null;
  optionalTypeMPathTableLocation: number | null;
  rootDirectoryRecord: Iso9660DirectoryRecord | null;
  volumeSetIdentifier: string;
  publisherIdentifier: string;
  dataPreparerIdentifier: string;
  applicationIdentifier: string;
  copyrightFileIdentifier: string;
  abstractFileIdentifier: string;
  bibliographicFileIdentifier: string;
  volumeCreationDateTime: LongDateTime;
  volumeModificationDateTime: LongDateTime;
  volumeExpirationDateTime: LongDateTime;
  volumeEffectiveDateTime: LongDateTime;
  fileStructureVersion: number | null;
  isXa: boolean;
};

export type Iso9660PathTableEntry = {
  index: number;
  identifier: string;
  extentLocationLba: number;
  parentDirectoryIndex: number;
};

export type Iso9660Stat = {
  /** Identifier as stored, e.g. "SYSTEM.CNF;1"; empty for the root. */
  name: string;
  lsn: number;
  size: number;
  sectorCount: number;
  isDirectory: boolean;
  xa: XaSystemUse | null;
};
