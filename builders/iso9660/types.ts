"use strict";

export type NodeId = number;

type NodeBase = {
  id: NodeId;
  /** On-disk identifier; files carry the ";1" version suffix. */
  name: string;
  /** Location of the backing item in the host filesystem. */
  hostPath: string;
  parent: NodeId | null;
  firstSector: number;
  numSectors: number;
  /** Start sector requested by the catalog, 0 when unconstrained. */
  requestedStartSector: number;
};

export type FileNode = NodeBase & {
  kind: "file";
  size: number;
  isForm2: boolean;
};

export type DirectoryNode = NodeBase & {
  kind: "directory";
  children: NodeId[];
  sortedChildren: NodeId[];
  data: Uint8Array | null;
  recordNumber: number;
};

export type FilesystemNode = FileNode | DirectoryNode;

/** ECMA-119 8.4.26.1 long-format date: 16 ASCII digits and a GMT offset in 15-minute units. */
export type LongDateTime = {
  digits: string;
  gmtOffset: number;
};

export type VolumeMetadata = {
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
  defaultUid: number;
  defaultGid: number;
  systemArea: Uint8Array | null;
};

export type TraversalOrder = "pre-order" | "pre-order-sorted" | "breadth-first-sorted";
