"use strict";

import type { PushIssue } from "../../errors.js";
import type { Iso9660PathTableEntry } from "./types.js";
import { decodeAsciiField, formatOffsetHex, readUint16Be, readUint16Le, readUint32Be, readUint32Le } from "./iso-parsing.js";

export type PathTableByteOrder = "L" | "M";

/** Parses a type L (little-endian) or type M (big-endian) path table. */
export const parsePathTable = (
  bytes: Uint8Array,
  byteOrder: PathTableByteOrder,
  pushIssue: PushIssue
): Iso9660PathTableEntry[] => {
  const readUint16 = byteOrder === "L" ? readUint16Le : readUint16Be;
  const readUint32 = byteOrder === "L" ? readUint32Le : readUint32Be;
  const entries: Iso9660PathTableEntry[] = [];
  let cursor = 0;

  while (cursor + 8 <= bytes.length) {
    const identifierLength = bytes[cursor] ?? 0;
    if (identifierLength === 0) break;
    const nameStart = cursor + 8;
    const nameEnd = nameStart + identifierLength;
    if (nameEnd > bytes.length) {
      pushIssue(`Truncated path table entry at ${formatOffsetHex(cursor)}.`);
      break;
    }
    const nameBytes = bytes.subarray(nameStart, nameEnd);
    entries.push({
      index: entries.length + 1,
      identifier: identifierLength === 1 && nameBytes[0] === 0x00 ? "" : decodeAsciiField(nameBytes, 0, nameBytes.length),
      extentLocationLba: readUint32(bytes, cursor + 2) ?? 0,
      parentDirectoryIndex: readUint16(bytes, cursor + 6) ?? 0
    });
    cursor = nameEnd + (identifierLength % 2);
  }

  return entries;
};
