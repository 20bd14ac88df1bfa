"use strict";

export type DiscImageErrorKind = "validation" | "layout" | "io" | "capacity";

/**
 * Fatal failure of a build, patch or rip. The kind tells the caller which
 * stage rejected the input; the message is meant for the end user as is.
 */
export class DiscImageError extends Error {
  readonly kind: DiscImageErrorKind;

  constructor(kind: DiscImageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DiscImageError";
    this.kind = kind;
  }
}

export const describeCause = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};

export type PushIssue = (message: string) => void;
