/**
 * Collaboration Document - Edit Operations
 *
 * Pure text transformations for insert/delete/replace. Offsets and run
 * lengths count user-perceived characters (grapheme clusters), so an edit
 * never lands inside an emoji or a surrogate pair. Out-of-range positions are
 * clamped into [0, characterCount(content)] rather than rejected.
 */

import type { EditOperation } from "../types";

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** Split text into grapheme clusters */
export function splitCharacters(text: string): string[] {
  return Array.from(graphemes.segment(text), ({ segment }) => segment);
}

export function characterCount(text: string): number {
  return splitCharacters(text).length;
}

export function clampPosition(position: number, length: number): number {
  if (Number.isNaN(position)) {
    return 0;
  }
  return Math.min(Math.max(Math.trunc(position), 0), length);
}

/**
 * Apply one operation to `content` and return the new text.
 *
 * `delete` and `replace` affect a run of `characterCount(op.content)`
 * characters at the clamped position. The run is not compared against
 * `op.content`, so an operation with a stale position removes whatever text
 * now sits there.
 */
export function applyOperationToContent(content: string, op: EditOperation): string {
  const characters = splitCharacters(content);
  const start = clampPosition(op.position, characters.length);
  const before = characters.slice(0, start).join("");

  switch (op.type) {
    case "insert":
      return before + op.content + characters.slice(start).join("");
    case "delete":
      return before + characters.slice(start + characterCount(op.content)).join("");
    case "replace":
      return before + op.content + characters.slice(start + characterCount(op.content)).join("");
  }
}

/**
 * Left-to-right fold of `ops` over `initial`.
 */
export function foldOperations(initial: string, ops: readonly EditOperation[]): string {
  return ops.reduce(applyOperationToContent, initial);
}

export function describeOperation(op: EditOperation): string {
  switch (op.type) {
    case "insert":
      return `Inserted "${op.content}" at position ${op.position}`;
    case "delete":
      return `Deleted "${op.content}" at position ${op.position}`;
    case "replace":
      return `Replaced with "${op.content}" at position ${op.position}`;
  }
}
