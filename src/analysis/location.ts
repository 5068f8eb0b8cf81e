/**
 * Helpers for comparing and overlapping source locations.
 */

import { SourceLocation } from "./types";

/**
 * Number of lines covered by a location (inclusive).
 */
export function lineSpan(location: SourceLocation): number {
  return location.endLine - location.startLine + 1;
}

/**
 * Number of lines two locations share. Zero when they are in different files.
 */
export function overlappingLines(a: SourceLocation, b: SourceLocation): number {
  if (a.file !== b.file) {
    return 0;
  }
  const start = Math.max(a.startLine, b.startLine);
  const end = Math.min(a.endLine, b.endLine);
  return Math.max(0, end - start + 1);
}

/**
 * Whether two locations overlap by more than `threshold` of the shorter span.
 * A threshold of 0 means any shared line counts.
 */
export function overlapsBeyond(a: SourceLocation, b: SourceLocation, threshold: number): boolean {
  const shared = overlappingLines(a, b);
  if (shared === 0) {
    return false;
  }
  const shorter = Math.min(lineSpan(a), lineSpan(b));
  return shared / shorter > threshold;
}

/**
 * Ordering by file, start line, start column, then end line and end column.
 */
export function compareLocations(a: SourceLocation, b: SourceLocation): number {
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  return (
    a.startLine - b.startLine ||
    a.startColumn - b.startColumn ||
    a.endLine - b.endLine ||
    a.endColumn - b.endColumn
  );
}

/**
 * Ordering where the tighter span sorts first: fewer lines, then a narrower
 * column range, then earlier position.
 */
export function compareTightness(a: SourceLocation, b: SourceLocation): number {
  const bySpan = lineSpan(a) - lineSpan(b);
  if (bySpan !== 0) {
    return bySpan;
  }
  const widthA = a.endColumn - a.startColumn;
  const widthB = b.endColumn - b.startColumn;
  return widthA - widthB || compareLocations(a, b);
}

/**
 * Whether a location fits inside a source of `lineCount` lines and is well-formed.
 */
export function isWithinSource(location: SourceLocation, lineCount: number): boolean {
  if (location.startLine < 1 || location.endLine > lineCount) {
    return false;
  }
  if (location.endLine < location.startLine) {
    return false;
  }
  if (location.startColumn < 1 || location.endColumn < 1) {
    return false;
  }
  return !(location.endLine === location.startLine && location.endColumn < location.startColumn);
}

/**
 * Count lines the same way editors do: a trailing newline does not start a new line.
 */
export function countSourceLines(code: string): number {
  if (code.length === 0) {
    return 0;
  }
  const lines = code.split(/\r\n|\r|\n/);
  return lines[lines.length - 1] === "" ? lines.length - 1 : lines.length;
}
