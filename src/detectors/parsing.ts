/**
 * Validation helpers for detector response bodies.
 *
 * Backends are external services; their bodies are treated as untrusted
 * `unknown` values and checked field by field.
 */

import { MalformedResponseError } from "../errors";

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract the `findings` array from a response body.
 */
export function readFindingsArray(body: unknown): unknown[] {
  if (!isJsonObject(body)) {
    throw new MalformedResponseError("response body is not a JSON object");
  }
  if (!Array.isArray(body.findings)) {
    throw new MalformedResponseError('response has no "findings" array');
  }
  return body.findings;
}

export function requireObject(value: unknown, what: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new MalformedResponseError(`${what} is not an object`);
  }
  return value;
}

export function requireLabel(item: JsonObject, index: number): string {
  const label = item.label;
  if (typeof label !== "string" || label.trim() === "") {
    throw new MalformedResponseError(`findings[${index}].label is missing or empty`);
  }
  return label.trim();
}

export function requireInteger(value: unknown, what: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new MalformedResponseError(`${what} must be an integer`);
  }
  return value;
}

export function optionalInteger(value: unknown, what: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return requireInteger(value, what);
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}
