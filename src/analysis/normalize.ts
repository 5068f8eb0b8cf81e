/**
 * Per-finding normalization: category mapping and confidence defaulting.
 */

import { CategoryTable } from "../config/categories";
import { NormalizedFinding, RawFinding } from "./types";

/** Confidence assumed when a backend reports none (rule-based matches). */
export const DEFAULT_CONFIDENCE = 1.0;

/**
 * Clamp a confidence value into [0, 1]. Non-finite values are rejected by the
 * adapters before they get here.
 */
export function clampConfidence(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Normalize one raw finding. Unknown labels become "Unknown"; nothing is dropped here.
 */
export function normalizeFinding(raw: RawFinding, categories: CategoryTable): NormalizedFinding {
  const normalized: NormalizedFinding = {
    category: categories.resolve(raw.label),
    location: { ...raw.location },
    confidence: raw.confidence === undefined ? DEFAULT_CONFIDENCE : clampConfidence(raw.confidence),
    backends: [raw.backend],
    labels: [raw.label],
  };
  if (raw.description !== undefined) {
    normalized.description = raw.description;
  }
  return normalized;
}
