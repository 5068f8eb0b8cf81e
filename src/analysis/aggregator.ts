/**
 * Aggregation of findings from both detector backends.
 *
 * Normalizes every raw finding, pairs cross-backend detections of the same
 * smell at overlapping locations, merges each pair into one finding, and
 * returns a deterministically ordered list. The output depends only on the
 * input findings, never on the order they arrived in.
 */

import { CategoryTable } from "../config/categories";
import { Logger, logger as defaultLogger } from "../logger";
import {
  compareLocations,
  compareTightness,
  isWithinSource,
  overlappingLines,
  overlapsBeyond,
} from "./location";
import { DEFAULT_CONFIDENCE, normalizeFinding } from "./normalize";
import {
  BACKEND_IDS,
  BackendId,
  BackendStatus,
  NormalizedFinding,
  RawFinding,
} from "./types";

export interface AggregationInput {
  findings: Record<BackendId, RawFinding[]>;
  statuses: Record<BackendId, BackendStatus>;
  /** Number of lines in the submitted source; locations beyond it are inconsistent. */
  sourceLineCount: number;
  overlapThreshold: number;
  categories: CategoryTable;
  logger?: Logger;
}

export interface AggregationOutput {
  findings: NormalizedFinding[];
  /** Findings removed as aggregation inconsistencies. */
  dropped: number;
}

interface Entry {
  finding: NormalizedFinding;
  /** Whether the backend supplied a confidence, as opposed to the default. */
  reported: boolean;
}

const backendRank = (id: BackendId): number => BACKEND_IDS.indexOf(id);

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Output order: file, start line, start column, category, then the remaining
 * fields so that no two distinct findings compare equal.
 */
export function compareFindings(a: NormalizedFinding, b: NormalizedFinding): number {
  if (a.location.file !== b.location.file) {
    return compareStrings(a.location.file, b.location.file);
  }
  return (
    a.location.startLine - b.location.startLine ||
    a.location.startColumn - b.location.startColumn ||
    compareStrings(a.category, b.category) ||
    a.location.endLine - b.location.endLine ||
    a.location.endColumn - b.location.endColumn ||
    compareStrings(a.backends.join(","), b.backends.join(",")) ||
    compareStrings(a.labels.join(","), b.labels.join(",")) ||
    a.confidence - b.confidence ||
    compareStrings(a.description ?? "", b.description ?? "")
  );
}

interface Candidate {
  a: number;
  b: number;
  shared: number;
}

/**
 * Pair each finding with at most one overlapping finding from the other
 * backend. Pairs sharing the most lines are taken first; ties go to the pair
 * that comes first in canonical order. Returns the partner index per entry.
 */
function pairAcrossBackends(entries: Entry[], bucket: number[], threshold: number): Map<number, number> {
  const candidates: Candidate[] = [];
  for (let i = 0; i < bucket.length; i++) {
    for (let j = i + 1; j < bucket.length; j++) {
      const a = entries[bucket[i]].finding;
      const b = entries[bucket[j]].finding;
      // Two findings from one backend are never the same finding
      if (a.backends[0] === b.backends[0]) {
        continue;
      }
      if (overlapsBeyond(a.location, b.location, threshold)) {
        candidates.push({ a: bucket[i], b: bucket[j], shared: overlappingLines(a.location, b.location) });
      }
    }
  }

  candidates.sort((x, y) => y.shared - x.shared || x.a - y.a || x.b - y.b);

  const partners = new Map<number, number>();
  for (const { a, b } of candidates) {
    if (partners.has(a) || partners.has(b)) continue;
    partners.set(a, b);
    partners.set(b, a);
  }
  return partners;
}

/**
 * Merge a static and an AI detection of the same smell.
 */
function mergeGroup(members: Entry[]): NormalizedFinding {
  const backends = BACKEND_IDS.filter((id) => members.some((m) => m.finding.backends.includes(id)));

  // Strongest signal any backend actually reported; defaulted confidences only
  // count when nothing was reported.
  const reported = members.filter((m) => m.reported).map((m) => m.finding.confidence);
  const confidence = reported.length > 0 ? Math.max(...reported) : DEFAULT_CONFIDENCE;

  const tightest = [...members].sort((a, b) => compareTightness(a.finding.location, b.finding.location))[0];

  const labels = Array.from(new Set(members.flatMap((m) => m.finding.labels))).sort();

  const described = [...members]
    .sort((a, b) => backendRank(a.finding.backends[0]) - backendRank(b.finding.backends[0]))
    .find((m) => m.finding.description !== undefined);

  const merged: NormalizedFinding = {
    category: tightest.finding.category,
    location: { ...tightest.finding.location },
    confidence,
    backends,
    labels,
  };
  if (described?.finding.description !== undefined) {
    merged.description = described.finding.description;
  }
  return merged;
}

/**
 * Aggregate both backends' raw findings into one ordered finding set.
 */
export function aggregate(input: AggregationInput): AggregationOutput {
  const log = input.logger ?? defaultLogger;
  const entries: Entry[] = [];
  let dropped = 0;

  for (const backend of BACKEND_IDS) {
    const raws = input.findings[backend];
    if (input.statuses[backend].kind !== "success") {
      if (raws.length > 0) {
        log.warn("Ignoring findings from backend without a successful status", {
          backend,
          status: input.statuses[backend].kind,
          count: raws.length,
        });
      }
      continue;
    }

    for (const raw of raws) {
      if (!isWithinSource(raw.location, input.sourceLineCount)) {
        dropped++;
        log.warn("Aggregation inconsistency: finding location outside source, dropping", {
          backend,
          label: raw.label,
          location: raw.location,
          sourceLineCount: input.sourceLineCount,
        });
        continue;
      }
      entries.push({
        finding: normalizeFinding(raw, input.categories),
        reported: raw.confidence !== undefined,
      });
    }
  }

  // Canonical order first, so grouping and tie-breaks never depend on arrival order
  entries.sort(
    (a, b) =>
      compareFindings(a.finding, b.finding) ||
      compareLocations(a.finding.location, b.finding.location) ||
      Number(a.reported) - Number(b.reported)
  );

  const buckets = new Map<string, number[]>();
  entries.forEach((entry, index) => {
    const key = `${entry.finding.location.file}\u0000${entry.finding.category}`;
    const bucket = buckets.get(key) ?? [];
    bucket.push(index);
    buckets.set(key, bucket);
  });

  const partners = new Map<number, number>();
  for (const bucket of buckets.values()) {
    for (const [index, partner] of pairAcrossBackends(entries, bucket, input.overlapThreshold)) {
      partners.set(index, partner);
    }
  }

  const findings: NormalizedFinding[] = [];
  entries.forEach((entry, index) => {
    const partner = partners.get(index);
    if (partner === undefined) {
      findings.push(entry.finding);
    } else if (index < partner) {
      findings.push(mergeGroup([entry, entries[partner]]));
    }
  });

  findings.sort(compareFindings);

  log.debug("Aggregated findings", {
    input: entries.length + dropped,
    output: findings.length,
    merged: entries.length - findings.length,
    dropped,
  });

  return { findings, dropped };
}
