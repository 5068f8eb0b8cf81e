/**
 * Construction and validation of AnalysisRequest values.
 */

import { InvalidRequestError } from "../errors";
import { AnalysisOptions, AnalysisRequest, BackendId, BACKEND_IDS, isBackendId } from "./types";

export interface RequestLimits {
  languages: readonly string[];
  maxCodeBytes: number;
}

export const DEFAULT_FILENAME = "<input>";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseOptions(value: unknown): AnalysisOptions {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new InvalidRequestError("options must be an object");
  }

  const options: AnalysisOptions = {};

  if (value.detectors !== undefined) {
    if (!Array.isArray(value.detectors) || value.detectors.length === 0) {
      throw new InvalidRequestError("options.detectors must be a non-empty array");
    }
    const selected = new Set<BackendId>();
    for (const detector of value.detectors) {
      if (!isBackendId(detector)) {
        throw new InvalidRequestError(
          `options.detectors contains unknown detector ${JSON.stringify(detector)}; expected one of ${BACKEND_IDS.join(", ")}`
        );
      }
      selected.add(detector);
    }
    options.detectors = BACKEND_IDS.filter((id) => selected.has(id));
  }

  if (value.filename !== undefined) {
    if (typeof value.filename !== "string" || value.filename.trim() === "") {
      throw new InvalidRequestError("options.filename must be a non-empty string");
    }
    options.filename = value.filename.trim();
  }

  return options;
}

/**
 * Build an immutable request from an untrusted body (e.g. parsed JSON).
 * Checks shape only; language support and size are checked by validateRequest.
 */
export function parseAnalysisRequest(body: unknown): AnalysisRequest {
  if (!isRecord(body)) {
    throw new InvalidRequestError("request body must be a JSON object");
  }
  if (typeof body.code !== "string") {
    throw new InvalidRequestError("code must be a string");
  }
  if (typeof body.language !== "string") {
    throw new InvalidRequestError("language must be a string");
  }

  return createAnalysisRequest(body.code, body.language, parseOptions(body.options));
}

export function createAnalysisRequest(
  code: string,
  language: string,
  options: AnalysisOptions = {}
): AnalysisRequest {
  const frozenOptions: AnalysisOptions = { ...options };
  if (options.detectors) {
    frozenOptions.detectors = Object.freeze([...options.detectors]);
  }
  return Object.freeze({
    code,
    language: language.trim().toLowerCase(),
    options: Object.freeze(frozenOptions),
  });
}

/**
 * Semantic checks run by the orchestrator before any backend is called.
 */
export function validateRequest(request: AnalysisRequest, limits: RequestLimits): void {
  if (request.code.trim() === "") {
    throw new InvalidRequestError("code must not be empty");
  }
  if (Buffer.byteLength(request.code, "utf8") > limits.maxCodeBytes) {
    throw new InvalidRequestError(`code exceeds the ${limits.maxCodeBytes} byte limit`);
  }
  if (request.language === "") {
    throw new InvalidRequestError("language must not be empty");
  }
  if (!limits.languages.includes(request.language)) {
    throw new InvalidRequestError(`unsupported language "${request.language}"`);
  }
  if (request.options.detectors && request.options.detectors.length === 0) {
    throw new InvalidRequestError("options.detectors must select at least one detector");
  }
}

/**
 * Detectors a request runs, in BACKEND_IDS order.
 */
export function selectedDetectors(request: AnalysisRequest): BackendId[] {
  const chosen = request.options.detectors;
  return chosen ? BACKEND_IDS.filter((id) => chosen.includes(id)) : [...BACKEND_IDS];
}
