/**
 * Adapter for the model-based AI-analysis engine.
 *
 * Response shape:
 *   { findings: [{ label, location: { file?, line, end_line?, column?, end_column? }, confidence, description? }] }
 */

import { clampConfidence } from "../analysis/normalize";
import { RawFinding } from "../analysis/types";
import { MalformedResponseError } from "../errors";
import { HttpDetector } from "./http";
import {
  optionalInteger,
  optionalString,
  readFindingsArray,
  requireInteger,
  requireLabel,
  requireObject,
} from "./parsing";

export class AiAnalysisAdapter extends HttpDetector {
  readonly id = "ai" as const;

  protected parseFindings(body: unknown, filename: string): RawFinding[] {
    return readFindingsArray(body).map((value, index) => {
      const item = requireObject(value, `findings[${index}]`);
      const label = requireLabel(item, index);
      const loc = requireObject(item.location, `findings[${index}].location`);

      if (typeof item.confidence !== "number" || !Number.isFinite(item.confidence)) {
        throw new MalformedResponseError(`findings[${index}].confidence must be a finite number`);
      }
      const confidence = clampConfidence(item.confidence);
      if (confidence !== item.confidence) {
        this.log.debug("Clamped out-of-range confidence", {
          backend: this.id,
          label,
          reported: item.confidence,
          clamped: confidence,
        });
      }

      const startLine = requireInteger(loc.line, `findings[${index}].location.line`);
      const endLine = optionalInteger(loc.end_line, `findings[${index}].location.end_line`) ?? startLine;
      const startColumn = optionalInteger(loc.column, `findings[${index}].location.column`) ?? 1;
      const endColumn = optionalInteger(loc.end_column, `findings[${index}].location.end_column`) ?? startColumn;

      const finding: RawFinding = {
        backend: this.id,
        label,
        confidence,
        location: {
          file: optionalString(loc.file) ?? filename,
          startLine,
          startColumn,
          endLine,
          endColumn,
        },
      };
      const description = optionalString(item.description);
      if (description !== undefined) {
        finding.description = description;
      }
      return finding;
    });
  }
}
