/**
 * Adapter for the rule-based static-analysis engine.
 *
 * Response shape:
 *   { findings: [{ label, location: { file?, start_line, end_line?, start_column?, end_column? }, description? }] }
 *
 * Rule matches are deterministic, so no confidence is attached; normalization
 * treats the absence as 1.0.
 */

import { RawFinding } from "../analysis/types";
import { HttpDetector } from "./http";
import {
  optionalInteger,
  optionalString,
  readFindingsArray,
  requireInteger,
  requireLabel,
  requireObject,
} from "./parsing";

export class StaticAnalysisAdapter extends HttpDetector {
  readonly id = "static" as const;

  protected parseFindings(body: unknown, filename: string): RawFinding[] {
    return readFindingsArray(body).map((value, index) => {
      const item = requireObject(value, `findings[${index}]`);
      const label = requireLabel(item, index);
      const loc = requireObject(item.location, `findings[${index}].location`);

      const startLine = requireInteger(loc.start_line, `findings[${index}].location.start_line`);
      const endLine = optionalInteger(loc.end_line, `findings[${index}].location.end_line`) ?? startLine;
      const startColumn = optionalInteger(loc.start_column, `findings[${index}].location.start_column`) ?? 1;
      const endColumn = optionalInteger(loc.end_column, `findings[${index}].location.end_column`) ?? startColumn;

      const finding: RawFinding = {
        backend: this.id,
        label,
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
