/**
 * Wire format for analysis results (snake_case JSON).
 */

import {
  AnalysisOutcome,
  AnalysisResult,
  BackendId,
  BackendStatusLabel,
  NormalizedFinding,
  SmellCategory,
  statusLabel,
} from "./analysis/types";

export interface SerializedFinding {
  category: SmellCategory;
  location: {
    file: string;
    start_line: number;
    start_column: number;
    end_line: number;
    end_column: number;
  };
  confidence: number;
  backends: BackendId[];
  labels: string[];
  description?: string;
}

export interface SerializedResult {
  request_id: string;
  findings: SerializedFinding[];
  backend_status: Record<BackendId, BackendStatusLabel>;
  outcome: AnalysisOutcome;
  dropped_findings: number;
}

export function serializeFinding(finding: NormalizedFinding): SerializedFinding {
  const serialized: SerializedFinding = {
    category: finding.category,
    location: {
      file: finding.location.file,
      start_line: finding.location.startLine,
      start_column: finding.location.startColumn,
      end_line: finding.location.endLine,
      end_column: finding.location.endColumn,
    },
    confidence: finding.confidence,
    backends: [...finding.backends],
    labels: [...finding.labels],
  };
  if (finding.description !== undefined) {
    serialized.description = finding.description;
  }
  return serialized;
}

export function serializeResult(result: AnalysisResult): SerializedResult {
  return {
    request_id: result.requestId,
    findings: result.findings.map(serializeFinding),
    backend_status: {
      static: statusLabel(result.backendStatus.static),
      ai: statusLabel(result.backendStatus.ai),
    },
    outcome: result.outcome,
    dropped_findings: result.droppedFindings,
  };
}
