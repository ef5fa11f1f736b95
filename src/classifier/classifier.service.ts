import { Injectable } from '@nestjs/common';
import { AnalysisErrorKind } from './classifier.enum';
import { ErrorClassification } from './classifier.interface';

const CLASSIFICATIONS: Readonly<Record<AnalysisErrorKind, ErrorClassification>> = Object.freeze({
  [AnalysisErrorKind.TIMEOUT]: rule(AnalysisErrorKind.TIMEOUT, true, null),
  [AnalysisErrorKind.RATE_LIMITED]: rule(AnalysisErrorKind.RATE_LIMITED, true, null, true),
  [AnalysisErrorKind.UNAVAILABLE]: rule(AnalysisErrorKind.UNAVAILABLE, true, null),
  [AnalysisErrorKind.INTERNAL_ERROR]: rule(AnalysisErrorKind.INTERNAL_ERROR, true, 1),
  [AnalysisErrorKind.MALFORMED_RESPONSE]: rule(AnalysisErrorKind.MALFORMED_RESPONSE, true, 1),
  [AnalysisErrorKind.INVALID_INPUT]: rule(AnalysisErrorKind.INVALID_INPUT, false, 0),
  [AnalysisErrorKind.CONTEXT_OVERFLOW]: rule(AnalysisErrorKind.CONTEXT_OVERFLOW, false, 0),
});

export function classifyError(kind: AnalysisErrorKind): ErrorClassification {
  return CLASSIFICATIONS[kind];
}

@Injectable()
export class ClassifierService {
  classify(kind: AnalysisErrorKind): ErrorClassification {
    return classifyError(kind);
  }

  isRecoverable(kind: AnalysisErrorKind): boolean {
    return classifyError(kind).recoverable;
  }
}

function rule(
  kind: AnalysisErrorKind,
  recoverable: boolean,
  fallbackBudget: number | null,
  retrySameCandidate = false,
): ErrorClassification {
  return Object.freeze({ kind, recoverable, retrySameCandidate, fallbackBudget });
}
