import { AnalysisErrorKind } from './classifier.enum';

export interface ErrorClassification {
  kind: AnalysisErrorKind;
  /** Another backend could plausibly succeed where this one failed. */
  recoverable: boolean;
  /** Retry the same candidate once (after backoff) before moving on. */
  retrySameCandidate: boolean;
  /**
   * How many times this kind may trigger a fallback within one request.
   * `null` means no limit.
   */
  fallbackBudget: number | null;
}
