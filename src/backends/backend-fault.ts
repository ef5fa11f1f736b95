import { AnalysisErrorKind } from '../classifier/classifier.enum';
import { FailureDetails } from './analysis-result.interface';

/**
 * Thrown inside an adapter when the failure kind is already known, so the
 * adapter's generic error mapping is skipped.
 */
export class BackendFault extends Error {
  constructor(
    readonly kind: AnalysisErrorKind,
    message: string,
    readonly retryAfterSeconds?: number,
  ) {
    super(message);
    this.name = 'BackendFault';
  }

  toDetails(): FailureDetails {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.retryAfterSeconds !== undefined && { retryAfterSeconds: this.retryAfterSeconds }),
    };
  }
}

/** Parses a `Retry-After` header given in seconds. */
export function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}
