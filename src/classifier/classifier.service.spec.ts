import { AnalysisErrorKind } from './classifier.enum';
import { classifyError, ClassifierService } from './classifier.service';

describe('classifyError', () => {
  it.each([AnalysisErrorKind.TIMEOUT, AnalysisErrorKind.UNAVAILABLE])(
    'treats %s as recoverable without a budget',
    (kind) => {
      expect(classifyError(kind)).toEqual({ kind, recoverable: true, retrySameCandidate: false, fallbackBudget: null });
    },
  );

  it('retries RATE_LIMITED on the same candidate', () => {
    expect(classifyError(AnalysisErrorKind.RATE_LIMITED)).toEqual({
      kind: AnalysisErrorKind.RATE_LIMITED,
      recoverable: true,
      retrySameCandidate: true,
      fallbackBudget: null,
    });
  });

  it.each([AnalysisErrorKind.INTERNAL_ERROR, AnalysisErrorKind.MALFORMED_RESPONSE])(
    'allows %s to fall back once',
    (kind) => {
      expect(classifyError(kind)).toEqual({ kind, recoverable: true, retrySameCandidate: false, fallbackBudget: 1 });
    },
  );

  it.each([AnalysisErrorKind.INVALID_INPUT, AnalysisErrorKind.CONTEXT_OVERFLOW])('treats %s as fatal', (kind) => {
    expect(classifyError(kind).recoverable).toBe(false);
  });

  it('covers every error kind', () => {
    for (const kind of Object.values(AnalysisErrorKind)) {
      expect(classifyError(kind).kind).toBe(kind);
    }
  });
});

describe('ClassifierService', () => {
  const service = new ClassifierService();

  it('delegates to the classification table', () => {
    expect(service.classify(AnalysisErrorKind.TIMEOUT)).toBe(classifyError(AnalysisErrorKind.TIMEOUT));
    expect(service.isRecoverable(AnalysisErrorKind.CONTEXT_OVERFLOW)).toBe(false);
  });
});
