export enum AnalysisErrorKind {
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  UNAVAILABLE = 'UNAVAILABLE',
  INVALID_INPUT = 'INVALID_INPUT',
  CONTEXT_OVERFLOW = 'CONTEXT_OVERFLOW',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
}
