export class BackendSelectionError extends Error {
  constructor(
    message: string,
    readonly requestId: string,
  ) {
    super(message);
    this.name = 'BackendSelectionError';
  }
}

export class UnknownBackendError extends Error {
  constructor(readonly backend: string, available: readonly string[]) {
    super(`Backend '${backend}' is not registered. Available: ${available.join(', ') || 'none'}`);
    this.name = 'UnknownBackendError';
  }
}

/**
 * Raised when the caller aborts an analysis while an adapter call or a
 * rate-limit backoff is in progress.
 */
export class AnalysisCancelledError extends Error {
  constructor(readonly requestId: string, reason?: unknown) {
    super(`Analysis ${requestId} was cancelled${reason === undefined ? '' : `: ${describeError(reason)}`}`);
    this.name = 'AnalysisCancelledError';
  }
}

export class ConfigValidationError extends Error {
  constructor(readonly violations: readonly string[]) {
    super(`Invalid configuration:\n- ${violations.join('\n- ')}`);
    this.name = 'ConfigValidationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
