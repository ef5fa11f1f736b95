import { AnalysisErrorKind } from '../classifier/classifier.enum';

export interface BackendStats {
  requestsTotal: number;
  requestsSuccess: number;
  requestsFailed: number;
  /** 0..1, 0 when nothing was recorded. */
  successRate: number;
  avgResponseTimeMs: number;
  tokensUsed: number;
  failuresByKind: Partial<Record<AnalysisErrorKind, number>>;
  lastSuccessAt: string | null;
  lastFailureAt: string | null;
}
