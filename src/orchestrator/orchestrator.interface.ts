import { AnalysisFailure, AnalysisSuccess } from '../backends/analysis-result.interface';
import { BackendName } from '../backends/constants/backend.constants';
import { AnalysisErrorKind } from '../classifier/classifier.enum';
import { BackendRole, Plan } from '../selection/selection.interface';

export type OrchestrationAction = 'RETURN_SUCCESS' | 'RETRY_SAME_ONCE' | 'NEXT_CANDIDATE' | 'ABORT' | 'ALL_FAILED';

export interface DecisionTraceEntry {
  requestId: string;
  /** 1-based across the whole request, retries included. */
  attempt: number;
  backend: BackendName;
  role: BackendRole;
  retry: boolean;
  outcome: 'SUCCESS' | AnalysisErrorKind;
  action: OrchestrationAction;
  durationMs: number;
  tokensUsed?: number;
}

export interface AggregateFailure {
  success: false;
  requestId: string;
  /** Kind of the last attempt. */
  kind: AnalysisErrorKind;
  /** Set when a non-recoverable error or an exhausted budget stopped the plan early. */
  aborted: boolean;
  errors: AnalysisFailure[];
}

export type OrchestrationResult = AnalysisSuccess | AggregateFailure;

export interface OrchestrationOutcome {
  result: OrchestrationResult;
  plan: Plan;
  trace: DecisionTraceEntry[];
}

export interface OrchestrateOptions {
  signal?: AbortSignal;
}
