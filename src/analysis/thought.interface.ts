import { AnalysisPreferences } from '../backends/analysis-request';
import { AnalysisType } from '../backends/constants/backend.constants';
import { OrchestrationOutcome } from '../orchestrator/orchestrator.interface';

export interface Thought {
  id: string;
  userId: string;
  content: string;
  tags?: string[];
}

export interface AnalyzeOptions {
  analysisType?: AnalysisType;
  preferences?: AnalysisPreferences;
  /** Extra prompt context merged over the thought's own. */
  context?: Record<string, unknown>;
  signal?: AbortSignal;
}

export type BatchAnalysisItem =
  | { thoughtId: string; ok: true; outcome: OrchestrationOutcome }
  | { thoughtId: string; ok: false; error: string };

export interface AnalysisJob {
  thought: Thought;
  options?: Omit<AnalyzeOptions, 'signal'>;
}

/** Confidence at or above which an analysis would turn into a task suggestion. */
export const SUGGESTION_CONFIDENCE_THRESHOLD = 0.7;
