import { OrchestrationOutcome } from '../orchestrator/orchestrator.interface';
import { AnalysisJob } from './thought.interface';

export const ANALYSIS_RESULT_SINK = Symbol('ANALYSIS_RESULT_SINK');

/** Receives the outcome of every queued job that ran to completion. */
export interface AnalysisResultSink {
  deliver(job: AnalysisJob, outcome: OrchestrationOutcome): Promise<void>;
}
