import { Injectable, Logger } from '@nestjs/common';
import { OrchestrationOutcome } from '../orchestrator/orchestrator.interface';
import { AnalysisResultSink } from './result-sink.interface';
import { deriveConfidence } from './thought-analyzer.service';
import { AnalysisJob, SUGGESTION_CONFIDENCE_THRESHOLD } from './thought.interface';

@Injectable()
export class LoggingResultSink implements AnalysisResultSink {
  private readonly logger = new Logger(LoggingResultSink.name);

  async deliver(job: AnalysisJob, outcome: OrchestrationOutcome): Promise<void> {
    const { result } = outcome;

    if (!result.success) {
      this.logger.warn(
        `Thought ${job.thought.id}: analysis failed with ${result.kind} after ${result.errors.length} attempt(s)`,
      );
      return;
    }

    const confidence = deriveConfidence(result);
    const verdict = confidence >= SUGGESTION_CONFIDENCE_THRESHOLD
      ? 'would create a task suggestion'
      : 'below the suggestion threshold';

    this.logger.log(
      `Thought ${job.thought.id}: "${result.analysis.summary}" via ${result.backend} ` +
        `(confidence ${confidence.toFixed(2)}, ${verdict})`,
    );
  }
}
