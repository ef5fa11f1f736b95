import { Injectable, Logger } from '@nestjs/common';
import { createAnalysisRequest } from '../backends/analysis-request';
import { AnalysisSuccess } from '../backends/analysis-result.interface';
import { BackendRegistry } from '../backends/backend-registry';
import { AnalysisCancelledError, describeError } from '../common/errors';
import { BackendOrchestratorService } from '../orchestrator/backend-orchestrator.service';
import { OrchestrationOutcome } from '../orchestrator/orchestrator.interface';
import { AnalyzeOptions, BatchAnalysisItem, Thought } from './thought.interface';

@Injectable()
export class ThoughtAnalyzerService {
  private readonly logger = new Logger(ThoughtAnalyzerService.name);

  constructor(
    private readonly orchestrator: BackendOrchestratorService,
    private readonly registry: BackendRegistry,
  ) {}

  async analyze(thought: Thought, options: AnalyzeOptions = {}): Promise<OrchestrationOutcome> {
    const request = createAnalysisRequest({
      content: thought.content,
      analysisType: options.analysisType,
      availableBackends: this.registry.names(),
      preferences: options.preferences,
      context: {
        user_id: thought.userId,
        thought_id: thought.id,
        tags: thought.tags ?? [],
        ...options.context,
      },
    });

    this.logger.log(`Analyzing thought ${thought.id} (length: ${request.contentLength} chars, request ${request.requestId})`);

    const outcome = await this.orchestrator.orchestrate(request, { signal: options.signal });

    if (outcome.result.success) {
      this.logger.log(`Analysis succeeded: thought=${thought.id}, backend=${outcome.result.backend}`);
    } else {
      this.logger.warn(
        `Analysis failed: thought=${thought.id}, error=${outcome.result.kind}, attempts=${outcome.result.errors.length}`,
      );
    }
    return outcome;
  }

  /** Sequential; a failing thought never stops the rest, cancellation does. */
  async analyzeBatch(thoughts: Thought[], options: AnalyzeOptions = {}): Promise<BatchAnalysisItem[]> {
    this.logger.log(`Starting batch analysis of ${thoughts.length} thoughts`);

    const items: BatchAnalysisItem[] = [];
    for (const thought of thoughts) {
      try {
        items.push({ thoughtId: thought.id, ok: true, outcome: await this.analyze(thought, options) });
      } catch (error) {
        if (error instanceof AnalysisCancelledError) {
          throw error;
        }
        this.logger.error(`Analysis of thought ${thought.id} could not run: ${describeError(error)}`);
        items.push({ thoughtId: thought.id, ok: false, error: describeError(error) });
      }
    }

    const succeeded = items.filter((item) => item.ok && item.outcome.result.success).length;
    this.logger.log(`Batch analysis complete: ${succeeded} succeeded, ${items.length - succeeded} failed`);
    return items;
  }
}

/** Highest suggested-action confidence, 0 when the analysis suggests nothing. */
export function deriveConfidence(success: AnalysisSuccess): number {
  return success.analysis.suggestedActions.reduce((max, action) => Math.max(max, action.confidence), 0);
}
