import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { performance } from 'node:perf_hooks';
import { Observable, Subject } from 'rxjs';
import { AnalysisRequest } from '../backends/analysis-request';
import { AnalysisFailure, AnalysisResult, toFailure } from '../backends/analysis-result.interface';
import { BackendRegistry } from '../backends/backend-registry';
import { AnalysisErrorKind } from '../classifier/classifier.enum';
import { ErrorClassification } from '../classifier/classifier.interface';
import { ClassifierService } from '../classifier/classifier.service';
import { createDeadline, sleep } from '../common/abort';
import { AnalysisCancelledError, describeError } from '../common/errors';
import { ConfigService } from '../config/config.service';
import { BackendSelectorService } from '../selection/backend-selector.service';
import { BackendChoice } from '../selection/selection.interface';
import {
  DecisionTraceEntry,
  OrchestrateOptions,
  OrchestrationAction,
  OrchestrationOutcome,
} from './orchestrator.interface';

/**
 * Walks a Plan: first success wins, a rate-limited candidate is retried once
 * after a backoff, recoverable failures move on to the next candidate and
 * non-recoverable ones (or an exhausted fallback budget) stop the request.
 */
@Injectable()
export class BackendOrchestratorService implements OnApplicationShutdown {
  private readonly logger = new Logger(BackendOrchestratorService.name);
  private readonly decisions = new Subject<DecisionTraceEntry>();

  readonly decisions$: Observable<DecisionTraceEntry> = this.decisions.asObservable();

  constructor(
    private readonly registry: BackendRegistry,
    private readonly selector: BackendSelectorService,
    private readonly classifier: ClassifierService,
    private readonly config: ConfigService,
  ) {}

  async orchestrate(request: AnalysisRequest, options: OrchestrateOptions = {}): Promise<OrchestrationOutcome> {
    const { signal } = options;
    this.throwIfCancelled(request, signal);

    const plan = this.selector.select(request);
    const trace: DecisionTraceEntry[] = [];
    const errors: AnalysisFailure[] = [];
    const occurrences = new Map<AnalysisErrorKind, number>();
    let aborted = false;

    for (const [index, candidate] of plan.candidates.entries()) {
      const isLast = index === plan.candidates.length - 1;
      let retry = false;

      for (;;) {
        this.throwIfCancelled(request, signal);

        const startedAt = performance.now();
        const result = await this.invoke(request, candidate, signal);
        const durationMs = Math.round(performance.now() - startedAt);

        if (result.success) {
          this.record(trace, {
            requestId: request.requestId,
            attempt: trace.length + 1,
            backend: candidate.name,
            role: candidate.role,
            retry,
            outcome: 'SUCCESS',
            action: 'RETURN_SUCCESS',
            durationMs,
            tokensUsed: result.usage.totalTokens,
          });
          return { result, plan, trace };
        }

        errors.push(result);
        occurrences.set(result.kind, (occurrences.get(result.kind) ?? 0) + 1);
        const action = this.decide(this.classifier.classify(result.kind), occurrences.get(result.kind) ?? 0, retry, isLast);

        this.record(trace, {
          requestId: request.requestId,
          attempt: trace.length + 1,
          backend: candidate.name,
          role: candidate.role,
          retry,
          outcome: result.kind,
          action,
          durationMs,
        });

        if (action !== 'RETRY_SAME_ONCE') {
          aborted = action === 'ABORT';
          break;
        }

        await this.backoff(request, signal);
        retry = true;
      }

      if (aborted) {
        break;
      }
    }

    const last = errors[errors.length - 1];
    this.logger.error(
      `[${request.requestId}] ${aborted ? 'Aborted' : 'All candidates failed'} after ${errors.length} attempt(s), ` +
        `last error ${last.kind}: ${last.message}`,
    );

    return {
      result: { success: false, requestId: request.requestId, kind: last.kind, aborted, errors },
      plan,
      trace,
    };
  }

  onApplicationShutdown(): void {
    this.decisions.complete();
  }

  private decide(
    classification: ErrorClassification,
    occurrences: number,
    retried: boolean,
    isLast: boolean,
  ): OrchestrationAction {
    if (classification.retrySameCandidate && !retried) {
      return 'RETRY_SAME_ONCE';
    }
    if (!classification.recoverable) {
      return 'ABORT';
    }
    if (classification.fallbackBudget !== null && occurrences > classification.fallbackBudget) {
      return 'ABORT';
    }
    return isLast ? 'ALL_FAILED' : 'NEXT_CANDIDATE';
  }

  private async invoke(request: AnalysisRequest, candidate: BackendChoice, signal?: AbortSignal): Promise<AnalysisResult> {
    if (!this.registry.has(candidate.name)) {
      return toFailure(request.requestId, candidate.name, {
        kind: AnalysisErrorKind.UNAVAILABLE,
        message: `Backend ${candidate.name} is not registered`,
      });
    }

    const backend = this.registry.get(candidate.name);
    const outerMs = candidate.timeoutSeconds * 1000 + this.config.orchestration.deadlineGraceMs;
    const deadline = createDeadline(outerMs, signal);

    try {
      const outcome = await Promise.race([
        Promise.resolve()
          .then(() => backend.analyze(request, candidate.timeoutSeconds, deadline.signal))
          .catch((error: unknown) =>
            toFailure(request.requestId, candidate.name, {
              kind: AnalysisErrorKind.INTERNAL_ERROR,
              message: `Backend ${candidate.name} threw instead of returning a result: ${describeError(error)}`,
            }),
          ),
        whenAborted(deadline.signal),
      ]);

      if (outcome === ABORTED) {
        this.throwIfCancelled(request, signal);
        return toFailure(request.requestId, candidate.name, {
          kind: AnalysisErrorKind.TIMEOUT,
          message: `Backend ${candidate.name} exceeded the outer deadline of ${outerMs}ms`,
        });
      }

      if (!outcome.success) {
        this.throwIfCancelled(request, signal);
      }
      return outcome;
    } finally {
      deadline.dispose();
    }
  }

  private async backoff(request: AnalysisRequest, signal?: AbortSignal): Promise<void> {
    const backoffMs = this.config.orchestration.rateLimitBackoffMs;
    this.logger.log(`[${request.requestId}] Rate limited, retrying the same backend in ${backoffMs}ms`);

    try {
      await sleep(backoffMs, signal);
    } catch (error) {
      this.throwIfCancelled(request, signal);
      throw error;
    }
  }

  private record(trace: DecisionTraceEntry[], entry: DecisionTraceEntry): void {
    trace.push(entry);

    const line =
      `[${entry.requestId}] attempt=${entry.attempt} backend=${entry.backend} role=${entry.role} ` +
      `retry=${entry.retry} outcome=${entry.outcome} action=${entry.action} duration=${entry.durationMs}ms`;

    switch (entry.action) {
      case 'RETURN_SUCCESS':
        this.logger.log(line);
        break;
      case 'RETRY_SAME_ONCE':
      case 'NEXT_CANDIDATE':
        this.logger.warn(line);
        break;
      case 'ABORT':
      case 'ALL_FAILED':
        this.logger.error(line);
        break;
    }

    this.decisions.next(entry);
  }

  private throwIfCancelled(request: AnalysisRequest, signal?: AbortSignal): void {
    if (signal?.aborted) {
      this.logger.warn(`[${request.requestId}] Cancelled by caller`);
      throw new AnalysisCancelledError(request.requestId, signal.reason);
    }
  }
}

const ABORTED = Symbol('aborted');

function whenAborted(signal: AbortSignal): Promise<typeof ABORTED> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(ABORTED);
      return;
    }
    signal.addEventListener('abort', () => resolve(ABORTED), { once: true });
  });
}
