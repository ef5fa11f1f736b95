import { Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { Subscription } from 'rxjs';
import { BackendName } from '../backends/constants/backend.constants';
import { AnalysisErrorKind } from '../classifier/classifier.enum';
import { BackendOrchestratorService } from '../orchestrator/backend-orchestrator.service';
import { DecisionTraceEntry } from '../orchestrator/orchestrator.interface';
import { BackendStats } from './metrics.interface';

interface Counters {
  total: number;
  success: number;
  failed: number;
  successTimeMs: number;
  tokens: number;
  failuresByKind: Partial<Record<AnalysisErrorKind, number>>;
  lastSuccessAt: string | null;
  lastFailureAt: string | null;
}

/** In-memory per-backend statistics, fed by the orchestrator's decisions. */
@Injectable()
export class BackendMetricsService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(BackendMetricsService.name);
  private readonly counters = new Map<BackendName, Counters>();
  private subscription: Subscription | null = null;

  constructor(private readonly orchestrator: BackendOrchestratorService) {}

  onModuleInit(): void {
    this.subscription = this.orchestrator.decisions$.subscribe((entry) => this.recordDecision(entry));
  }

  onApplicationShutdown(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  recordDecision(entry: DecisionTraceEntry): void {
    if (entry.outcome === 'SUCCESS') {
      this.recordSuccess(entry.backend, entry.durationMs, entry.tokensUsed ?? 0);
    } else {
      this.recordFailure(entry.backend, entry.outcome);
    }
  }

  recordSuccess(backend: BackendName, responseTimeMs: number, tokens = 0): void {
    const counters = this.countersFor(backend);
    counters.total++;
    counters.success++;
    counters.successTimeMs += responseTimeMs;
    counters.tokens += tokens;
    counters.lastSuccessAt = new Date().toISOString();

    this.logger.debug(`Recorded success: backend=${backend}, time=${responseTimeMs}ms, tokens=${tokens}`);
  }

  recordFailure(backend: BackendName, kind: AnalysisErrorKind): void {
    const counters = this.countersFor(backend);
    counters.total++;
    counters.failed++;
    counters.failuresByKind[kind] = (counters.failuresByKind[kind] ?? 0) + 1;
    counters.lastFailureAt = new Date().toISOString();

    this.logger.debug(`Recorded failure: backend=${backend}, error=${kind}`);
  }

  getStats(backend: BackendName): BackendStats {
    const counters = this.counters.get(backend) ?? emptyCounters();

    return {
      requestsTotal: counters.total,
      requestsSuccess: counters.success,
      requestsFailed: counters.failed,
      successRate: counters.total > 0 ? counters.success / counters.total : 0,
      avgResponseTimeMs: counters.success > 0 ? counters.successTimeMs / counters.success : 0,
      tokensUsed: counters.tokens,
      failuresByKind: { ...counters.failuresByKind },
      lastSuccessAt: counters.lastSuccessAt,
      lastFailureAt: counters.lastFailureAt,
    };
  }

  getAllStats(): Partial<Record<BackendName, BackendStats>> {
    const stats: Partial<Record<BackendName, BackendStats>> = {};
    for (const backend of this.counters.keys()) {
      stats[backend] = this.getStats(backend);
    }
    return stats;
  }

  reset(): void {
    this.counters.clear();
    this.logger.log('Metrics reset');
  }

  private countersFor(backend: BackendName): Counters {
    let counters = this.counters.get(backend);
    if (!counters) {
      counters = emptyCounters();
      this.counters.set(backend, counters);
    }
    return counters;
  }
}

function emptyCounters(): Counters {
  return {
    total: 0,
    success: 0,
    failed: 0,
    successTimeMs: 0,
    tokens: 0,
    failuresByKind: {},
    lastSuccessAt: null,
    lastFailureAt: null,
  };
}
