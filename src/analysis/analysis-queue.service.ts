import { BeforeApplicationShutdown, Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { sleep } from '../common/abort';
import { AnalysisCancelledError, describeError } from '../common/errors';
import { ConfigService } from '../config/config.service';
import { ANALYSIS_RESULT_SINK, AnalysisResultSink } from './result-sink.interface';
import { ThoughtAnalyzerService } from './thought-analyzer.service';
import { AnalysisJob } from './thought.interface';

interface InFlightJob {
  job: AnalysisJob;
  controller: AbortController;
}

/**
 * Bounded FIFO of analysis jobs drained by a single consumer.
 *
 * Intake closes in `onModuleDestroy`. The drain runs in
 * `beforeApplicationShutdown`, ahead of the orchestrator and metrics
 * teardown in `onApplicationShutdown`, so the running job is still counted.
 * Queued jobs are dropped with a log entry and the running job gets
 * `shutdownGraceMs` before it is cancelled.
 * Jobs are never persisted or retried across restarts.
 */
@Injectable()
export class AnalysisQueueService implements OnModuleDestroy, BeforeApplicationShutdown {
  private readonly logger = new Logger(AnalysisQueueService.name);
  private readonly pending: AnalysisJob[] = [];
  private inFlight: InFlightJob | null = null;
  private draining: Promise<void> | null = null;
  private accepting = true;

  constructor(
    private readonly analyzer: ThoughtAnalyzerService,
    private readonly config: ConfigService,
    @Inject(ANALYSIS_RESULT_SINK) private readonly sink: AnalysisResultSink,
  ) {}

  get size(): number {
    return this.pending.length;
  }

  get isIdle(): boolean {
    return this.draining === null;
  }

  enqueue(job: AnalysisJob): boolean {
    if (!this.accepting) {
      this.logger.warn(`Rejected thought ${job.thought.id}: queue is shut down`);
      return false;
    }
    if (this.pending.length >= this.config.queue.capacity) {
      this.logger.warn(`Rejected thought ${job.thought.id}: queue is full (${this.config.queue.capacity})`);
      return false;
    }

    this.pending.push(job);
    this.startConsumer();
    return true;
  }

  /** Resolves once the queue is empty and nothing is running. */
  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  onModuleDestroy(): void {
    this.accepting = false;
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    this.accepting = false;

    const abandoned = this.pending.splice(0);
    if (abandoned.length > 0) {
      this.logger.error(
        `Shutdown${signal ? ` (${signal})` : ''}: abandoning ${abandoned.length} queued job(s): ` +
          abandoned.map((job) => job.thought.id).join(', '),
      );
    }

    const draining = this.draining;
    if (!draining) {
      return;
    }

    const graceMs = this.config.queue.shutdownGraceMs;
    const timer = new AbortController();
    const finished = await Promise.race([
      draining.then(() => true),
      sleep(graceMs, timer.signal).then(
        () => false,
        () => false,
      ),
    ]);
    timer.abort();

    if (!finished) {
      const running = this.inFlight;
      if (running) {
        this.logger.error(`Thought ${running.job.thought.id} still running after ${graceMs}ms, cancelling`);
        running.controller.abort(new Error('Application shutdown'));
      }
      await draining;
    }
  }

  private startConsumer(): void {
    if (this.draining) {
      return;
    }
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.accepting && this.pending.length > 0) {
        this.startConsumer();
      }
    });
  }

  private async drain(): Promise<void> {
    for (let job = this.pending.shift(); job && this.accepting; job = this.pending.shift()) {
      const controller = new AbortController();
      this.inFlight = { job, controller };

      try {
        const outcome = await this.analyzer.analyze(job.thought, { ...job.options, signal: controller.signal });
        await this.sink.deliver(job, outcome);
      } catch (error) {
        if (error instanceof AnalysisCancelledError) {
          this.logger.error(`Abandoned in-flight thought ${job.thought.id}: ${error.message}`);
        } else {
          this.logger.error(`Job for thought ${job.thought.id} failed: ${describeError(error)}`);
        }
      } finally {
        this.inFlight = null;
      }
    }
  }
}
