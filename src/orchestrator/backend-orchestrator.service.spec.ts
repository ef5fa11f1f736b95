import { createAnalysisRequest } from '../backends/analysis-request';
import { AnalysisResult } from '../backends/analysis-result.interface';
import { BackendRegistry } from '../backends/backend-registry';
import { AnalysisBackend } from '../backends/backend.interface';
import { BackendName } from '../backends/constants/backend.constants';
import { MockBackend, MockBackendOptions } from '../backends/mock/mock.backend';
import { AnalysisErrorKind } from '../classifier/classifier.enum';
import { ClassifierService } from '../classifier/classifier.service';
import { AnalysisCancelledError, BackendSelectionError } from '../common/errors';
import { createTestConfig, TestConfigOverrides } from '../config/config.fixture';
import { BackendSelectorService } from '../selection/backend-selector.service';
import { BackendOrchestratorService } from './backend-orchestrator.service';
import { DecisionTraceEntry } from './orchestrator.interface';

class HangingBackend implements AnalysisBackend {
  readonly name = 'openai';

  analyze(): Promise<AnalysisResult> {
    return new Promise(() => undefined);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

class ThrowingBackend implements AnalysisBackend {
  readonly name = 'openai';

  async analyze(): Promise<AnalysisResult> {
    throw new Error('kaboom');
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

class SyncThrowingBackend implements AnalysisBackend {
  readonly name = 'openai';

  analyze(): Promise<AnalysisResult> {
    throw new Error('thrown before any promise');
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

function createOrchestrator(backends: AnalysisBackend[], overrides: TestConfigOverrides = {}) {
  const config = createTestConfig(overrides);
  const entries = backends.map((backend): [BackendName, AnalysisBackend] => [backend.name, backend]);
  const registry = new BackendRegistry(new Map(entries));
  return new BackendOrchestratorService(registry, new BackendSelectorService(config), new ClassifierService(), config);
}

function mock(name: BackendName, options: Omit<MockBackendOptions, 'name'>): MockBackend {
  return new MockBackend({ name, ...options });
}

function request(requestId = 'req-1', availableBackends: BackendName[] = ['openai', 'ollama']) {
  return createAnalysisRequest({ requestId, content: 'I should improve my email workflow', availableBackends });
}

function actions(trace: DecisionTraceEntry[]) {
  return trace.map((entry) => entry.action);
}

describe('BackendOrchestratorService', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('falls back to the secondary when the primary is unavailable', async () => {
    const primary = mock('openai', { mode: 'unavailable' });
    const secondary = mock('ollama', { mode: 'success' });

    const { result, trace } = await createOrchestrator([primary, secondary]).orchestrate(request());

    expect(result.success).toBe(true);
    expect(result.success && result.backend).toBe('ollama');
    expect(trace).toHaveLength(2);
    expect(actions(trace)).toEqual(['NEXT_CANDIDATE', 'RETURN_SUCCESS']);
    expect(trace.map((entry) => entry.role)).toEqual(['primary', 'fallback']);
  });

  it('returns the primary success without touching the secondary', async () => {
    const primary = mock('openai', { mode: 'success' });
    const secondary = mock('ollama', { mode: 'success' });

    const { result, trace } = await createOrchestrator([primary, secondary]).orchestrate(request());

    expect(result.success && result.backend).toBe('openai');
    expect(trace).toHaveLength(1);
    expect(secondary.invocations).toBe(0);
  });

  it.each([
    ['invalid-input', AnalysisErrorKind.INVALID_INPUT],
    ['context-overflow', AnalysisErrorKind.CONTEXT_OVERFLOW],
  ] as const)('stops on a non-recoverable %s error', async (mode, kind) => {
    const primary = mock('openai', { mode });
    const secondary = mock('ollama', { mode: 'success' });

    const { result, trace } = await createOrchestrator([primary, secondary]).orchestrate(request());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.kind).toBe(kind);
      expect(result.aborted).toBe(true);
      expect(result.errors).toHaveLength(1);
    }
    expect(actions(trace)).toEqual(['ABORT']);
    expect(primary.invocations).toBe(1);
    expect(secondary.invocations).toBe(0);
  });

  it('retries a rate-limited primary once before falling back', async () => {
    const primary = mock('openai', { mode: 'rate-limited' });
    const secondary = mock('ollama', { mode: 'success' });

    const { result, trace } = await createOrchestrator([primary, secondary]).orchestrate(request());

    expect(result.success && result.backend).toBe('ollama');
    expect(trace.map(({ attempt, backend, retry, outcome, action }) => ({ attempt, backend, retry, outcome, action })))
      .toEqual([
        { attempt: 1, backend: 'openai', retry: false, outcome: 'RATE_LIMITED', action: 'RETRY_SAME_ONCE' },
        { attempt: 2, backend: 'openai', retry: true, outcome: 'RATE_LIMITED', action: 'NEXT_CANDIDATE' },
        { attempt: 3, backend: 'ollama', retry: false, outcome: 'SUCCESS', action: 'RETURN_SUCCESS' },
      ]);
    expect(primary.invocations).toBe(2);
  });

  it('returns the retried success when the rate limit clears', async () => {
    const primary = mock('openai', { mode: 'success', script: ['rate-limited'] });
    const secondary = mock('ollama', { mode: 'success' });

    const { result, trace } = await createOrchestrator([primary, secondary]).orchestrate(request());

    expect(result.success && result.backend).toBe('openai');
    expect(actions(trace)).toEqual(['RETRY_SAME_ONCE', 'RETURN_SUCCESS']);
    expect(secondary.invocations).toBe(0);
  });

  it('waits the backoff window before retrying', async () => {
    jest.useFakeTimers();
    const primary = mock('openai', { mode: 'success', script: ['rate-limited'] });
    const orchestrator = createOrchestrator([primary, mock('ollama', { mode: 'success' })], {
      orchestration: { rateLimitBackoffMs: 5000 },
    });

    const pending = orchestrator.orchestrate(request());
    await jest.advanceTimersByTimeAsync(4999);
    expect(primary.invocations).toBe(1);

    await jest.advanceTimersByTimeAsync(1);
    const { result } = await pending;

    expect(primary.invocations).toBe(2);
    expect(result.success && result.backend).toBe('openai');
  });

  it('lists every attempt when all candidates fail', async () => {
    const { result, trace } = await createOrchestrator([
      mock('openai', { mode: 'unavailable' }),
      mock('ollama', { mode: 'timeout' }),
    ]).orchestrate(request());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.kind).toBe(AnalysisErrorKind.TIMEOUT);
      expect(result.aborted).toBe(false);
      expect(result.errors.map((error) => [error.backend, error.kind])).toEqual([
        ['openai', AnalysisErrorKind.UNAVAILABLE],
        ['ollama', AnalysisErrorKind.TIMEOUT],
      ]);
    }
    expect(actions(trace)).toEqual(['NEXT_CANDIDATE', 'ALL_FAILED']);
  });

  it('keeps one error per attempt including the retry', async () => {
    const { result, trace } = await createOrchestrator([
      mock('openai', { mode: 'rate-limited' }),
      mock('ollama', { mode: 'unavailable' }),
    ]).orchestrate(request());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toHaveLength(trace.length);
      expect(result.errors).toHaveLength(3);
    }
  });

  it('aborts on the second internal error in one request', async () => {
    const { result, trace } = await createOrchestrator([
      mock('openai', { mode: 'internal-error' }),
      mock('ollama', { mode: 'internal-error' }),
    ]).orchestrate(request());

    expect(result.success ? null : result.aborted).toBe(true);
    expect(actions(trace)).toEqual(['NEXT_CANDIDATE', 'ABORT']);
  });

  it('falls back once on a malformed response', async () => {
    const { result } = await createOrchestrator([
      mock('openai', { mode: 'malformed' }),
      mock('ollama', { mode: 'success' }),
    ]).orchestrate(request());

    expect(result.success && result.backend).toBe('ollama');
  });

  it('produces identical plans for identical requests', async () => {
    const orchestrator = createOrchestrator([mock('openai', { mode: 'success' }), mock('ollama', { mode: 'success' })]);

    const first = await orchestrator.orchestrate(request('req-same'));
    const second = await orchestrator.orchestrate(request('req-same'));

    expect(JSON.stringify(second.plan)).toBe(JSON.stringify(first.plan));
  });

  it('synthesizes a timeout when a backend ignores its deadline', async () => {
    const { result, trace } = await createOrchestrator([new HangingBackend(), mock('ollama', { mode: 'success' })], {
      backends: { timeoutSeconds: { openai: 0.1, ollama: 120, mock: 5 } },
      orchestration: { deadlineGraceMs: 20 },
    }).orchestrate(request());

    expect(result.success && result.backend).toBe('ollama');
    expect(trace[0].outcome).toBe(AnalysisErrorKind.TIMEOUT);
  });

  it('reports the outer deadline in the failure', async () => {
    const { result } = await createOrchestrator([new HangingBackend()], {
      backends: { availableBackends: ['openai'], secondary: undefined, timeoutSeconds: { openai: 0.1, ollama: 120, mock: 5 } },
      orchestration: { deadlineGraceMs: 20 },
    }).orchestrate(request('req-1', ['openai']));

    expect(result.success ? null : result.errors[0].message).toBe('Backend openai exceeded the outer deadline of 120ms');
  });

  it('turns a rejecting backend into an internal error', async () => {
    const { result } = await createOrchestrator([new ThrowingBackend(), mock('ollama', { mode: 'success' })]).orchestrate(
      request(),
    );

    expect(result.success && result.backend).toBe('ollama');
  });

  it('turns a synchronously throwing backend into an internal error', async () => {
    const { result, trace } = await createOrchestrator([
      new SyncThrowingBackend(),
      mock('ollama', { mode: 'success' }),
    ]).orchestrate(request());

    expect(result.success && result.backend).toBe('ollama');
    expect(trace.map((entry) => entry.outcome)).toEqual([AnalysisErrorKind.INTERNAL_ERROR, 'SUCCESS']);
  });

  it('records unregistered candidates as unavailable', async () => {
    const { result } = await createOrchestrator([mock('openai', { mode: 'unavailable' })]).orchestrate(request());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[1]).toEqual({
        success: false,
        requestId: 'req-1',
        backend: 'ollama',
        kind: AnalysisErrorKind.UNAVAILABLE,
        message: 'Backend ollama is not registered',
      });
    }
  });

  it('throws when no backend can be selected', async () => {
    await expect(
      createOrchestrator([mock('mock', { mode: 'success' })]).orchestrate(request('req-1', ['mock'])),
    ).rejects.toBeInstanceOf(BackendSelectionError);
  });

  describe('cancellation', () => {
    it('rejects before the first attempt when already aborted', async () => {
      const primary = mock('openai', { mode: 'success' });
      const controller = new AbortController();
      controller.abort();

      await expect(
        createOrchestrator([primary]).orchestrate(request(), { signal: controller.signal }),
      ).rejects.toBeInstanceOf(AnalysisCancelledError);
      expect(primary.invocations).toBe(0);
    });

    it('rejects while an adapter call is in flight', async () => {
      const primary = mock('openai', { mode: 'success', latencyMs: 1000 });
      const secondary = mock('ollama', { mode: 'success' });
      const controller = new AbortController();

      const pending = createOrchestrator([primary, secondary]).orchestrate(request(), { signal: controller.signal });
      setTimeout(() => controller.abort(), 20);

      await expect(pending).rejects.toBeInstanceOf(AnalysisCancelledError);
      expect(secondary.invocations).toBe(0);
    });

    it('never retries after cancellation during the backoff', async () => {
      const primary = mock('openai', { mode: 'rate-limited' });
      const secondary = mock('ollama', { mode: 'success' });
      const controller = new AbortController();

      const pending = createOrchestrator([primary, secondary], {
        orchestration: { rateLimitBackoffMs: 5000 },
      }).orchestrate(request(), { signal: controller.signal });
      setTimeout(() => controller.abort(), 20);

      await expect(pending).rejects.toBeInstanceOf(AnalysisCancelledError);
      expect(primary.invocations).toBe(1);
      expect(secondary.invocations).toBe(0);
    });
  });

  it('emits every decision on the decisions stream', async () => {
    const orchestrator = createOrchestrator([mock('openai', { mode: 'unavailable' }), mock('ollama', { mode: 'success' })]);
    const emitted: DecisionTraceEntry[] = [];
    const subscription = orchestrator.decisions$.subscribe((entry) => emitted.push(entry));

    const { trace } = await orchestrator.orchestrate(request());
    subscription.unsubscribe();

    expect(emitted).toEqual(trace);
    expect(emitted[1].tokensUsed).toBe(100);
  });
});
