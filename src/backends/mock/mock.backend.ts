import { AnalysisErrorKind } from '../../classifier/classifier.enum';
import { sleep } from '../../common/abort';
import { AnalysisRequest } from '../analysis-request';
import { Analysis, FailureDetails, SuggestedAction, Theme } from '../analysis-result.interface';
import { BackendFault } from '../backend-fault';
import { BaseBackend, BackendCompletion } from '../base.backend';
import { BackendName, MockMode } from '../constants/backend.constants';

export interface MockBackendOptions {
  /** Registry name to answer under; lets tests stand in for any backend. */
  name?: BackendName;
  mode: MockMode;
  /** Test-only: modes consumed one per call before falling back to `mode`. */
  script?: readonly MockMode[];
  latencyMs?: number;
}

export const MOCK_MODEL = 'mock-v1.0';

const THEME_KEYWORDS: ReadonlyArray<{ keywords: string[]; theme: Theme }> = [
  { keywords: ['email'], theme: { theme: 'email', confidence: 0.95 } },
  { keywords: ['optimize', 'improve'], theme: { theme: 'optimization', confidence: 0.9 } },
  { keywords: ['task'], theme: { theme: 'task management', confidence: 0.85 } },
];

const ACTION_KEYWORDS = ['should', 'need to'];

/**
 * Deterministic backend with canned responses; makes no network calls.
 *
 * The registry builds it from `mode` alone. The script cursor and the
 * invocation counter are per-call state used only by tests.
 */
export class MockBackend extends BaseBackend {
  readonly name: BackendName;

  protected readonly confidenceDefaults = { theme: 0.7, action: 0.8 };

  private readonly mode: MockMode;
  private readonly script: MockMode[];
  private readonly latencyMs: number;
  private calls = 0;

  constructor(options: MockBackendOptions) {
    super();
    this.name = options.name ?? 'mock';
    this.mode = options.mode;
    this.script = [...(options.script ?? [])];
    this.latencyMs = options.latencyMs ?? 0;
  }

  get invocations(): number {
    return this.calls;
  }

  protected async complete(
    request: AnalysisRequest,
    signal: AbortSignal,
    timeoutSeconds: number,
  ): Promise<BackendCompletion> {
    this.calls++;
    const mode = this.script.shift() ?? this.mode;

    if (this.latencyMs > 0) {
      await sleep(this.latencyMs, signal);
    }

    switch (mode) {
      case 'success':
        return {
          model: MOCK_MODEL,
          analysis: buildMockAnalysis(request.content),
          usage: { promptTokens: 50, completionTokens: 50, totalTokens: 100 },
        };
      case 'timeout':
        throw new BackendFault(AnalysisErrorKind.TIMEOUT, `Mock timeout after ${timeoutSeconds}s`);
      case 'unavailable':
        throw new BackendFault(AnalysisErrorKind.UNAVAILABLE, 'Mock backend unavailable');
      case 'rate-limited':
        throw new BackendFault(AnalysisErrorKind.RATE_LIMITED, 'Mock rate limit exceeded', 60);
      case 'malformed':
        throw new BackendFault(AnalysisErrorKind.MALFORMED_RESPONSE, 'Mock response could not be parsed');
      case 'internal-error':
        throw new BackendFault(AnalysisErrorKind.INTERNAL_ERROR, 'Mock internal error');
      case 'invalid-input':
        throw new BackendFault(AnalysisErrorKind.INVALID_INPUT, 'Mock rejected the input');
      case 'context-overflow':
        throw new BackendFault(AnalysisErrorKind.CONTEXT_OVERFLOW, 'Mock context window exceeded');
    }
  }

  protected mapError(error: unknown): FailureDetails {
    return this.unexpected(error);
  }

  async healthCheck(): Promise<boolean> {
    return this.mode !== 'unavailable';
  }
}

export function buildMockAnalysis(content: string): Analysis {
  const text = content.toLowerCase();

  const themes = THEME_KEYWORDS
    .filter(({ keywords }) => keywords.some((keyword) => text.includes(keyword)))
    .map(({ theme }) => ({ ...theme }));

  const suggestedActions: SuggestedAction[] = ACTION_KEYWORDS.some((keyword) => text.includes(keyword))
    ? [{ action: 'Create task for this thought', priority: 'medium', confidence: 0.8 }]
    : [];

  return {
    summary: `Mock analysis: ${content.slice(0, 50)}...`,
    themes: themes.length > 0 ? themes : [{ theme: 'general', confidence: 0.7 }],
    suggestedActions,
    insights: [],
  };
}
