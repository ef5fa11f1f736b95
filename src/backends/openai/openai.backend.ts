import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  BadRequestError,
  RateLimitError,
} from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { AnalysisErrorKind } from '../../classifier/classifier.enum';
import { withTimeout } from '../../common/abort';
import { describeError } from '../../common/errors';
import { OpenAIBackendSettings } from '../../config/config.interface';
import { AnalysisRequest } from '../analysis-request';
import { FailureDetails, EMPTY_USAGE } from '../analysis-result.interface';
import { BaseBackend, BackendCompletion } from '../base.backend';
import { parseRetryAfter } from '../backend-fault';
import { ERROR_MESSAGES, HEALTH_CHECK_TIMEOUT_MS } from '../constants/backend.constants';
import { buildAnalysisMessages } from '../prompts/prompt.builder';

export interface OpenAIRequestOptions {
  signal?: AbortSignal;
  timeout?: number;
}

/** The part of the OpenAI client this adapter calls. */
export interface OpenAIClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: OpenAIRequestOptions): PromiseLike<ChatCompletion>;
    };
  };
  models: {
    list(): PromiseLike<unknown>;
  };
}

const CONTEXT_OVERFLOW_CODE = 'context_length_exceeded';

/**
 * Remote primary backend. Talks to any OpenAI-compatible chat completions
 * endpoint; retries are left to the orchestrator.
 */
export class OpenAIBackend extends BaseBackend {
  readonly name = 'openai';

  protected readonly confidenceDefaults = { theme: 0.8, action: 0.7 };

  private readonly client: OpenAIClient;

  constructor(
    private readonly settings: Readonly<OpenAIBackendSettings>,
    client?: OpenAIClient,
  ) {
    super();

    if (!client && !settings.apiKey) {
      throw new Error(ERROR_MESSAGES.OPENAI_API_KEY_NOT_CONFIGURED);
    }

    this.client = client ?? new OpenAI({
      apiKey: settings.apiKey,
      maxRetries: 0,
      ...(settings.baseUrl ? { baseURL: settings.baseUrl } : {}),
    });
    this.logger.log(`Initialized with model ${settings.model}`);
  }

  protected async complete(
    request: AnalysisRequest,
    signal: AbortSignal,
    timeoutSeconds: number,
  ): Promise<BackendCompletion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.settings.model,
        messages: buildAnalysisMessages(request),
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
        response_format: { type: 'json_object' },
      },
      { signal, timeout: timeoutSeconds * 1000 },
    );

    const analysis = this.parseContent(response.choices[0]?.message?.content);

    return {
      model: response.model || this.settings.model,
      analysis,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : { ...EMPTY_USAGE },
    };
  }

  protected mapError(error: unknown): FailureDetails {
    if (error instanceof APIConnectionTimeoutError) {
      return { kind: AnalysisErrorKind.TIMEOUT, message: 'OpenAI request timed out' };
    }
    if (error instanceof RateLimitError) {
      const retryAfterSeconds = parseRetryAfter(error.headers?.['retry-after']);
      return {
        kind: AnalysisErrorKind.RATE_LIMITED,
        message: `OpenAI rate limit exceeded: ${error.message}`,
        ...(retryAfterSeconds !== undefined && { retryAfterSeconds }),
      };
    }
    if (error instanceof APIConnectionError) {
      return { kind: AnalysisErrorKind.UNAVAILABLE, message: `OpenAI connection failed: ${error.message}` };
    }
    if (error instanceof BadRequestError) {
      const overflow = error.code === CONTEXT_OVERFLOW_CODE || /maximum context length/i.test(error.message);
      return overflow
        ? { kind: AnalysisErrorKind.CONTEXT_OVERFLOW, message: `Prompt exceeds the model context: ${error.message}` }
        : { kind: AnalysisErrorKind.INVALID_INPUT, message: `OpenAI rejected the request: ${error.message}` };
    }
    if (error instanceof APIError) {
      return this.mapStatus(error.status, error.message);
    }
    return this.unexpected(error);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await withTimeout(this.client.models.list(), HEALTH_CHECK_TIMEOUT_MS);
      return true;
    } catch (error) {
      this.logger.warn(`Health check failed: ${describeError(error)}`);
      return false;
    }
  }

  private mapStatus(status: number | undefined, message: string): FailureDetails {
    if (status === 401 || status === 403 || status === 404 || (status !== undefined && status >= 500)) {
      return { kind: AnalysisErrorKind.UNAVAILABLE, message: `OpenAI API error ${status}: ${message}` };
    }
    if (status === 422) {
      return { kind: AnalysisErrorKind.INVALID_INPUT, message: `OpenAI rejected the request: ${message}` };
    }
    return { kind: AnalysisErrorKind.INTERNAL_ERROR, message: `OpenAI API error ${status ?? 'unknown'}: ${message}` };
  }
}
