import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { AnalysisErrorKind } from '../../classifier/classifier.enum';
import { describeError, isRecord } from '../../common/errors';
import { OllamaBackendSettings } from '../../config/config.interface';
import { AnalysisRequest } from '../analysis-request';
import { FailureDetails } from '../analysis-result.interface';
import { BaseBackend, BackendCompletion } from '../base.backend';
import { parseRetryAfter } from '../backend-fault';
import { HEALTH_CHECK_TIMEOUT_MS } from '../constants/backend.constants';
import { buildAnalysisMessages, PromptMessage } from '../prompts/prompt.builder';

const CONTEXT_OVERFLOW_PATTERN = /context (length|window|size)|exceeds?( the)?( model'?s?)? context|too long|too many tokens/i;

interface OllamaChatRequest {
  model: string;
  messages: PromptMessage[];
  stream: false;
  format: 'json';
  options: { temperature: number };
}

export interface OllamaChatResponse {
  model?: string;
  message?: { role: string; content?: string };
  done?: boolean;
  prompt_eval_count?: number;
  eval_count?: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/** Local fallback backend, served by an Ollama instance on the network. */
export class OllamaBackend extends BaseBackend {
  readonly name = 'ollama';

  protected readonly confidenceDefaults = { theme: 0.7, action: 0.6 };

  private readonly baseUrl: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly settings: Readonly<OllamaBackendSettings>,
  ) {
    super();
    this.baseUrl = settings.baseUrl.replace(/\/+$/, '');
    this.logger.log(`Initialized with model ${settings.model} at ${this.baseUrl}`);
  }

  protected async complete(
    request: AnalysisRequest,
    signal: AbortSignal,
    timeoutSeconds: number,
  ): Promise<BackendCompletion> {
    const body: OllamaChatRequest = {
      model: this.settings.model,
      messages: buildAnalysisMessages(request),
      stream: false,
      format: 'json',
      options: { temperature: this.settings.temperature },
    };

    const response = await firstValueFrom(
      this.httpService.post<OllamaChatResponse>(`${this.baseUrl}/api/chat`, body, {
        signal,
        timeout: timeoutSeconds * 1000,
      }),
    );

    const data = response.data;
    const analysis = this.parseContent(data.message?.content);
    const promptTokens = data.prompt_eval_count ?? 0;
    const completionTokens = data.eval_count ?? 0;

    return {
      model: data.model || this.settings.model,
      analysis,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
    };
  }

  protected mapError(error: unknown): FailureDetails {
    if (!isAxiosError(error)) {
      return this.unexpected(error);
    }

    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return { kind: AnalysisErrorKind.TIMEOUT, message: `Ollama request timed out: ${error.message}` };
    }

    const status = error.response?.status;
    if (status === undefined) {
      return { kind: AnalysisErrorKind.UNAVAILABLE, message: `Ollama server unreachable: ${error.message}` };
    }

    const detail = extractErrorMessage(error.response?.data) ?? error.message;

    if (status === 429) {
      const header = error.response?.headers['retry-after'];
      const retryAfterSeconds = parseRetryAfter(typeof header === 'string' ? header : undefined);
      return {
        kind: AnalysisErrorKind.RATE_LIMITED,
        message: `Ollama rate limit exceeded: ${detail}`,
        ...(retryAfterSeconds !== undefined && { retryAfterSeconds }),
      };
    }
    if (status === 404 || status >= 500) {
      return { kind: AnalysisErrorKind.UNAVAILABLE, message: `Ollama error ${status}: ${detail}` };
    }
    if (status === 400 && CONTEXT_OVERFLOW_PATTERN.test(detail)) {
      return { kind: AnalysisErrorKind.CONTEXT_OVERFLOW, message: `Prompt exceeds the model context: ${detail}` };
    }
    if (status >= 400) {
      return { kind: AnalysisErrorKind.INVALID_INPUT, message: `Ollama rejected the request (${status}): ${detail}` };
    }
    return { kind: AnalysisErrorKind.INTERNAL_ERROR, message: `Unexpected Ollama status ${status}: ${detail}` };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await firstValueFrom(
        this.httpService.get(`${this.baseUrl}/api/tags`, { timeout: HEALTH_CHECK_TIMEOUT_MS }),
      );
      return response.status === 200;
    } catch (error) {
      this.logger.warn(`Health check failed: ${describeError(error)}`);
      return false;
    }
  }
}

function extractErrorMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data) {
    return data;
  }
  if (isRecord(data) && typeof data.error === 'string') {
    return data.error;
  }
  return undefined;
}
