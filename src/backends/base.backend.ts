import { Logger } from '@nestjs/common';
import { performance } from 'node:perf_hooks';
import { AnalysisErrorKind } from '../classifier/classifier.enum';
import { createDeadline } from '../common/abort';
import { describeError } from '../common/errors';
import { AnalysisRequest, countCharacters } from './analysis-request';
import { ConfidenceDefaults, parseAnalysisPayload, toAnalysis } from './analysis-response.parser';
import { Analysis, AnalysisResult, FailureDetails, TokenUsage, toFailure } from './analysis-result.interface';
import { BackendFault } from './backend-fault';
import { AnalysisBackend } from './backend.interface';
import { BackendName, CONTENT_LIMITS, ERROR_MESSAGES } from './constants/backend.constants';

export interface BackendCompletion {
  model: string;
  analysis: Analysis;
  usage: TokenUsage;
}

/**
 * Shared request lifecycle for adapters: input checks, a deadline bound to
 * the caller's signal, and conversion of every thrown error into a failure.
 */
export abstract class BaseBackend implements AnalysisBackend {
  protected readonly logger = new Logger(this.constructor.name);

  abstract readonly name: BackendName;

  protected abstract readonly confidenceDefaults: ConfidenceDefaults;

  protected abstract complete(
    request: AnalysisRequest,
    signal: AbortSignal,
    timeoutSeconds: number,
  ): Promise<BackendCompletion>;

  protected abstract mapError(error: unknown): FailureDetails;

  abstract healthCheck(): Promise<boolean>;

  async analyze(request: AnalysisRequest, timeoutSeconds: number, signal?: AbortSignal): Promise<AnalysisResult> {
    const inputError = this.validateInput(request);
    if (inputError) {
      return toFailure(request.requestId, this.name, { kind: AnalysisErrorKind.INVALID_INPUT, message: inputError });
    }

    if (signal?.aborted) {
      return this.cancelled(request);
    }

    const startedAt = performance.now();
    const deadline = createDeadline(timeoutSeconds * 1000, signal);

    try {
      const completion = await this.complete(request, deadline.signal, timeoutSeconds);
      const processingTimeMs = Math.round(performance.now() - startedAt);

      this.logger.log(
        `Analysis ${request.requestId} completed by ${this.name} (${completion.model}) in ${processingTimeMs}ms`,
      );

      return {
        success: true,
        requestId: request.requestId,
        backend: this.name,
        model: completion.model,
        analysis: completion.analysis,
        usage: completion.usage,
        processingTimeMs,
        completedAt: new Date().toISOString(),
      };
    } catch (error) {
      if (deadline.expired) {
        return toFailure(request.requestId, this.name, {
          kind: AnalysisErrorKind.TIMEOUT,
          message: `${this.name} did not respond within ${timeoutSeconds}s`,
        });
      }
      if (signal?.aborted) {
        return this.cancelled(request);
      }

      const details = error instanceof BackendFault ? error.toDetails() : this.mapError(error);
      this.logger.warn(`Analysis ${request.requestId} failed on ${this.name}: ${details.kind} ${details.message}`);
      return toFailure(request.requestId, this.name, details);
    } finally {
      deadline.dispose();
    }
  }

  protected parseContent(content: string | null | undefined): Analysis {
    if (!content?.trim()) {
      throw new BackendFault(AnalysisErrorKind.MALFORMED_RESPONSE, ERROR_MESSAGES.NO_CONTENT_RECEIVED);
    }

    const parsed = parseAnalysisPayload(content);
    if (!parsed.ok) {
      throw new BackendFault(AnalysisErrorKind.MALFORMED_RESPONSE, parsed.error);
    }
    return toAnalysis(parsed.payload, this.confidenceDefaults);
  }

  protected unexpected(error: unknown): FailureDetails {
    return { kind: AnalysisErrorKind.INTERNAL_ERROR, message: `Unexpected error: ${describeError(error)}` };
  }

  private validateInput(request: AnalysisRequest): string | null {
    if (!request.content.trim()) {
      return ERROR_MESSAGES.EMPTY_CONTENT;
    }
    const length = countCharacters(request.content);
    if (length > CONTENT_LIMITS.MAX_LENGTH) {
      return `Thought content exceeds ${CONTENT_LIMITS.MAX_LENGTH} characters (got ${length})`;
    }
    return null;
  }

  private cancelled(request: AnalysisRequest): AnalysisResult {
    return toFailure(request.requestId, this.name, {
      kind: AnalysisErrorKind.TIMEOUT,
      message: `Analysis ${request.requestId} cancelled before ${this.name} responded`,
    });
  }
}
