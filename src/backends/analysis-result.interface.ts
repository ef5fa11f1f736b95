import { AnalysisErrorKind } from '../classifier/classifier.enum';
import { BackendName } from './constants/backend.constants';

export type ActionPriority = 'low' | 'medium' | 'high' | 'critical';

export interface Theme {
  theme: string;
  confidence: number;
}

export interface SuggestedAction {
  action: string;
  priority: ActionPriority;
  confidence: number;
}

export interface Analysis {
  summary: string;
  themes: Theme[];
  suggestedActions: SuggestedAction[];
  insights: string[];
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface AnalysisSuccess {
  success: true;
  requestId: string;
  backend: BackendName;
  model: string;
  analysis: Analysis;
  usage: TokenUsage;
  processingTimeMs: number;
  completedAt: string;
}

export interface AnalysisFailure {
  success: false;
  requestId: string;
  backend: BackendName;
  kind: AnalysisErrorKind;
  message: string;
  retryAfterSeconds?: number;
}

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

export interface FailureDetails {
  kind: AnalysisErrorKind;
  message: string;
  retryAfterSeconds?: number;
}

export function toFailure(requestId: string, backend: BackendName, details: FailureDetails): AnalysisFailure {
  return {
    success: false,
    requestId,
    backend,
    kind: details.kind,
    message: details.message,
    ...(details.retryAfterSeconds !== undefined && { retryAfterSeconds: details.retryAfterSeconds }),
  };
}

export const EMPTY_USAGE: Readonly<TokenUsage> = Object.freeze({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
});
