import { randomUUID } from 'node:crypto';
import { AnalysisType, BackendName } from './constants/backend.constants';

export interface AnalysisPreferences {
  preferLocal?: boolean;
  maxLatencyMs?: number;
}

export interface AnalysisRequest {
  readonly requestId: string;
  readonly content: string;
  /** Length in code points, so astral characters count once. */
  readonly contentLength: number;
  readonly analysisType: AnalysisType;
  readonly availableBackends: readonly BackendName[];
  readonly preferences?: Readonly<AnalysisPreferences>;
  /** User/profile data for prompt building. Never inspected by selection or orchestration. */
  readonly context?: Readonly<Record<string, unknown>>;
}

export interface AnalysisRequestInit {
  requestId?: string;
  content: string;
  analysisType?: AnalysisType;
  availableBackends: readonly BackendName[];
  preferences?: AnalysisPreferences;
  context?: Record<string, unknown>;
}

export function createAnalysisRequest(init: AnalysisRequestInit): AnalysisRequest {
  const content = init.content.trim();
  const availableBackends = Object.freeze([...new Set(init.availableBackends)]);

  return Object.freeze({
    requestId: init.requestId ?? randomUUID(),
    content,
    contentLength: countCharacters(content),
    analysisType: init.analysisType ?? 'standard',
    availableBackends,
    ...(init.preferences && { preferences: Object.freeze({ ...init.preferences }) }),
    ...(init.context && { context: Object.freeze({ ...init.context }) }),
  });
}

export function countCharacters(text: string): number {
  return [...text].length;
}
