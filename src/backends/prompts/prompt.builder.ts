import { AnalysisRequest } from '../analysis-request';
import { ANALYSIS_SYSTEM_PROMPT, ANALYSIS_USER_PROMPT, DEPTH_GUIDANCE } from './analysis.prompt';

export interface PromptMessage {
  role: 'system' | 'user';
  content: string;
}

export function buildAnalysisMessages(request: AnalysisRequest): PromptMessage[] {
  return [
    { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
    { role: 'user', content: buildAnalysisPrompt(request) },
  ];
}

export function buildAnalysisPrompt(request: AnalysisRequest): string {
  const context = request.context && Object.keys(request.context).length > 0
    ? JSON.stringify(request.context, null, 2)
    : 'No additional context.';

  // Filled back to front so placeholders inside user text are never expanded;
  // replacer functions keep `$` sequences literal.
  return ANALYSIS_USER_PROMPT
    .replace('{context}', () => context)
    .replace('{thought}', () => request.content)
    .replace('{depth}', () => DEPTH_GUIDANCE[request.analysisType]);
}
