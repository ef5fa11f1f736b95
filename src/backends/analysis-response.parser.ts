import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { describeError, isRecord } from '../common/errors';
import { Analysis } from './analysis-result.interface';
import { AnalysisPayloadDto } from './dto/analysis-payload.dto';

export type ParsedAnalysis = { ok: true; payload: AnalysisPayloadDto } | { ok: false; error: string };

export interface ConfidenceDefaults {
  theme: number;
  action: number;
}

export function parseAnalysisPayload(content: string): ParsedAnalysis {
  const json = extractJson(content);
  if (json === null) {
    return { ok: false, error: 'Response does not contain a JSON object' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return { ok: false, error: `Invalid JSON: ${describeError(error)}` };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: 'Response JSON is not an object' };
  }

  const payload = plainToInstance(AnalysisPayloadDto, parsed);
  const errors = validateSync(payload);
  if (errors.length > 0) {
    const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    return { ok: false, error: `Response failed validation: ${details.join('; ')}` };
  }

  return { ok: true, payload };
}

export function extractJson(content: string): string | null {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    return fenced[1];
  }

  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  return start !== -1 && end > start ? content.slice(start, end + 1) : null;
}

export function toAnalysis(payload: AnalysisPayloadDto, defaults: ConfidenceDefaults): Analysis {
  const actionConfidence = payload.confidence ?? defaults.action;

  return {
    summary: payload.summary.trim(),
    themes: payload.themes
      .map((theme) => theme.trim())
      .filter(Boolean)
      .map((theme) => ({ theme, confidence: defaults.theme })),
    suggestedActions: payload.is_actionable
      ? [
          {
            action: payload.action_suggestion?.trim() || 'Create task for this thought',
            priority: payload.priority ?? 'medium',
            confidence: actionConfidence,
          },
        ]
      : [],
    insights: payload.insights ?? [],
  };
}
