import { AnalysisType } from '../constants/backend.constants';

export const ANALYSIS_SYSTEM_PROMPT = `You are a personal assistant that helps one person make sense of the short thoughts and tasks they capture during the day.
Be concise and concrete. Answer with a single JSON object and nothing else.`;

export const ANALYSIS_USER_PROMPT = `<task>
Analyze the captured thought below. {depth}
</task>

<thought>
{thought}
</thought>

<context>
{context}
</context>

<response_format>
{
  "summary": "One-sentence summary of the thought",
  "themes": ["theme1", "theme2"],
  "is_actionable": true,
  "action_suggestion": "A concrete task, only when actionable",
  "priority": "low | medium | high | critical",
  "confidence": 0.0,
  "insights": ["insight1", "insight2"]
}
</response_format>`;

export const DEPTH_GUIDANCE: Record<AnalysisType, string> = {
  quick: 'Keep it brief: one theme and at most one insight.',
  standard: 'Identify the main themes and whether it calls for action.',
  deep: 'Look for underlying motivations, connections between themes and non-obvious next steps.',
};
