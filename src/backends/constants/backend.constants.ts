export const BACKEND_NAMES = ['openai', 'ollama', 'mock'] as const;
export type BackendName = (typeof BACKEND_NAMES)[number];

export const MOCK_MODES = [
  'success',
  'timeout',
  'unavailable',
  'rate-limited',
  'malformed',
  'internal-error',
  'invalid-input',
  'context-overflow',
] as const;
export type MockMode = (typeof MOCK_MODES)[number];

export const ANALYSIS_TYPES = ['standard', 'deep', 'quick'] as const;
export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export const SELECTION_STRATEGIES = ['sequential'] as const;
export type SelectionStrategy = (typeof SELECTION_STRATEGIES)[number];

export function isBackendName(value: string): value is BackendName {
  return (BACKEND_NAMES as readonly string[]).includes(value);
}

export const CONTENT_LIMITS = {
  MAX_LENGTH: 5000,
} as const;

export const DEFAULT_BACKEND_CONFIG = {
  AVAILABLE_BACKENDS: ['openai', 'ollama'],
  PRIMARY: 'openai',
  SECONDARY: 'ollama',
  STRATEGY: 'sequential',
  TIMEOUT_SECONDS: {
    openai: 30,
    ollama: 120,
    mock: 5,
  },
  OPENAI_MODEL: 'gpt-4o-mini',
  OPENAI_MAX_TOKENS: 1000,
  OPENAI_TEMPERATURE: 0.7,
  OLLAMA_BASE_URL: 'http://localhost:11434',
  OLLAMA_MODEL: 'gemma3:27b',
  OLLAMA_TEMPERATURE: 0.7,
  MOCK_MODE: 'success',
} as const;

export const HEALTH_CHECK_TIMEOUT_MS = 5000;

export const ERROR_MESSAGES = {
  EMPTY_CONTENT: 'Thought content cannot be empty or whitespace',
  NO_CONTENT_RECEIVED: 'No content received from model',
  OPENAI_API_KEY_NOT_CONFIGURED: 'OpenAI API key not configured',
} as const;
