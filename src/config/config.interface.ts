import { BackendName, MockMode, SelectionStrategy } from '../backends/constants/backend.constants';

export interface OpenAIBackendSettings {
  apiKey: string;
  baseUrl?: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface OllamaBackendSettings {
  baseUrl: string;
  model: string;
  temperature: number;
}

export interface MockBackendSettings {
  mode: MockMode;
}

export interface BackendConfig {
  availableBackends: readonly BackendName[];
  primary: BackendName;
  secondary?: BackendName;
  strategy: SelectionStrategy;
  timeoutSeconds: Readonly<Record<BackendName, number>>;
  openai: Readonly<OpenAIBackendSettings>;
  ollama: Readonly<OllamaBackendSettings>;
  mock: Readonly<MockBackendSettings>;
}

export interface OrchestrationConfig {
  rateLimitBackoffMs: number;
  /** Added to a candidate's timeout for the orchestrator's outer deadline. */
  deadlineGraceMs: number;
}

export interface QueueConfig {
  capacity: number;
  shutdownGraceMs: number;
}

export interface IConfig {
  environment: string;
  backends: Readonly<BackendConfig>;
  orchestration: Readonly<OrchestrationConfig>;
  queue: Readonly<QueueConfig>;
}
