import { DEFAULT_BACKEND_CONFIG } from '../backends/constants/backend.constants';
import { BackendConfig, OrchestrationConfig, QueueConfig } from './config.interface';
import { ConfigService, DEFAULT_ORCHESTRATION_CONFIG, DEFAULT_QUEUE_CONFIG } from './config.service';

export interface TestConfigOverrides {
  backends?: Partial<BackendConfig>;
  orchestration?: Partial<OrchestrationConfig>;
  queue?: Partial<QueueConfig>;
}

export function createTestConfig(overrides: TestConfigOverrides = {}): ConfigService {
  return new ConfigService({
    environment: 'test',
    backends: {
      availableBackends: ['openai', 'ollama'],
      primary: 'openai',
      secondary: 'ollama',
      strategy: 'sequential',
      timeoutSeconds: { ...DEFAULT_BACKEND_CONFIG.TIMEOUT_SECONDS },
      openai: { apiKey: 'test-secret', model: 'gpt-test', maxTokens: 500, temperature: 0.2 },
      ollama: { baseUrl: 'http://ollama.test:11434', model: 'llama-test', temperature: 0.7 },
      mock: { mode: 'success' },
      ...overrides.backends,
    },
    orchestration: { ...DEFAULT_ORCHESTRATION_CONFIG, rateLimitBackoffMs: 0, ...overrides.orchestration },
    queue: { ...DEFAULT_QUEUE_CONFIG, ...overrides.queue },
  });
}
