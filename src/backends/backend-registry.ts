import { HttpService } from '@nestjs/axios';
import { Logger } from '@nestjs/common';
import { UnknownBackendError } from '../common/errors';
import { IConfig } from '../config/config.interface';
import { AnalysisBackend } from './backend.interface';
import { BackendName } from './constants/backend.constants';
import { MockBackend } from './mock/mock.backend';
import { OllamaBackend } from './ollama/ollama.backend';
import { OpenAIBackend } from './openai/openai.backend';

/** Adapter instances keyed by name, built once at startup. */
export class BackendRegistry {
  private readonly logger = new Logger(BackendRegistry.name);

  constructor(private readonly backends: ReadonlyMap<BackendName, AnalysisBackend>) {}

  static fromConfig(config: IConfig, httpService: HttpService): BackendRegistry {
    const logger = new Logger(BackendRegistry.name);
    const backends = new Map<BackendName, AnalysisBackend>();

    for (const name of config.backends.availableBackends) {
      switch (name) {
        case 'openai':
          if (!config.backends.openai.apiKey) {
            logger.warn('OpenAI API key not configured, openai backend disabled');
            break;
          }
          backends.set(name, new OpenAIBackend(config.backends.openai));
          break;
        case 'ollama':
          backends.set(name, new OllamaBackend(httpService, config.backends.ollama));
          break;
        case 'mock':
          backends.set(name, new MockBackend({ mode: config.backends.mock.mode }));
          break;
      }
    }

    logger.log(`Registered backends: ${[...backends.keys()].join(', ') || 'none'}`);
    return new BackendRegistry(backends);
  }

  get(name: BackendName): AnalysisBackend {
    const backend = this.backends.get(name);
    if (!backend) {
      throw new UnknownBackendError(name, this.names());
    }
    return backend;
  }

  has(name: BackendName): boolean {
    return this.backends.has(name);
  }

  names(): BackendName[] {
    return [...this.backends.keys()];
  }

  async healthCheckAll(): Promise<Partial<Record<BackendName, boolean>>> {
    const entries = await Promise.all(
      [...this.backends.values()].map(async (backend) => [backend.name, await backend.healthCheck()] as const),
    );

    const health: Partial<Record<BackendName, boolean>> = {};
    for (const [name, healthy] of entries) {
      health[name] = healthy;
      if (!healthy) {
        this.logger.warn(`Backend ${name} failed its health check`);
      }
    }
    return health;
  }
}
