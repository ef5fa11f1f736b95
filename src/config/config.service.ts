import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import {
  BackendName,
  DEFAULT_BACKEND_CONFIG,
  isBackendName,
  MockMode,
  MOCK_MODES,
} from '../backends/constants/backend.constants';
import { ConfigValidationError, describeError } from '../common/errors';
import { VaultService } from '../vault/vault.service';
import { BackendConfig, IConfig, OrchestrationConfig, QueueConfig } from './config.interface';
import { EnvironmentVariables } from './environment.dto';

export const DEFAULT_ORCHESTRATION_CONFIG: Readonly<OrchestrationConfig> = Object.freeze({
  rateLimitBackoffMs: 5000,
  deadlineGraceMs: 200,
});

export const DEFAULT_QUEUE_CONFIG: Readonly<QueueConfig> = Object.freeze({
  capacity: 100,
  shutdownGraceMs: 10000,
});

export interface VaultSecrets {
  openaiApiKey?: string;
}

/**
 * Process-wide configuration. Built once at startup by {@link ConfigService.load}
 * and deep-frozen; nothing reads the environment after that.
 */
@Injectable()
export class ConfigService implements IConfig {
  readonly environment: string;
  readonly backends: Readonly<BackendConfig>;
  readonly orchestration: Readonly<OrchestrationConfig>;
  readonly queue: Readonly<QueueConfig>;

  constructor(config: IConfig) {
    this.environment = config.environment;
    this.backends = deepFreeze({ ...config.backends });
    this.orchestration = Object.freeze({ ...config.orchestration });
    this.queue = Object.freeze({ ...config.queue });
  }

  static async load(env: NodeJS.ProcessEnv, vaultService: VaultService): Promise<ConfigService> {
    const logger = new Logger(ConfigService.name);
    const variables = validateEnvironment(env);
    const secrets = await loadSecretsFromVault(vaultService, logger);
    const config = new ConfigService(buildConfig(variables, secrets));

    logger.log(
      `Backends: available=[${config.backends.availableBackends.join(', ')}], ` +
        `primary=${config.backends.primary}, secondary=${config.backends.secondary ?? 'none'}, ` +
        `strategy=${config.backends.strategy}`,
    );
    return config;
  }
}

export function validateEnvironment(env: NodeJS.ProcessEnv): EnvironmentVariables {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    // Unset-but-declared variables (`FOO=`) fall back to defaults, except
    // SECONDARY_BACKEND where an empty value means "no fallback".
    if (value !== undefined && (value !== '' || key === 'SECONDARY_BACKEND')) {
      present[key] = value;
    }
  }

  const variables = plainToInstance(EnvironmentVariables, present);
  const errors = validateSync(variables, { skipMissingProperties: false });
  if (errors.length > 0) {
    throw new ConfigValidationError(flattenValidationErrors(errors));
  }
  return variables;
}

export async function loadSecretsFromVault(vaultService: VaultService, logger: Logger): Promise<VaultSecrets> {
  if (!vaultService.isConfigured) {
    logger.warn('Vault credentials not configured, using environment variables');
    return {};
  }

  try {
    const isHealthy = await vaultService.isHealthy();
    if (!isHealthy) {
      logger.warn('Vault is not healthy, using environment variables');
      return {};
    }

    const globalSecrets = await vaultService.readSecret('global');
    const apiKey = globalSecrets?.openai_api_key;
    logger.log(`API secrets loaded from Vault (openai_api_key: ${apiKey ? 'configured' : 'empty'})`);
    return typeof apiKey === 'string' && apiKey ? { openaiApiKey: apiKey } : {};
  } catch (error) {
    logger.error(`Failed to load secrets from Vault: ${describeError(error)}`);
    logger.warn('Falling back to environment variables');
    return {};
  }
}

export function buildConfig(variables: EnvironmentVariables, secrets: VaultSecrets = {}): IConfig {
  const violations: string[] = [];

  const availableBackends = parseBackendList(
    variables.AVAILABLE_BACKENDS ?? DEFAULT_BACKEND_CONFIG.AVAILABLE_BACKENDS.join(','),
    violations,
  );

  const primary = resolveBackend('PRIMARY_BACKEND', variables.PRIMARY_BACKEND ?? DEFAULT_BACKEND_CONFIG.PRIMARY, violations);
  const secondaryName = variables.SECONDARY_BACKEND ?? DEFAULT_BACKEND_CONFIG.SECONDARY;
  const secondary = secondaryName ? resolveBackend('SECONDARY_BACKEND', secondaryName, violations) : undefined;

  if (primary && !availableBackends.includes(primary)) {
    violations.push(`PRIMARY_BACKEND '${primary}' is not listed in AVAILABLE_BACKENDS`);
  }
  if (secondary && !availableBackends.includes(secondary)) {
    violations.push(`SECONDARY_BACKEND '${secondary}' is not listed in AVAILABLE_BACKENDS`);
  }

  const strategy = variables.BACKEND_SELECTION_STRATEGY ?? DEFAULT_BACKEND_CONFIG.STRATEGY;
  if (strategy !== 'sequential') {
    violations.push(`BACKEND_SELECTION_STRATEGY '${strategy}' is not supported`);
  }

  const mockMode = resolveMockMode(variables.MOCK_MODE ?? DEFAULT_BACKEND_CONFIG.MOCK_MODE, violations);

  if (violations.length > 0 || !primary || !mockMode) {
    throw new ConfigValidationError(violations);
  }

  return {
    environment: variables.NODE_ENV ?? 'development',
    backends: {
      availableBackends,
      primary,
      ...(secondary && { secondary }),
      strategy: 'sequential',
      timeoutSeconds: {
        openai: variables.BACKEND_TIMEOUT_OPENAI ?? DEFAULT_BACKEND_CONFIG.TIMEOUT_SECONDS.openai,
        ollama: variables.BACKEND_TIMEOUT_OLLAMA ?? DEFAULT_BACKEND_CONFIG.TIMEOUT_SECONDS.ollama,
        mock: variables.BACKEND_TIMEOUT_MOCK ?? DEFAULT_BACKEND_CONFIG.TIMEOUT_SECONDS.mock,
      },
      openai: {
        apiKey: secrets.openaiApiKey ?? variables.OPENAI_API_KEY ?? '',
        ...(variables.OPENAI_BASE_URL ? { baseUrl: variables.OPENAI_BASE_URL } : {}),
        model: variables.OPENAI_MODEL ?? DEFAULT_BACKEND_CONFIG.OPENAI_MODEL,
        maxTokens: variables.OPENAI_MAX_TOKENS ?? DEFAULT_BACKEND_CONFIG.OPENAI_MAX_TOKENS,
        temperature: variables.OPENAI_TEMPERATURE ?? DEFAULT_BACKEND_CONFIG.OPENAI_TEMPERATURE,
      },
      ollama: {
        baseUrl: variables.OLLAMA_BASE_URL ?? DEFAULT_BACKEND_CONFIG.OLLAMA_BASE_URL,
        model: variables.OLLAMA_MODEL ?? DEFAULT_BACKEND_CONFIG.OLLAMA_MODEL,
        temperature: DEFAULT_BACKEND_CONFIG.OLLAMA_TEMPERATURE,
      },
      mock: { mode: mockMode },
    },
    orchestration: {
      ...DEFAULT_ORCHESTRATION_CONFIG,
      ...(variables.RATE_LIMIT_BACKOFF_MS !== undefined && { rateLimitBackoffMs: variables.RATE_LIMIT_BACKOFF_MS }),
    },
    queue: {
      capacity: variables.ANALYSIS_QUEUE_CAPACITY ?? DEFAULT_QUEUE_CONFIG.capacity,
      shutdownGraceMs: variables.ANALYSIS_SHUTDOWN_GRACE_MS ?? DEFAULT_QUEUE_CONFIG.shutdownGraceMs,
    },
  };
}

function parseBackendList(raw: string, violations: string[]): BackendName[] {
  const names: BackendName[] = [];
  for (const entry of raw.split(',').map((name) => name.trim()).filter(Boolean)) {
    if (!isBackendName(entry)) {
      violations.push(`AVAILABLE_BACKENDS contains unknown backend '${entry}'`);
    } else if (!names.includes(entry)) {
      names.push(entry);
    }
  }
  if (names.length === 0 && violations.length === 0) {
    violations.push('AVAILABLE_BACKENDS must name at least one backend');
  }
  return names;
}

function resolveBackend(variable: string, value: string, violations: string[]): BackendName | undefined {
  if (isBackendName(value)) {
    return value;
  }
  violations.push(`${variable} '${value}' is not a known backend`);
  return undefined;
}

function resolveMockMode(value: string, violations: string[]): MockMode | undefined {
  const mode = MOCK_MODES.find((candidate) => candidate === value);
  if (!mode) {
    violations.push(`MOCK_MODE '${value}' is not supported`);
  }
  return mode;
}

function flattenValidationErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenValidationErrors(error.children ?? []),
  ]);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
