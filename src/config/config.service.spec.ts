import { Logger } from '@nestjs/common';
import { ConfigValidationError } from '../common/errors';
import { VaultService } from '../vault/vault.service';
import { buildConfig, ConfigService, loadSecretsFromVault, validateEnvironment } from './config.service';

function captureViolations(run: () => unknown): readonly string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error.violations;
    }
    throw error;
  }
  throw new Error('Expected a ConfigValidationError');
}

describe('ConfigService', () => {
  const logger = new Logger('ConfigServiceSpec');

  describe('buildConfig', () => {
    it('applies defaults when nothing is set', () => {
      const config = buildConfig(validateEnvironment({}));

      expect(config.backends.availableBackends).toEqual(['openai', 'ollama']);
      expect(config.backends.primary).toBe('openai');
      expect(config.backends.secondary).toBe('ollama');
      expect(config.backends.strategy).toBe('sequential');
      expect(config.backends.timeoutSeconds).toEqual({ openai: 30, ollama: 120, mock: 5 });
      expect(config.backends.openai.apiKey).toBe('');
      expect(config.backends.ollama.baseUrl).toBe('http://localhost:11434');
      expect(config.backends.mock.mode).toBe('success');
      expect(config.orchestration).toEqual({ rateLimitBackoffMs: 5000, deadlineGraceMs: 200 });
      expect(config.queue).toEqual({ capacity: 100, shutdownGraceMs: 10000 });
    });

    it('parses numeric variables', () => {
      const config = buildConfig(
        validateEnvironment({
          BACKEND_TIMEOUT_OLLAMA: '45',
          RATE_LIMIT_BACKOFF_MS: '250',
          ANALYSIS_QUEUE_CAPACITY: '3',
          OPENAI_TEMPERATURE: '0.3',
        }),
      );

      expect(config.backends.timeoutSeconds.ollama).toBe(45);
      expect(config.orchestration.rateLimitBackoffMs).toBe(250);
      expect(config.queue.capacity).toBe(3);
      expect(config.backends.openai.temperature).toBe(0.3);
    });

    it('treats an empty SECONDARY_BACKEND as no fallback', () => {
      const config = buildConfig(validateEnvironment({ SECONDARY_BACKEND: '' }));

      expect(config.backends.secondary).toBeUndefined();
    });

    it('de-duplicates the available backend list in order', () => {
      const config = buildConfig(
        validateEnvironment({ AVAILABLE_BACKENDS: 'mock, ollama,mock', PRIMARY_BACKEND: 'mock' }),
      );

      expect(config.backends.availableBackends).toEqual(['mock', 'ollama']);
    });

    it('rejects a primary backend outside the available set', () => {
      const violations = captureViolations(() =>
        buildConfig(validateEnvironment({ AVAILABLE_BACKENDS: 'ollama', PRIMARY_BACKEND: 'openai' })),
      );

      expect(violations).toEqual(["PRIMARY_BACKEND 'openai' is not listed in AVAILABLE_BACKENDS"]);
    });

    it('reports every violation at once', () => {
      const violations = captureViolations(() =>
        buildConfig(validateEnvironment({ AVAILABLE_BACKENDS: 'mock,claude' })),
      );

      expect(violations).toEqual([
        "AVAILABLE_BACKENDS contains unknown backend 'claude'",
        "PRIMARY_BACKEND 'openai' is not listed in AVAILABLE_BACKENDS",
        "SECONDARY_BACKEND 'ollama' is not listed in AVAILABLE_BACKENDS",
      ]);
    });

    it('prefers the Vault API key over the environment', () => {
      const config = buildConfig(validateEnvironment({ OPENAI_API_KEY: 'env-secret' }), {
        openaiApiKey: 'test-secret',
      });

      expect(config.backends.openai.apiKey).toBe('test-secret');
    });
  });

  describe('validateEnvironment', () => {
    it('rejects an unknown primary backend', () => {
      expect(() => validateEnvironment({ PRIMARY_BACKEND: 'claude' })).toThrow(ConfigValidationError);
    });

    it('rejects non-numeric timeouts', () => {
      expect(() => validateEnvironment({ BACKEND_TIMEOUT_OPENAI: 'soon' })).toThrow(ConfigValidationError);
    });

    it('rejects an unsupported selection strategy', () => {
      expect(() => validateEnvironment({ BACKEND_SELECTION_STRATEGY: 'parallel' })).toThrow(ConfigValidationError);
    });
  });

  describe('loadSecretsFromVault', () => {
    let vault: VaultService;

    beforeEach(() => {
      vault = new VaultService();
    });

    it('returns nothing when Vault is not configured', async () => {
      jest.spyOn(vault, 'isConfigured', 'get').mockReturnValue(false);

      await expect(loadSecretsFromVault(vault, logger)).resolves.toEqual({});
    });

    it('reads the OpenAI key from the global secret', async () => {
      jest.spyOn(vault, 'isConfigured', 'get').mockReturnValue(true);
      jest.spyOn(vault, 'isHealthy').mockResolvedValue(true);
      const readSecret = jest.spyOn(vault, 'readSecret').mockResolvedValue({ openai_api_key: 'test-secret' });

      await expect(loadSecretsFromVault(vault, logger)).resolves.toEqual({ openaiApiKey: 'test-secret' });
      expect(readSecret).toHaveBeenCalledWith('global');
    });

    it('falls back to the environment when Vault fails', async () => {
      jest.spyOn(vault, 'isConfigured', 'get').mockReturnValue(true);
      jest.spyOn(vault, 'isHealthy').mockResolvedValue(true);
      jest.spyOn(vault, 'readSecret').mockRejectedValue(new Error('permission denied'));

      await expect(loadSecretsFromVault(vault, logger)).resolves.toEqual({});
    });
  });

  describe('load', () => {
    it('builds a deeply frozen configuration', async () => {
      const vault = new VaultService();
      jest.spyOn(vault, 'isConfigured', 'get').mockReturnValue(false);

      const config = await ConfigService.load({ OPENAI_API_KEY: 'test-secret', MOCK_MODE: 'unavailable' }, vault);

      expect(config.backends.openai.apiKey).toBe('test-secret');
      expect(config.backends.mock.mode).toBe('unavailable');
      expect(Object.isFrozen(config.backends)).toBe(true);
      expect(Object.isFrozen(config.backends.timeoutSeconds)).toBe(true);
      expect(Object.isFrozen(config.backends.availableBackends)).toBe(true);
      expect(Object.isFrozen(config.queue)).toBe(true);
    });
  });
});
