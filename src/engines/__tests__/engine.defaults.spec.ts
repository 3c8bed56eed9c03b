/**
 * Engine Defaults and Factory Tests
 */
import {
  DEFAULT_ENGINE_TIMEOUT_MS,
  DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
  GeminiEngine,
  OllamaEngine,
  createEngines,
  getEngineConfig,
  loadEngineConfigs,
} from '../index';

describe('Engine Defaults', () => {
  describe('loadEngineConfigs()', () => {
    it('should use built-in defaults for an empty environment', () => {
      expect(loadEngineConfigs({})).toEqual({
        local: {
          id: 'local',
          name: 'Ollama',
          model: 'llama3.1:8b',
          baseUrl: 'http://localhost:11434',
          timeoutMs: DEFAULT_ENGINE_TIMEOUT_MS,
          healthCheckTimeoutMs: DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
        },
        cloud: {
          id: 'cloud',
          name: 'Gemini',
          model: 'gemini-2.0-flash',
          baseUrl: undefined,
          apiKey: undefined,
          timeoutMs: DEFAULT_ENGINE_TIMEOUT_MS,
          healthCheckTimeoutMs: DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
        },
      });
    });

    it('should read models, URLs, keys and timeouts from the environment', () => {
      const configs = loadEngineConfigs({
        OLLAMA_BASE_URL: 'http://gpu-box:11434',
        OLLAMA_MODEL: 'qwen2.5:14b',
        OLLAMA_TIMEOUT_MS: '60000',
        GEMINI_API_KEY: 'test-key',
        GEMINI_MODEL: 'gemini-1.5-pro',
        GEMINI_TIMEOUT_MS: '15000',
        ENGINE_HEALTH_TIMEOUT_MS: '2000',
      });

      expect(configs.local).toMatchObject({
        baseUrl: 'http://gpu-box:11434',
        model: 'qwen2.5:14b',
        timeoutMs: 60000,
        healthCheckTimeoutMs: 2000,
      });
      expect(configs.cloud).toMatchObject({
        apiKey: 'test-key',
        model: 'gemini-1.5-pro',
        timeoutMs: 15000,
        healthCheckTimeoutMs: 2000,
      });
    });

    it('should ignore timeouts that are not positive integers', () => {
      const configs = loadEngineConfigs({ OLLAMA_TIMEOUT_MS: 'soon', GEMINI_TIMEOUT_MS: '-5' });

      expect(configs.local.timeoutMs).toBe(DEFAULT_ENGINE_TIMEOUT_MS);
      expect(configs.cloud.timeoutMs).toBe(DEFAULT_ENGINE_TIMEOUT_MS);
    });
  });

  describe('getEngineConfig()', () => {
    it('should apply overrides but keep the engine id', () => {
      const config = getEngineConfig('cloud', { id: 'local', model: 'gemini-1.5-flash' }, {});

      expect(config.id).toBe('cloud');
      expect(config.model).toBe('gemini-1.5-flash');
      expect(config.name).toBe('Gemini');
    });
  });

  describe('createEngines()', () => {
    it('should create the local and cloud adapters in order', () => {
      const [local, cloud] = createEngines({ env: {} });

      expect(local).toBeInstanceOf(OllamaEngine);
      expect(cloud).toBeInstanceOf(GeminiEngine);
      expect(local.id).toBe('local');
      expect(cloud.id).toBe('cloud');
    });

    it('should apply per-engine overrides', () => {
      const [local, cloud] = createEngines({
        env: {},
        local: { model: 'phi3:mini' },
        cloud: { timeoutMs: 5000 },
      });

      expect(local.config.model).toBe('phi3:mini');
      expect(cloud.config.timeoutMs).toBe(5000);
    });
  });
});
