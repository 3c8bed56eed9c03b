/**
 * BaseEngine Tests
 *
 * Tests for the shared invoke pipeline, timeout handling, error mapping and
 * health probing, exercised through an in-process engine.
 */

import {
  EngineError,
  EngineResponseInvalidError,
  EngineUnavailableError,
} from '../interfaces';
import {
  FakeEngine,
  QUESTION_JSON,
  QUESTION_TEXT,
  hangUntilAborted,
  sampleContext,
} from '../../__tests__/helpers/fake-engine';

const payload = { context: sampleContext };

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('BaseEngine', () => {
  let engine: FakeEngine;

  beforeEach(() => {
    engine = new FakeEngine('local');
  });

  describe('invoke()', () => {
    it('should pass the operation prompt to the backend', async () => {
      engine.generate.mockResolvedValue(QUESTION_JSON);

      await engine.invoke('first_question', payload);

      expect(engine.generate).toHaveBeenCalledWith(
        expect.objectContaining({ temperature: 0.3, maxTokens: 500, expects: 'object' }),
        expect.any(AbortSignal),
      );
      const [prompt] = engine.generate.mock.calls[0];
      expect(prompt.prompt).toContain('Backend Engineer');
    });

    it('should parse JSON wrapped in a Markdown fence', async () => {
      engine.generate.mockResolvedValue(
        'Here you go:\n```json\n{"text": "How do you design an idempotent API?", "type": "technical", "difficulty": "hard"}\n```',
      );

      const question = await engine.invoke('first_question', payload);

      expect(question).toEqual({
        id: 'q1',
        text: 'How do you design an idempotent API?',
        type: 'technical',
        expectedKeywords: [],
        difficulty: 'hard',
      });
    });

    it('should number adaptive questions by their position', async () => {
      engine.generate.mockResolvedValue(JSON.stringify({ id: 'q99', text: QUESTION_TEXT }));

      const question = await engine.invoke('next_question', {
        context: sampleContext,
        history: [],
        questionNumber: 4,
      });

      expect(question.id).toBe('q4');
    });

    it('should report schema mismatches as EngineResponseInvalidError', async () => {
      engine.generate.mockResolvedValue('{"type": "technical"}');

      const error = await captureError(engine.invoke('first_question', payload));

      expect(error).toBeInstanceOf(EngineResponseInvalidError);
      if (!(error instanceof EngineResponseInvalidError)) return;
      expect(error.message).toBe('Ollama returned an invalid first_question response: text: Required');
      expect(error.rawExcerpt).toBe('{"type": "technical"}');
      expect(error.engine).toBe('local');
    });

    it('should treat an empty response as invalid', async () => {
      engine.generate.mockResolvedValue('   ');

      await expect(engine.invoke('first_question', payload)).rejects.toThrow(
        'Ollama returned an invalid first_question response: Engine returned an empty response',
      );
    });

    it('should time out a backend that does not answer', async () => {
      engine = new FakeEngine('local', { timeoutMs: 20 });
      engine.generate.mockImplementation(hangUntilAborted);

      const error = await captureError(engine.invoke('first_question', payload));

      expect(error).toBeInstanceOf(EngineUnavailableError);
      if (!(error instanceof EngineUnavailableError)) return;
      expect(error.reason).toBe('timeout');
      expect(error.message).toBe('Ollama request timed out after 20ms');
    });

    it('should time out even when the backend ignores the abort signal', async () => {
      engine = new FakeEngine('cloud', { timeoutMs: 20 });
      engine.generate.mockImplementation(() => new Promise<string>(() => undefined));

      await expect(engine.invoke('first_question', payload)).rejects.toThrow(
        'Gemini request timed out after 20ms',
      );
    });

    it('should abort the backend call when the caller cancels', async () => {
      const controller = new AbortController();
      engine.generate.mockImplementation(hangUntilAborted);

      const pending = engine.invoke('first_question', payload, { signal: controller.signal });
      controller.abort();
      const error = await captureError(pending);

      expect(error).toBeInstanceOf(EngineUnavailableError);
      if (!(error instanceof EngineUnavailableError)) return;
      expect(error.reason).toBe('cancelled');
      const [, signal] = engine.generate.mock.calls[0];
      expect(signal.aborted).toBe(true);
    });

    it('should not call the backend when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        engine.invoke('first_question', payload, { signal: controller.signal }),
      ).rejects.toThrow('Request cancelled by caller');
      expect(engine.generate).not.toHaveBeenCalled();
    });
  });

  describe('mapError()', () => {
    it('should pass engine errors through unchanged', () => {
      const original = new EngineUnavailableError('down', 'local', 'server_error');
      expect(engine.mapError(original)).toBe(original);
    });

    it.each([
      [401, 'authentication_error'],
      [403, 'authentication_error'],
      [408, 'timeout'],
      [429, 'rate_limited'],
      [500, 'server_error'],
      [503, 'server_error'],
      [404, 'request_rejected'],
    ])('should classify HTTP %i as %s', (status, reason) => {
      const mapped = engine.mapError(Object.assign(new Error(`HTTP ${status}`), { status }));

      expect(mapped).toBeInstanceOf(EngineUnavailableError);
      if (!(mapped instanceof EngineUnavailableError)) return;
      expect(mapped.reason).toBe(reason);
      expect(mapped.statusCode).toBe(status);
    });

    it('should classify network failures as connection errors', () => {
      const mapped = engine.mapError(new Error('fetch failed', { cause: { code: 'ECONNREFUSED' } }));

      expect(mapped).toBeInstanceOf(EngineUnavailableError);
      if (!(mapped instanceof EngineUnavailableError)) return;
      expect(mapped.reason).toBe('connection_error');
    });

    it('should fall back to unknown', () => {
      const mapped = engine.mapError('boom');

      expect(mapped).toBeInstanceOf(EngineError);
      if (!(mapped instanceof EngineUnavailableError)) return;
      expect(mapped.reason).toBe('unknown');
      expect(mapped.message).toBe('boom');
    });
  });

  describe('healthCheck()', () => {
    it('should report a successful health check as available', async () => {
      const health = await engine.healthCheck();

      expect(health.engine).toBe('local');
      expect(health.available).toBe(true);
      expect(health.lastError).toBeNull();
      expect(health.lastCheckedAt).toBeInstanceOf(Date);
      expect(typeof health.latencyMs).toBe('number');
    });

    it('should report a failed health check without rejecting', async () => {
      engine.healthPing.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));

      const health = await engine.healthCheck();

      expect(health.available).toBe(false);
      expect(health.lastError).toBe('connect ECONNREFUSED 127.0.0.1:11434');
    });

    it('should bound the check by the health check timeout', async () => {
      engine = new FakeEngine('local', { healthCheckTimeoutMs: 20 });
      engine.healthPing.mockImplementation(() => new Promise<void>(() => undefined));

      const health = await engine.healthCheck();

      expect(health.available).toBe(false);
      expect(health.lastError).toBe('Ollama request timed out after 20ms');
    });
  });

  describe('describeModel()', () => {
    it('should include the base URL only when configured', () => {
      expect(engine.describeModel()).toEqual({ engine: 'local', name: 'Ollama', model: 'local-model' });

      const remote = new FakeEngine('local', { baseUrl: 'http://gpu-box:11434' });
      expect(remote.describeModel()).toEqual({
        engine: 'local',
        name: 'Ollama',
        model: 'local-model',
        baseUrl: 'http://gpu-box:11434',
      });
    });
  });
});
