/**
 * HTTP API Tests
 *
 * Exercises the Express app end to end over in-process fake engines.
 */
import request from 'supertest';
import { Express } from 'express';
import { createLogger } from 'winston';
import { createApp } from '../app';
import { createEngineRouter, EngineRouter } from '../../router';
import {
  FakeEngine,
  QUESTION_JSON,
  QUESTION_TEXT,
  sampleContext,
} from '../../__tests__/helpers/fake-engine';
import {
  EMPTY_REPORT,
  fallbackFirstQuestion,
  shortAnswerEvaluation,
} from '../static-fallbacks';

describe('HTTP API', () => {
  let local: FakeEngine;
  let cloud: FakeEngine;
  let router: EngineRouter;
  let app: Express;

  beforeEach(() => {
    jest.clearAllMocks();
    local = new FakeEngine('local');
    cloud = new FakeEngine('cloud');
    router = createEngineRouter([local, cloud], { preferredEngine: 'local', fallbackEnabled: true });
    app = createApp({ router, logger: createLogger({ silent: true }) });
  });

  describe('envelope', () => {
    it('should echo an incoming x-request-id', async () => {
      const res = await request(app).get('/ai-engine/status').set('x-request-id', 'req-123');

      expect(res.headers['x-request-id']).toBe('req-123');
      expect(res.body.requestId).toBe('req-123');
    });

    it('should generate a request id when none is sent', async () => {
      const res = await request(app).get('/ai-engine/status');

      expect(res.body.requestId).toMatch(/^[0-9a-f-]{36}$/);
      expect(res.headers['x-request-id']).toBe(res.body.requestId);
    });

    it('should answer unknown routes with 404', async () => {
      const res = await request(app).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body.success).toBe(false);
      expect(res.body.message).toBe('Route not found: GET /nope');
    });

    it('should reject malformed JSON', async () => {
      const res = await request(app)
        .post('/ai-engine/select')
        .set('Content-Type', 'application/json')
        .send('{"engine":');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Malformed JSON body');
    });

    it('should report validation issues by path', async () => {
      const res = await request(app).post('/interview/first-question').send({});

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Invalid request body');
      expect(res.body.data.issues).toEqual([{ path: 'context', message: 'Required' }]);
    });
  });

  describe('engine administration', () => {
    it('GET /ai-engine/status should return preferences and statistics', async () => {
      const res = await request(app).get('/ai-engine/status');

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('AI engine status retrieved');
      expect(res.body.data).toMatchObject({
        preferences: { preferredEngine: 'local', fallbackEnabled: true },
        defaults: { preferredEngine: 'local', fallbackEnabled: true },
        statistics: { requestsByEngine: { local: 0, cloud: 0 }, fallbackCount: 0, lastEngineUsed: null },
        availableEngines: ['local', 'cloud'],
        currentEngine: 'local',
        fallbackCount: 0,
      });
    });

    it('GET /ai-engine/health should check engines and recommend actions', async () => {
      local.healthPing.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));

      const res = await request(app).get('/ai-engine/health');

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Health check completed - status: healthy');
      expect(res.body.data.health.local).toMatchObject({
        available: false,
        lastError: 'connect ECONNREFUSED 127.0.0.1:11434',
      });
      expect(res.body.data.health.cloud.available).toBe(true);
      expect(res.body.data.recommendations).toEqual([
        'Ollama not available. Install Ollama and pull the configured model for local processing.',
        "Preferred engine 'local' is not available. Consider switching preference.",
      ]);
    });

    it('GET /ai-engine/health should be unhealthy when no engine answers', async () => {
      local.healthPing.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));
      cloud.healthPing.mockRejectedValue(new Error('Gemini API key not configured'));

      const res = await request(app).get('/ai-engine/health');

      expect(res.body.data.overallStatus).toBe('unhealthy');
      expect(res.body.data.recommendations[0]).toBe(
        'CRITICAL: No AI engines available. Check the Ollama installation and the Gemini API key.',
      );
    });

    it('POST /ai-engine/select should change the preferred engine', async () => {
      const res = await request(app).post('/ai-engine/select').send({ engine: 'cloud' });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe("Preferred engine set to 'cloud'");
      expect(res.body.data.preferences).toEqual({ preferredEngine: 'cloud', fallbackEnabled: true });
      expect(router.getStatus().preferences.preferredEngine).toBe('cloud');
    });

    it('POST /ai-engine/select should reject unknown engines without changing state', async () => {
      const res = await request(app).post('/ai-engine/select').send({ engine: 'gpu' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Invalid engine 'gpu'. Must be 'local' or 'cloud'");
      expect(router.getStatus().preferences.preferredEngine).toBe('local');
    });

    it('POST /ai-engine/fallback should toggle fallback', async () => {
      const res = await request(app).post('/ai-engine/fallback').send({ enabled: false });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Fallback disabled');
      expect(res.body.data.preferences.fallbackEnabled).toBe(false);
    });

    it('POST /ai-engine/fallback should require a boolean', async () => {
      const res = await request(app).post('/ai-engine/fallback').send({ enabled: 'no' });

      expect(res.status).toBe(400);
      expect(res.body.data.issues[0].path).toBe('enabled');
      expect(router.getStatus().preferences.fallbackEnabled).toBe(true);
    });

    it('POST /ai-engine/reset should restore the start-up preferences', async () => {
      router.forceSelect('cloud');
      router.setFallbackEnabled(false);

      const res = await request(app).post('/ai-engine/reset');

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Engine preferences reset to defaults');
      expect(res.body.data.preferences).toEqual({ preferredEngine: 'local', fallbackEnabled: true });
      expect(res.body.data.currentEngine).toBe('local');
    });

    it('GET /ai-engine/models should list each engine model', async () => {
      const res = await request(app).get('/ai-engine/models');

      expect(res.body.data.models).toEqual([
        { engine: 'local', name: 'Ollama', model: 'local-model', available: true },
        { engine: 'cloud', name: 'Gemini', model: 'cloud-model', available: true },
      ]);
    });
  });

  describe('routed operations', () => {
    it('should serve the preferred engine result', async () => {
      local.generate.mockResolvedValue(QUESTION_JSON);

      const res = await request(app).post('/interview/first-question').send({ context: sampleContext });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('First question generated');
      expect(res.body.data.result.text).toBe(QUESTION_TEXT);
      expect(res.body.data.result.id).toBe('q1');
      expect(res.body.data).toMatchObject({ engine: 'local', fellBack: false, degraded: false });
      expect(cloud.generate).not.toHaveBeenCalled();
    });

    it('should fall back to the cloud engine and count it', async () => {
      local.generate.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));
      cloud.generate.mockResolvedValue(QUESTION_JSON);

      const res = await request(app).post('/interview/first-question').send({ context: sampleContext });

      expect(res.body.data).toMatchObject({ engine: 'cloud', fellBack: true, degraded: false });
      expect(router.getStatus().statistics.fallbackCount).toBe(1);
    });

    it('should serve the static default when every engine fails', async () => {
      local.generate.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));
      cloud.generate.mockResolvedValue('I am unable to help with that.');

      const res = await request(app).post('/interview/first-question').send({ context: sampleContext });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({
        result: fallbackFirstQuestion(sampleContext),
        engine: null,
        fellBack: false,
        degraded: true,
      });
    });

    it('should number adaptive questions from the request', async () => {
      local.generate.mockResolvedValue(QUESTION_JSON);

      const res = await request(app)
        .post('/interview/next-question')
        .send({ context: sampleContext, questionNumber: 3 });

      expect(res.body.message).toBe('Question 3 generated');
      expect(res.body.data.result.id).toBe('q3');
    });

    it('should score short answers without calling an engine', async () => {
      const res = await request(app)
        .post('/interview/evaluate')
        .send({ questionText: 'Why Postgres?', answer: 'dunno', context: sampleContext });

      expect(res.body.data).toEqual({
        result: shortAnswerEvaluation(sampleContext),
        engine: null,
        fellBack: false,
        degraded: false,
      });
      expect(local.generate).not.toHaveBeenCalled();
      expect(cloud.generate).not.toHaveBeenCalled();
    });

    it('should evaluate full answers on an engine', async () => {
      local.generate.mockResolvedValue(
        '{"technical": 82, "communication": 75, "confidence": 70, "relevance": 88, "short_notes": "Good depth"}',
      );

      const res = await request(app).post('/interview/evaluate').send({
        questionText: 'Why Postgres?',
        answer: 'We needed transactional guarantees and rich indexing for reporting queries.',
        context: sampleContext,
      });

      expect(res.body.data.engine).toBe('local');
      expect(res.body.data.result).toMatchObject({ technical: 82, communication: 75, confidence: 70, relevance: 88 });
    });

    it('should return the empty report when there are no evaluations', async () => {
      const res = await request(app).post('/interview/report').send({ context: sampleContext });

      expect(res.body.message).toBe('Final report generated');
      expect(res.body.data.result).toEqual(EMPTY_REPORT);
      expect(local.generate).not.toHaveBeenCalled();
    });

    it('should analyze job fit with the title in the message', async () => {
      local.generate.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));
      cloud.generate.mockRejectedValue(Object.assign(new Error('Service Unavailable'), { status: 503 }));

      const res = await request(app).post('/job-fit/analyze').send({
        candidate: { skills: ['TypeScript'], experienceYears: 2 },
        job: { title: 'Backend Engineer', requiredSkills: ['TypeScript', 'Go'], requiredExperienceYears: 4 },
      });

      expect(res.body.message).toBe("Job fit analyzed for 'Backend Engineer'");
      expect(res.body.data.degraded).toBe(true);
      expect(res.body.data.result).toMatchObject({
        overallFitScore: 50,
        matchedSkills: ['TypeScript'],
        missingRequiredSkills: ['Go'],
      });
    });

    it('should rank the sample roles by fit when no engine answers', async () => {
      local.generate.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));
      cloud.generate.mockRejectedValue(new Error('Gemini API key not configured'));

      const res = await request(app).post('/job-fit/role-matching').send({
        candidate: { skills: ['JavaScript', 'React', 'HTML', 'CSS', 'Node.js'], experienceYears: 3 },
      });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Ranked 4 roles');
      const matches = res.body.data.matches;
      expect(matches.map((m: { role: { title: string }; fitScore: number }) => [m.role.title, m.fitScore])).toEqual([
        ['Frontend Developer', 100],
        ['Full Stack Developer', 88],
        ['Backend Developer', 50],
        ['DevOps Engineer', 38],
      ]);
      expect(matches[3]).toMatchObject({
        skillMatch: 0,
        experienceMatch: 75,
        suitability: 'Poor fit for this role',
        missingSkills: ['AWS', 'Docker', 'Kubernetes'],
        recommendations: ['Build experience with AWS, Docker, Kubernetes, CI/CD'],
        engine: null,
        degraded: true,
      });
    });

    it('should rank requested roles by the engine fit score', async () => {
      const fit = (score: number): string => JSON.stringify({
        overall_fit_score: score,
        skill_match_percentage: score,
        experience_match_percentage: score,
        missing_required_skills: ['Kafka', 'Spark', 'Airflow', 'dbt'],
        recommendations: ['Learn streaming', 'Ship a pipeline', 'Read DDIA'],
      });
      local.generate.mockResolvedValueOnce(fit(40)).mockResolvedValueOnce(fit(90));

      const res = await request(app).post('/job-fit/role-matching').send({
        candidate: { skills: ['Python'], experienceYears: 2 },
        roles: [
          { title: 'Site Reliability Engineer', requiredSkills: ['Go'] },
          { title: 'Data Engineer', requiredSkills: ['Spark'] },
        ],
      });

      expect(res.body.data.matches.map((m: { role: { title: string } }) => m.role.title))
        .toEqual(['Data Engineer', 'Site Reliability Engineer']);
      expect(res.body.data.matches[0]).toMatchObject({
        fitScore: 90,
        missingSkills: ['Kafka', 'Spark', 'Airflow'],
        recommendations: ['Learn streaming', 'Ship a pipeline'],
        engine: 'local',
        degraded: false,
      });
    });

    it('should generate aptitude questions with defaults', async () => {
      local.generate.mockResolvedValue(
        '[{"question": "2, 4, 8, ?", "options": ["A) 12", "B) 16"], "correct_answer": "B) 16", "type": "pattern"}]',
      );

      const res = await request(app).post('/aptitude/generate').send({});

      expect(res.body.message).toBe('Generated 1 of 10 requested aptitude questions');
      expect(res.body.data.requested).toBe(10);
      expect(res.body.data.result[0]).toMatchObject({ id: 'apt_1', correctAnswer: 'B) 16', difficulty: 'medium' });
    });

    it('should score aptitude answers deterministically', async () => {
      const res = await request(app).post('/aptitude/evaluate').send({
        question: { id: 'apt_3', correctAnswer: 'C) 12' },
        answer: 'c) 12',
      });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Correct answer');
      expect(res.body.data).toEqual({
        questionId: 'apt_3',
        correct: true,
        score: 100,
        userAnswer: 'c) 12',
        correctAnswer: 'C) 12',
        explanation: '',
      });
    });

    it('should score a batch of aptitude answers', async () => {
      const res = await request(app).post('/aptitude/batch-evaluate').send({
        submissions: [
          { question: { id: 'apt_1', correctAnswer: 'A) 4 days' }, answer: 'A) 4 days' },
          { question: { id: 'apt_2', correctAnswer: 'B) 48' }, answer: 'A) 36' },
          { question: { id: 'apt_3', correctAnswer: 'C) 12' }, answer: 'C) 12' },
        ],
      });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Evaluated 3 aptitude answers');
      expect(res.body.data).toMatchObject({ total: 3, correct: 2, score: 67 });
      expect(res.body.data.results.map((r: { correct: boolean }) => r.correct)).toEqual([true, false, true]);
    });

    it('should require at least one aptitude submission', async () => {
      const res = await request(app).post('/aptitude/batch-evaluate').send({ submissions: [] });

      expect(res.status).toBe(400);
      expect(res.body.data.issues[0].path).toBe('submissions');
    });
  });
});
