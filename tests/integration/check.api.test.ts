import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../../src/app';
import { WritingAnalyzer } from '../../src/services/analysis/writing-analyzer.service';
import { AppError } from '../../src/utils/app-error';
import { ErrorCodes } from '../../src/utils/error-codes';
import { FakeGrammarCapability } from '../helpers/fake-grammar';
import type { GrammarMatch } from '../../src/services/grammar/grammar-capability';

vi.mock('../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

function buildApp(respond?: (text: string) => GrammarMatch[] | Promise<GrammarMatch[]>) {
  const grammar = new FakeGrammarCapability(respond);
  return createApp({ analyzer: new WritingAnalyzer({ grammar }) });
}

describe('Check API', () => {
  describe('GET /health', () => {
    it('should report service status', async () => {
      const response = await request(buildApp()).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
      expect(typeof response.body.version).toBe('string');
      expect(typeof response.body.environment).toBe('string');
      expect(Number.isNaN(Date.parse(response.body.timestamp))).toBe(false);
    });

    it('should answer on the root path as well', async () => {
      const response = await request(buildApp()).get('/');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
    });
  });

  describe('POST /api/check', () => {
    it('should return the analysis in snake_case', async () => {
      const response = await request(buildApp())
        .post('/api/check')
        .send({ text: "She don't like apples." });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data.original_text).toBe("She don't like apples.");
      expect(response.body.data.corrected_text).toBeNull();
      expect(response.body.data.grammar_issues).toEqual([
        {
          message: 'The verb form does not agree with the subject.',
          rule_id: 'HE_VERB_AGR',
          category: 'GRAMMAR',
          offset: 4,
          length: 5,
          context: "She don't like apples.",
          suggestions: ["doesn't", 'does not', 'did not'],
          severity: 'error',
        },
      ]);
      expect(Object.keys(response.body.data.readability).sort()).toEqual([
        'automated_readability_index',
        'coleman_liau_index',
        'difficult_words',
        'flesch_kincaid_grade',
        'flesch_reading_ease',
        'gunning_fog',
        'reading_time_minutes',
        'smog_index',
      ]);
    });

    it('should include the corrected text when auto_correct is set', async () => {
      const response = await request(buildApp())
        .post('/api/check')
        .send({ text: "She don't like apples.", auto_correct: true });

      expect(response.status).toBe(200);
      expect(response.body.data.corrected_text).toBe("She doesn't like apples.");
    });

    it('should report text statistics and a bounded score', async () => {
      const text = 'First sentence. Second sentence. Third sentence.';
      const response = await request(buildApp()).post('/api/check').send({ text });

      expect(response.status).toBe(200);
      expect(response.body.data.word_count).toBe(6);
      expect(response.body.data.sentence_count).toBe(3);
      expect(response.body.data.character_count).toBe(48);
      expect(response.body.data.score).toBeGreaterThanOrEqual(0);
      expect(response.body.data.score).toBeLessThanOrEqual(100);
    });

    it('should return style suggestions', async () => {
      const response = await request(buildApp())
        .post('/api/check')
        .send({ text: 'The report was written in order to explain the the results.' });

      expect(response.status).toBe(200);
      expect(response.body.data.style_suggestions.map((s: { category: string }) => s.category)).toEqual([
        'passive_voice',
        'wordiness',
        'repetition',
      ]);
    });

    it.each([
      ['empty', { text: '' }, 'Text cannot be empty'],
      ['whitespace-only', { text: '   \n' }, 'Text cannot be empty'],
      ['missing', {}, 'Text is required'],
      ['non-string', { text: 42 }, 'Text must be a string'],
    ])('should reject %s text with 400', async (_label, body, message) => {
      const response = await request(buildApp()).post('/api/check').send(body);

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        success: false,
        error: { code: ErrorCodes.VALIDATION_ERROR, message },
      });
    });

    it('should reject text over the length limit', async () => {
      const response = await request(buildApp())
        .post('/api/check')
        .send({ text: 'a'.repeat(50001) });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Text cannot exceed 50000 characters');
    });

    it('should reject a non-boolean auto_correct', async () => {
      const response = await request(buildApp())
        .post('/api/check')
        .send({ text: 'Hello.', auto_correct: 'yes' });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual([
        expect.objectContaining({ field: 'auto_correct' }),
      ]);
    });

    it('should reject malformed JSON', async () => {
      const response = await request(buildApp())
        .post('/api/check')
        .set('Content-Type', 'application/json')
        .send('{"text":');

      expect(response.status).toBe(400);
      expect(response.body.error).toEqual({
        message: 'Malformed JSON body',
        code: ErrorCodes.VALIDATION_ERROR,
      });
    });

    it('should answer 503 when the grammar service is unreachable', async () => {
      const app = buildApp(() => {
        throw AppError.serviceUnavailable('Grammar service is unreachable: connect ECONNREFUSED');
      });

      const response = await request(app).post('/api/check').send({ text: 'Hello.' });

      expect(response.status).toBe(503);
      expect(response.body.error).toEqual({
        message: 'Grammar service is unreachable: connect ECONNREFUSED',
        code: ErrorCodes.GRAMMAR_SERVICE_UNAVAILABLE,
      });
    });

    it('should answer 502 when the grammar service fails', async () => {
      const app = buildApp(() => Promise.reject(new Error('unexpected token')));

      const response = await request(app).post('/api/check').send({ text: 'Hello.' });

      expect(response.status).toBe(502);
      expect(response.body.error.code).toBe(ErrorCodes.GRAMMAR_SERVICE_ERROR);
      expect(response.body.error.message).toBe('Grammar check failed: unexpected token');
    });
  });

  describe('POST /api/correct', () => {
    it('should return the original and corrected text', async () => {
      const response = await request(buildApp())
        .post('/api/correct')
        .send({ text: "He don't know." });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: {
          original_text: "He don't know.",
          corrected_text: "He doesn't know.",
        },
      });
    });

    it('should validate the body', async () => {
      const response = await request(buildApp()).post('/api/correct').send({ text: ' ' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCodes.VALIDATION_ERROR);
    });
  });

  describe('Unknown routes', () => {
    it('should answer 404', async () => {
      const response = await request(buildApp()).get('/api/unknown');

      expect(response.status).toBe(404);
      expect(response.body.error).toEqual({
        message: 'Route GET /api/unknown not found',
        code: ErrorCodes.NOT_FOUND,
      });
    });
  });
});
