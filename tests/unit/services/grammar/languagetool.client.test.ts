import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { AppError } from '../../../../src/utils/app-error';
import { ErrorCodes } from '../../../../src/utils/error-codes';
import { LanguageToolClient, parseCheckResponse } from '../../../../src/services/grammar/languagetool.client';

vi.mock('../../../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const agreementPayload = {
  software: { name: 'LanguageTool' },
  matches: [
    {
      message: 'The verb form does not agree with the subject.',
      shortMessage: 'Agreement error',
      offset: 4,
      length: 5,
      replacements: [{ value: "doesn't" }, { value: 'does not' }],
      rule: {
        id: 'HE_VERB_AGR',
        description: 'Subject-verb agreement',
        category: { id: 'GRAMMAR', name: 'Grammar' },
      },
    },
  ],
};

interface ReceivedCheck {
  text: unknown;
  language: unknown;
  contentType: string | undefined;
}

function listen(app: express.Express): Promise<{ server: Server; baseUrl: string }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Stand-in server has no TCP address'));
        return;
      }
      resolve({ server, baseUrl: `http://127.0.0.1:${address.port}` });
    });
  });
}

function closeServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

function clientFor(baseUrl: string): LanguageToolClient {
  return new LanguageToolClient({
    baseUrl,
    language: 'en-US',
    timeoutMs: 2000,
    maxRequestsPerMinute: 1000,
  });
}

describe('parseCheckResponse', () => {
  it('should map LanguageTool matches into grammar matches', () => {
    expect(parseCheckResponse(agreementPayload)).toEqual([
      {
        offset: 4,
        errorLength: 5,
        message: 'The verb form does not agree with the subject.',
        ruleId: 'HE_VERB_AGR',
        category: 'GRAMMAR',
        replacements: ["doesn't", 'does not'],
      },
    ]);
  });

  it('should default missing replacements to an empty list', () => {
    const [match] = parseCheckResponse({
      matches: [{ message: 'Typo', offset: 0, length: 3, rule: { id: 'MORFOLOGIK', category: { id: 'TYPOS' } } }],
    });

    expect(match.replacements).toEqual([]);
  });

  it('should reject a payload without matches', () => {
    expect(() => parseCheckResponse({ status: 'ok' })).toThrow(AppError);
    let thrown: unknown;
    try {
      parseCheckResponse({ status: 'ok' });
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toMatchObject({ code: ErrorCodes.GRAMMAR_SERVICE_ERROR, statusCode: 502 });
  });
});

describe('LanguageToolClient', () => {
  const received: ReceivedCheck[] = [];
  let failNext = false;
  let server: Server;
  let baseUrl: string;
  const clients: LanguageToolClient[] = [];

  const track = (client: LanguageToolClient): LanguageToolClient => {
    clients.push(client);
    return client;
  };

  beforeAll(async () => {
    const app = express();
    app.use(express.urlencoded({ extended: false }));
    app.post('/v2/check', (req, res) => {
      received.push({
        text: req.body.text,
        language: req.body.language,
        contentType: req.headers['content-type'],
      });
      if (failNext) {
        failNext = false;
        res.status(500).json({ error: 'internal' });
        return;
      }
      res.json(agreementPayload);
    });
    ({ server, baseUrl } = await listen(app));
  });

  afterEach(async () => {
    received.length = 0;
    failNext = false;
    for (const client of clients.splice(0)) {
      await client.close();
    }
  });

  afterAll(async () => {
    await closeServer(server);
  });

  it('should post form-encoded text and language to /v2/check', async () => {
    const client = track(clientFor(`${baseUrl}/`));

    const matches = await client.check("She don't like apples.");

    expect(received).toHaveLength(1);
    expect(received[0].text).toBe("She don't like apples.");
    expect(received[0].language).toBe('en-US');
    expect(received[0].contentType).toBe('application/x-www-form-urlencoded');
    expect(matches).toHaveLength(1);
    expect(matches[0].ruleId).toBe('HE_VERB_AGR');
  });

  it('should not call the server for blank text', async () => {
    const client = track(clientFor(baseUrl));

    await expect(client.check('   ')).resolves.toEqual([]);
    expect(received).toHaveLength(0);
  });

  it('should report a server error as GRAMMAR_SERVICE_ERROR', async () => {
    const client = track(clientFor(baseUrl));
    failNext = true;

    await expect(client.check('Some text.')).rejects.toMatchObject({
      code: ErrorCodes.GRAMMAR_SERVICE_ERROR,
      statusCode: 502,
      message: 'Grammar service responded with status 500',
    });
  });

  it('should report an unreachable server as GRAMMAR_SERVICE_UNAVAILABLE', async () => {
    const { server: doomed, baseUrl: deadUrl } = await listen(express());
    await closeServer(doomed);
    const client = track(clientFor(deadUrl));

    await expect(client.check('Some text.')).rejects.toMatchObject({
      code: ErrorCodes.GRAMMAR_SERVICE_UNAVAILABLE,
      statusCode: 503,
    });
  });

  it('should apply corrections from its own matches', async () => {
    const client = track(clientFor(baseUrl));
    const text = "She don't like apples.";

    const corrected = client.correct(text, await client.check(text));

    expect(corrected).toBe("She doesn't like apples.");
  });

  it('should refuse to check after close', async () => {
    const client = clientFor(baseUrl);
    await client.close();

    await expect(client.check('Some text.')).rejects.toMatchObject({
      code: ErrorCodes.GRAMMAR_CLIENT_CLOSED,
    });
    expect(received).toHaveLength(0);
  });

  it('should tolerate a second close', async () => {
    const client = clientFor(baseUrl);

    await client.close();
    await expect(client.close()).resolves.toBeUndefined();
    await expect(client.check('Some text.')).rejects.toMatchObject({
      code: ErrorCodes.GRAMMAR_CLIENT_CLOSED,
    });
  });
});
