/**
 * LanguageTool Client
 *
 * Grammar capability backed by a LanguageTool HTTP server (`/v2/check`).
 * One client owns one keep-alive connection pool; create it at startup and
 * close it once at shutdown.
 */

import axios, { type AxiosInstance } from 'axios';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';
import { RateLimiter } from '../../utils/rate-limiter';
import { languageToolConfig, isPublicLanguageTool, type LanguageToolConfig } from '../../config/languagetool.config';
import { applyCorrections } from './apply-corrections';
import { toGrammarServiceError } from './grammar-errors';
import type { GrammarCapability, GrammarMatch } from './grammar-capability';
import { languageToolResponseSchema, type LanguageToolMatch } from './languagetool.schemas';

export function toGrammarMatch(match: LanguageToolMatch): GrammarMatch {
  return {
    offset: match.offset,
    errorLength: match.length,
    message: match.message,
    ruleId: match.rule.id,
    category: match.rule.category.id,
    replacements: match.replacements.map((replacement) => replacement.value),
  };
}

/** Validate a raw `/v2/check` payload and map its matches. */
export function parseCheckResponse(data: unknown): GrammarMatch[] {
  const parsed = languageToolResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw AppError.badGateway(
      `Unexpected response from grammar service: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`,
      ErrorCodes.GRAMMAR_SERVICE_ERROR
    );
  }
  return parsed.data.matches.map(toGrammarMatch);
}

export class LanguageToolClient implements GrammarCapability {
  private readonly http: AxiosInstance;
  private readonly httpAgent = new HttpAgent({ keepAlive: true });
  private readonly httpsAgent = new HttpsAgent({ keepAlive: true });
  private readonly limiter: RateLimiter;
  private closed = false;

  constructor(private readonly options: LanguageToolConfig = languageToolConfig) {
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/$/, ''),
      timeout: options.timeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
    });
    this.limiter = new RateLimiter({
      name: 'LanguageTool',
      maxRequests: options.maxRequestsPerMinute,
      windowMs: 60 * 1000,
    });

    if (isPublicLanguageTool(options.baseUrl)) {
      logger.warn('[LanguageTool] Using the public LanguageTool API; submitted text leaves this host');
    }
  }

  async check(text: string): Promise<GrammarMatch[]> {
    this.assertOpen();
    if (text.trim().length === 0) return [];

    await this.limiter.acquire();

    const body = new URLSearchParams({ text, language: this.options.language });
    const started = Date.now();

    try {
      const response = await this.http.post<unknown>('/v2/check', body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      const matches = parseCheckResponse(response.data);
      logger.debug(`[LanguageTool] ${matches.length} matches in ${Date.now() - started}ms`);
      return matches;
    } catch (error) {
      const appError = toGrammarServiceError(error);
      logger.error(`[LanguageTool] Check failed: ${appError.message}`);
      throw appError;
    }
  }

  correct(text: string, matches: readonly GrammarMatch[]): string {
    return applyCorrections(text, matches);
  }

  async close(): Promise<void> {
    if (this.closed) {
      logger.warn('[LanguageTool] close() called on an already closed client');
      return;
    }
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    logger.info('[LanguageTool] Client closed');
  }

  private assertOpen(): void {
    if (this.closed) {
      throw AppError.internal('Grammar client has been closed', ErrorCodes.GRAMMAR_CLIENT_CLOSED);
    }
  }
}
