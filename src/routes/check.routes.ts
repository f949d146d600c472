/**
 * Check Routes
 *
 * Grammar, style and readability analysis endpoints.
 */

import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import { config } from '../config';
import { validate } from '../middleware/validate.middleware';
import { CheckController } from '../controllers/check.controller';
import { checkTextSchema, correctTextSchema } from '../schemas/check.schemas';
import { ErrorCodes } from '../utils/error-codes';
import type { WritingAnalyzer } from '../services/analysis/writing-analyzer.service';

export function createCheckRoutes(analyzer: WritingAnalyzer): Router {
  const router = Router();
  const checkController = new CheckController(analyzer);

  // Each request holds a grammar-service call; cap per-IP volume
  const analysisRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: config.rateLimitMaxRequests,
    message: {
      success: false,
      error: { code: ErrorCodes.RATE_LIMITED, message: 'Too many requests, please try again later' },
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  router.use(analysisRateLimiter);

  /**
   * Analyze text for grammar, style and readability
   * POST /api/check
   */
  router.post(
    '/check',
    validate(checkTextSchema),
    (req, res, next) => checkController.check(req, res, next)
  );

  /**
   * Auto-correct text
   * POST /api/correct
   */
  router.post(
    '/correct',
    validate(correctTextSchema),
    (req, res, next) => checkController.correct(req, res, next)
  );

  return router;
}
