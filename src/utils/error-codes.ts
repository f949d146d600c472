export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  RATE_LIMITED: 'RATE_LIMITED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  GRAMMAR_SERVICE_UNAVAILABLE: 'GRAMMAR_SERVICE_UNAVAILABLE',
  GRAMMAR_SERVICE_ERROR: 'GRAMMAR_SERVICE_ERROR',
  GRAMMAR_CLIENT_CLOSED: 'GRAMMAR_CLIENT_CLOSED',
  READABILITY_ERROR: 'READABILITY_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
