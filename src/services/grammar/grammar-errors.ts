import axios from 'axios';
import { AppError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';

/**
 * Normalize anything thrown by a grammar capability into an AppError.
 * Network failures (no response: refused, reset, timed out) become
 * GRAMMAR_SERVICE_UNAVAILABLE; everything else GRAMMAR_SERVICE_ERROR.
 */
export function toGrammarServiceError(error: unknown): AppError {
  if (error instanceof AppError) return error;

  if (axios.isAxiosError(error)) {
    if (!error.response) {
      return AppError.serviceUnavailable(
        `Grammar service is unreachable: ${error.message}`,
        ErrorCodes.GRAMMAR_SERVICE_UNAVAILABLE
      );
    }
    return AppError.badGateway(
      `Grammar service responded with status ${error.response.status}`,
      ErrorCodes.GRAMMAR_SERVICE_ERROR
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return AppError.badGateway(`Grammar check failed: ${message}`, ErrorCodes.GRAMMAR_SERVICE_ERROR);
}
