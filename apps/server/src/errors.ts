import { isPlanningError, logger, type PlanningErrorCode } from '@lanepath/shared';
import type { ErrorMessage } from './messages';

const log = logger.scope('server');

const HTTP_STATUS: Record<PlanningErrorCode, number> = {
  INVALID_TOPOLOGY: 500,
  INVALID_LOCATION: 422,
  NO_PATH_FOUND: 404,
};

/**
 * Client-facing description of a failure; unexpected errors are logged and masked
 */
export function toErrorMessage(err: unknown): ErrorMessage & { status: number } {
  if (isPlanningError(err)) {
    return { code: err.code, message: err.message, status: HTTP_STATUS[err.code] };
  }
  log.error('Unexpected error', err);
  return { code: 'INTERNAL', message: 'Internal server error', status: 500 };
}
