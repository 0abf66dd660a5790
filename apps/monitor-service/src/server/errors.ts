import {
  ConfigurationError,
  MonitorBatchError,
  MonitorNotFoundError,
  toOutcomeRecord,
} from '@vigil/monitor-engine';
import { ZodError } from 'zod';

export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  MONITOR_NOT_FOUND: 'MONITOR_NOT_FOUND',
  MONITOR_MISCONFIGURED: 'MONITOR_MISCONFIGURED',
  ENVIRONMENT_NOT_CONFIGURED: 'ENVIRONMENT_NOT_CONFIGURED',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export class VigilError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'VigilError';
  }
}

export function toErrorResponse(error: unknown): {
  statusCode: number;
  body: ErrorEnvelope;
} {
  if (error instanceof VigilError) {
    return {
      statusCode: error.statusCode,
      body: {
        error: {
          code: error.code,
          message: error.message,
          ...(error.details === undefined ? {} : { details: error.details }),
        },
      },
    };
  }

  if (error instanceof ZodError) {
    const details: Record<string, unknown> = {};
    for (const issue of error.issues) {
      const issueKey = issue.path.length > 0 ? issue.path.join('.') : 'request';
      details[issueKey] = issue.message;
    }

    return {
      statusCode: 400,
      body: {
        error: {
          code: ERROR_CODES.VALIDATION_ERROR,
          message: 'Invalid request parameters',
          details,
        },
      },
    };
  }

  if (error instanceof MonitorNotFoundError) {
    return {
      statusCode: 404,
      body: {
        error: {
          code: ERROR_CODES.MONITOR_NOT_FOUND,
          message: error.message,
        },
      },
    };
  }

  if (error instanceof MonitorBatchError) {
    return {
      statusCode: 422,
      body: {
        error: {
          code: ERROR_CODES.MONITOR_MISCONFIGURED,
          message: error.message,
          details: {
            misconfigured: error.errors.map((entry) => ({
              monitor: entry.monitor,
              environment: entry.environment ?? null,
              message: entry.error.message,
            })),
            results: error.results.map((result) =>
              toOutcomeRecord(result.monitor, result.outcome, result.environment),
            ),
          },
        },
      },
    };
  }

  if (error instanceof ConfigurationError) {
    return {
      statusCode: 422,
      body: {
        error: {
          code: ERROR_CODES.MONITOR_MISCONFIGURED,
          message: error.message,
        },
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: {
        code: ERROR_CODES.INTERNAL_ERROR,
        message: 'Internal server error',
      },
    },
  };
}
