/**
 * HTTP error mapping for the web adapter
 */

import { Response } from 'express';
import { getErrorName, getHttpStatus } from '../errors/error-codes';
import { isSupervisorError } from '../errors/supervisor-error';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: string;
  code?: string;
  message: string;
  details?: Record<string, unknown>;
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorResponse } {
  if (isSupervisorError(error)) {
    return {
      status: getHttpStatus(error.code),
      body: {
        error: getErrorName(error.code),
        code: error.code,
        message: error.message,
        details: error.details,
      },
    };
  }
  return {
    status: 500,
    body: {
      error: 'INTERNAL_ERROR',
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

export function sendError(res: Response, error: unknown): void {
  const { status, body } = toErrorResponse(error);
  res.status(status).json(body);
}

/**
 * 400 for a malformed request body or query
 */
export function sendBadRequest(res: Response, message: string): void {
  const body: ErrorResponse = { error: 'INVALID_REQUEST', message };
  res.status(400).json(body);
}
