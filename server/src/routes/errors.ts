import { Response } from 'express';
import { z } from 'zod';
import { describeIssues, validationIssues } from '../db/schema';
import { ErrorCode, KeypanelError, ValidationError, errorMessage } from '../errors';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION: 400,
  INVALID_BRIGHTNESS: 400,
  UNKNOWN_PLUGIN: 404,
  UNKNOWN_PAGE: 404,
  NO_FREE_SLOT: 409,
  LAST_PAGE: 409,
  IO: 503,
  DEVICE_NOT_FOUND: 503,
  PLUGIN_TIMEOUT: 504
};

// Answer a failed request with `{ error, code }` and a matching status
export function sendError(res: Response, error: unknown): void {
  if (error instanceof KeypanelError) {
    const status = STATUS_BY_CODE[error.code];
    if (status >= 500) {
      console.error(`[API] ${error.code}:`, error.message);
    }
    const body: { error: string; code: ErrorCode; issues?: ValidationError['issues'] } = {
      error: error.message,
      code: error.code
    };
    if (error instanceof ValidationError && error.issues.length > 0) {
      body.issues = error.issues;
    }
    res.status(status).json(body);
    return;
  }

  console.error('[API] Unexpected error:', error);
  res.status(500).json({ error: errorMessage(error) });
}

// Parse an integer route parameter; NaN for anything else
export function intParam(value: string): number {
  return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

// Validate a request body, throwing ValidationError with every issue
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = validationIssues(parsed.error);
    throw new ValidationError(`Invalid request: ${describeIssues(issues)}`, issues);
  }
  return parsed.data;
}
