/**
 * Error Handler
 * Single place where thrown errors become JSON error responses
 */

import type { NextFunction, Request, Response } from 'express';
import { ApiError } from '../errors.js';
import { isConstraintError } from '../storage/sqlite.js';
import type { ErrorBody } from '../types/index.js';

/** Errors raised by the JSON body parser carry an http status and a `type` tag */
function isBodyParserError(err: unknown): err is Error & { type: string; status: number } {
  return err instanceof Error
    && 'type' in err && typeof err.type === 'string'
    && 'status' in err && typeof err.status === 'number';
}

function send(res: Response, status: number, error: string): void {
  const body: ErrorBody = { error };
  res.status(status).json(body);
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ApiError) {
    send(res, err.status, err.message);
    return;
  }

  // Unparseable, oversized or wrongly encoded bodies all count as no usable data
  if (isBodyParserError(err)) {
    send(res, 400, 'No data provided');
    return;
  }

  if (isConstraintError(err)) {
    send(res, 400, 'Database constraint violation');
    return;
  }

  console.error('API Error:', err);
  send(res, 500, 'Internal server error');
}

export function notFoundHandler(_req: Request, res: Response): void {
  send(res, 404, 'Not found');
}
