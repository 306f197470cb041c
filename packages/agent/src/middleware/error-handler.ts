import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { error as logError } from 'firebase-functions/logger';
import type { ApiError } from '../shared.js';
import { AppError } from '../types/errors.js';

// Re-export error classes so handlers can import them alongside the handler
export { AppError, NotFoundError, ValidationError } from '../types/errors.js';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logError('[Http] Request failed', {
    method: req.method,
    path: req.path,
    name: err.name,
    error_message: err.message,
  });

  // Handle Zod validation errors
  if (err instanceof ZodError) {
    const response: ApiError = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: err.errors,
      },
    };
    res.status(400).json(response);
    return;
  }

  // Handle known application errors
  if (err instanceof AppError) {
    const response: ApiError = {
      success: false,
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
    };
    res.status(err.statusCode).json(response);
    return;
  }

  // Unknown errors
  const response: ApiError = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
  res.status(500).json(response);
}
