import { Response } from 'express';
import { ApiResponse } from '../types/index.js';
import {
  DeviceExistsError,
  DeviceNotFoundError,
  DuplicateKeyError,
  StorageError,
  ValidationError,
} from '../types/errors.js';

function statusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof DeviceNotFoundError) return 404;
  if (err instanceof DeviceExistsError || err instanceof DuplicateKeyError) return 409;
  if (err instanceof StorageError) return 503;
  return 500;
}

/**
 * Log and answer with the JSON error envelope
 */
export function sendError(res: Response, err: unknown, context: string): void {
  const status = statusFor(err);
  if (status >= 500) {
    console.error(`Error ${context}:`, err);
  }
  const body: ApiResponse = {
    success: false,
    error: err instanceof Error ? err.message : `Failed ${context}`,
  };
  res.status(status).json(body);
}
