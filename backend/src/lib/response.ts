/**
 * Standard handler response bodies.
 */

import type { LambdaResult } from '../types/lambda.js';

const BASE_HEADERS = {
  'Content-Type': 'application/json; charset=utf-8',
};

export function success<T>(data: T, statusCode = 200): LambdaResult {
  return {
    statusCode,
    headers: { ...BASE_HEADERS },
    body: JSON.stringify({
      success: true,
      data,
      timestamp: new Date().toISOString(),
    }),
  };
}

export function error(message: string, statusCode = 500, details?: unknown): LambdaResult {
  return {
    statusCode,
    headers: { ...BASE_HEADERS },
    body: JSON.stringify({
      success: false,
      error: message,
      timestamp: new Date().toISOString(),
      ...(details !== undefined && { details }),
    }),
  };
}

export function badRequest(message: string, details?: unknown): LambdaResult {
  return error(message, 400, details);
}
