import { Response } from 'express';
import type { ZodError } from 'zod';

export function success(res: Response, data: unknown, status = 200) {
  return res.status(status).json(data);
}

export function error(res: Response, message: string, status = 400, code?: string) {
  return res.status(status).json({
    error: message,
    code: code ?? statusToCode(status),
  });
}

export function validationError(res: Response, err: ZodError) {
  return error(res, err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '), 422);
}

function statusToCode(status: number): string {
  const map: Record<number, string> = {
    400: 'BAD_REQUEST',
    401: 'UNAUTHORIZED',
    404: 'NOT_FOUND',
    409: 'CONFLICT',
    422: 'VALIDATION_ERROR',
    500: 'INTERNAL_ERROR',
    503: 'SERVICE_UNAVAILABLE',
  };
  return map[status] ?? 'ERROR';
}
