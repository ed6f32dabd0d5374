import type { Response } from 'express';
import type { ZodError } from 'zod';

export type ApiErrorCode = 'invalid_params' | 'tab_not_found' | 'no_active_tab' | 'no_history' | 'internal_error';

export function sendError(res: Response, status: number, code: ApiErrorCode, message: string): void {
  res.status(status).json({ ok: false, error: { code, message } });
}

export function sendInvalid(res: Response, error: ZodError): void {
  const message = error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
  sendError(res, 400, 'invalid_params', message);
}
