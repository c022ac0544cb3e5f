import type { ErrorRequestHandler, Request, Response } from 'express';
import { errorMessage } from '../errors';

export function methodNotAllowed(req: Request, res: Response): void {
  res.status(405).set('Allow', 'POST').json({ success: false, error: `method ${req.method} not allowed` });
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * Status of a client error raised by body-parser (oversized body,
 * unsupported charset or encoding), or undefined for anything else
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if (!('status' in error) || !('expose' in error) || error.expose !== true) {
    return undefined;
  }
  const status = error.status;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

const clientErrorMessages: Record<number, string> = {
  413: 'request body too large',
  415: 'unsupported request body encoding',
};

/**
 * Last middleware: malformed JSON becomes a 400 and other body errors keep
 * their 4xx status, none of them echoing the body; anything else is a 500
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isBodyParseError(error)) {
    console.log(`[SERVER] Malformed JSON on ${req.method} ${req.path}`);
    res.status(400).json({ success: false, error: 'invalid JSON body' });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    console.log(`[SERVER] Rejected body on ${req.method} ${req.path} (${status})`);
    res.status(status).json({ success: false, error: clientErrorMessages[status] ?? 'invalid request body' });
    return;
  }

  console.error(`[SERVER] Unexpected error on ${req.method} ${req.path}:`, error);
  res.status(500).json({ success: false, error: errorMessage(error) });
};
