import { Request, Response, NextFunction } from 'express';
import { config } from '../config/env';
import { AppError } from '../lib/errors';

// Errors raised by express.json() carry an HTTP status and a `type` tag.
const isBodyParserError = (err: unknown): err is Error & { status: number; type: string } =>
  err instanceof Error && 'type' in err && 'status' in err && typeof err.status === 'number';

// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  // Client-side body problems (bad JSON, too large, unsupported charset, aborted) keep their status.
  if (isBodyParserError(err)) {
    const detail = err.type === 'entity.parse.failed' ? 'Malformed JSON body' : err.message;
    return res.status(err.status).json({ detail });
  }

  console.error('Error occurred:', err instanceof Error ? err.stack || err : err);
  if (err instanceof Error && err.cause !== undefined) {
    console.error('Caused by:', err.cause);
  }

  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const message = err instanceof AppError ? err.detail : 'Internal Server Error';

  return res.status(statusCode).json({
    detail: message,
    ...(config.env === 'development' && err instanceof Error && { stack: err.stack }),
  });
};
