import type { Request, Response, NextFunction, RequestHandler } from 'express';
import morgan from 'morgan';
import { IDENTITY_HEADER } from '@shared/constants';
import type { ApiResponse } from '@shared/types';
import { isMarketplaceError } from '@core/errors';
import type { ErrorCategory } from '@core/errors';
import { identitySchema } from '@core/validation';

export const requestLogger = morgan('dev');

/** Error raised by the HTTP layer itself, before any marketplace operation runs. */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  authorization: 403,
  validation: 400,
  uniqueness: 409,
  state: 409,
  resource: 422,
  lookup: 404,
};

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

// Express 4 does not catch rejected handler promises on its own.
export function asyncHandler(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Caller identity as set by the authenticating proxy in front of the API.
 */
export function callerIdentity(req: Request): string {
  const header = req.get(IDENTITY_HEADER);
  if (!header) {
    throw new HttpError(401, `${IDENTITY_HEADER} header is required`);
  }
  const parsed = identitySchema.safeParse(header);
  if (!parsed.success) {
    throw new HttpError(401, `${IDENTITY_HEADER} header is malformed`);
  }
  return parsed.data;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (isMarketplaceError(err)) {
    const body: ApiResponse = { success: false, error: err.message, code: err.code };
    res.status(STATUS_BY_CATEGORY[err.category]).json(body);
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ success: false, error: err.message });
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json({ success: false, error: 'Malformed JSON body' });
    return;
  }
  console.error('[ERROR]', err.message);
  res.status(500).json({ success: false, error: err.message });
}
