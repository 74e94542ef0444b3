import { NextFunction, Request, Response } from 'express';
import { InvalidInputError, PayrollError, StoreUnavailableError } from '../errors';

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);

  if (err instanceof InvalidInputError) {
    return res.status(err.status).json({ message: err.message, issues: err.issues });
  }
  if (err instanceof PayrollError) {
    if (err instanceof StoreUnavailableError) {
      console.error(`[${req.method} ${req.originalUrl}] ${err.message}`, err.cause);
    }
    return res.status(err.status).json({ message: err.message });
  }
  if (isBodyParseError(err)) {
    return res.status(400).json({ message: 'Malformed JSON body' });
  }

  console.error(`[${req.method} ${req.originalUrl}] request failed`, err);
  return res.status(500).json({ message: 'Internal server error' });
}
