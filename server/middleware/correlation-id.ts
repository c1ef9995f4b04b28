import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      correlationId: string;
    }
  }
}

export const CORRELATION_HEADER = 'x-correlation-id';

const ACCEPTED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const incomingId = req.headers[CORRELATION_HEADER];
  const correlationId = typeof incomingId === 'string' && ACCEPTED_ID.test(incomingId) ? incomingId : randomUUID();

  req.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);

  next();
}
