import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger';

export interface RFC7807ProblemDetail {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  errors?: Array<{ path: string; message: string }>;
  traceId?: string;
  timestamp?: string;
}

const PROBLEM_TYPE_BASE = '/problems/';

function getTraceId(req: Request): string | undefined {
  const header = req.headers['x-correlation-id'];
  return req.correlationId || (typeof header === 'string' ? header : undefined);
}

export abstract class APIError extends Error {
  abstract readonly status: number;
  abstract readonly type: string;
  abstract readonly title: string;
  readonly detail?: string;
  readonly errors?: Array<{ path: string; message: string }>;

  constructor(message: string, detail?: string, errors?: Array<{ path: string; message: string }>) {
    super(message);
    this.name = this.constructor.name;
    this.detail = detail;
    this.errors = errors;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toRFC7807(req: Request): RFC7807ProblemDetail {
    return {
      type: `${PROBLEM_TYPE_BASE}${this.type}`,
      title: this.title,
      status: this.status,
      detail: this.detail || this.message,
      instance: req.originalUrl,
      errors: this.errors,
      traceId: getTraceId(req),
      timestamp: new Date().toISOString(),
    };
  }
}

export class BadRequestError extends APIError {
  readonly status = 400;
  readonly type = 'bad-request';
  readonly title = 'Bad Request';

  constructor(detail?: string, errors?: Array<{ path: string; message: string }>) {
    super('Bad Request', detail, errors);
  }
}

export class ValidationError extends APIError {
  readonly status = 400;
  readonly type = 'validation-error';
  readonly title = 'Validation Error';

  constructor(detail?: string, errors?: Array<{ path: string; message: string }>) {
    super('Validation Error', detail, errors);
  }

  static fromZodError(error: ZodError, detail = 'Request validation failed'): ValidationError {
    const errors = error.errors.map(e => ({
      path: e.path.join('.'),
      message: e.message,
    }));
    return new ValidationError(detail, errors);
  }
}

export class PayloadTooLargeError extends APIError {
  readonly status = 413;
  readonly type = 'payload-too-large';
  readonly title = 'Payload Too Large';

  constructor(detail: string = 'The request payload is too large') {
    super('Payload Too Large', detail);
  }
}

export class TooManyRequestsError extends APIError {
  readonly status = 429;
  readonly type = 'rate-limit-exceeded';
  readonly title = 'Too Many Requests';

  constructor(detail: string = 'Rate limit exceeded') {
    super('Too Many Requests', detail);
  }
}

export class ExternalServiceError extends APIError {
  readonly status = 502;
  readonly type = 'external-service-error';
  readonly title = 'External Service Error';

  constructor(service: string, detail?: string) {
    super('External Service Error', detail || `Failed to communicate with ${service}`);
  }
}

export class ServiceUnavailableError extends APIError {
  readonly status = 503;
  readonly type = 'service-unavailable';
  readonly title = 'Service Unavailable';

  constructor(detail: string = 'Service temporarily unavailable') {
    super('Service Unavailable', detail);
  }
}

interface BodyParserError extends Error {
  type: string;
  status?: number;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return 'type' in err && typeof err.type === 'string';
}

function toAPIError(err: Error): APIError | null {
  if (err instanceof APIError) return err;
  if (err instanceof ZodError) return ValidationError.fromZodError(err);
  if (isBodyParserError(err)) {
    if (err.type === 'entity.parse.failed') return new BadRequestError('JSON inválido.');
    if (err.type === 'entity.too.large') return new PayloadTooLargeError();
  }
  return null;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const traceId = getTraceId(req);
  const apiError = toAPIError(err);

  if (apiError) {
    if (apiError.status >= 500) {
      logger.error({ err, traceId, path: req.path }, apiError.message);
    } else {
      logger.warn({ err, traceId, path: req.path }, apiError.message);
    }
    res.status(apiError.status).json(apiError.toRFC7807(req));
    return;
  }

  logger.error({ err, traceId, path: req.path, stack: err.stack }, 'Unhandled error');

  const problemDetail: RFC7807ProblemDetail = {
    type: `${PROBLEM_TYPE_BASE}internal-error`,
    title: 'Internal Server Error',
    status: 500,
    detail: process.env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
    instance: req.originalUrl,
    traceId,
    timestamp: new Date().toISOString(),
  };

  res.status(500).json(problemDetail);
}

export function asyncHandler<T extends Request = Request>(
  fn: (req: T, res: Response, next: NextFunction) => Promise<void>
): (req: T, res: Response, next: NextFunction) => void {
  return (req: T, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  const problemDetail: RFC7807ProblemDetail = {
    type: `${PROBLEM_TYPE_BASE}not-found`,
    title: 'Not Found',
    status: 404,
    detail: `Route ${req.method} ${req.path} not found`,
    instance: req.originalUrl,
    traceId: getTraceId(req),
    timestamp: new Date().toISOString(),
  };
  res.status(404).json(problemDetail);
}
