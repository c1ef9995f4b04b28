import rateLimit from 'express-rate-limit';
import { TooManyRequestsError } from '../errors';
import { logger } from '../logger';

export function createGlobalRateLimiter(requestsPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: requestsPerMinute,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn({ ip: req.ip, path: req.path, method: req.method }, 'Rate limit exceeded');
      const error = new TooManyRequestsError('You have exceeded the rate limit. Please wait before making more requests.');
      res.setHeader('Retry-After', '60');
      res.status(error.status).json(error.toRFC7807(req));
    },
  });
}
