import rateLimit from 'express-rate-limit';
import { env } from '../config/env.js';

// Extract client IP from X-Forwarded-For or req.ip
function getClientIp(req: { headers: { [key: string]: string | string[] | undefined }; ip?: string }): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string') {
    return forwarded.split(',')[0].trim();
  }
  return req.ip || 'unknown';
}

export const generalLimiter = rateLimit({
  windowMs: 1 * 60 * 1000, // 1 minute
  limit: env.RATE_LIMIT_PER_MINUTE,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later.' },
  keyGenerator: getClientIp,
  // X-Forwarded-For is read by getClientIp
  validate: false,
});
