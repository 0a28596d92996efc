import rateLimit from 'express-rate-limit';
import { logger } from '../utils/logger';

/**
 * General API rate limiter
 * Allows 300 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 300,
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  handler: (req, res) => {
    logger.warn(`Rate limit exceeded for IP: ${req.ip} on path: ${req.path}`);
    res.status(429).json({
      error: 'Too many requests from this IP, please try again later.',
      retryAfter: '15 minutes',
    });
  },
});

/**
 * Wake-on-LAN rate limiter
 * Allows 30 wake requests per minute per IP
 */
export const wakeLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Wake rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many wake requests. Please wait before trying again.',
      retryAfter: '1 minute',
    });
  },
});

/**
 * Bulk status refresh rate limiter
 * Each refresh opens one connection per registered device
 */
export const refreshLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Status refresh rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many status refresh requests.',
      retryAfter: '1 minute',
      hint: 'Use GET /api/status to retrieve the last results instead',
    });
  },
});
