import type { Request, Response, NextFunction } from 'express';
import * as crypto from 'crypto';
import { logger } from './logger';

export function hashApiKey(apiKey: string): string {
  return crypto.createHash('sha256').update(apiKey).digest('hex');
}

export function validateApiKey(provided: string, storedHash: string): boolean {
  const providedHash = Buffer.from(hashApiKey(provided));
  const expected = Buffer.from(storedHash);
  if (providedHash.length !== expected.length) {
    return false;
  }
  return crypto.timingSafeEqual(providedHash, expected);
}

export function extractApiKey(req: Request): string | null {
  const header = req.headers['x-api-key'];
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }

  const authorization = req.headers.authorization;
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice('Bearer '.length).trim() || null;
  }

  return null;
}

// Middleware factory for API key authentication on the control API
export function apiKeyAuth(apiKeyHash: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = extractApiKey(req);

    if (!apiKey) {
      logger.warn('Auth', 'Missing API key', {
        ip: req.ip,
        path: req.path,
        method: req.method,
      });
      res.status(401).json({
        error: 'Authentication required',
        code: 'AUTH_REQUIRED',
      });
      return;
    }

    if (!validateApiKey(apiKey, apiKeyHash)) {
      logger.warn('Auth', 'Invalid API key', {
        ip: req.ip,
        path: req.path,
        method: req.method,
      });
      res.status(403).json({
        error: 'Invalid API key',
        code: 'INVALID_API_KEY',
      });
      return;
    }

    logger.debug('Auth', 'Authenticated request', {
      path: req.path,
      method: req.method,
    });

    next();
  };
}
