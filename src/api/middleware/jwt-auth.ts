/**
 * JWT Authentication Middleware
 *
 * Validates Bearer tokens for the status API.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { logger } from '../../utils/logger.js';

export interface JwtClaims {
  sub: string; // User/client identifier
  iss?: string;
  iat?: number;
  exp?: number;
}

export interface AuthenticatedRequest extends Request {
  user?: JwtClaims;
}

export interface JwtAuthOptions {
  secret: string;
  issuer: string;
}

/**
 * Requires a valid Bearer token in the Authorization header
 */
export function jwtAuth(options: JwtAuthOptions): RequestHandler {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({
        error: 'Missing or invalid Authorization header',
        code: 'AUTH_MISSING',
        hint: 'Use: Authorization: Bearer <token>',
      });
      return;
    }

    const token = authHeader.slice(7); // Remove 'Bearer ' prefix

    try {
      const decoded = jwt.verify(token, options.secret, { issuer: options.issuer });
      if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
        res.status(401).json({ error: 'Invalid token', code: 'AUTH_INVALID', message: 'Token has no subject' });
        return;
      }

      req.user = { sub: decoded.sub, iss: decoded.iss, iat: decoded.iat, exp: decoded.exp };
      logger.debug({ sub: decoded.sub }, 'JWT authentication successful');
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        res.status(401).json({
          error: 'Token expired',
          code: 'AUTH_EXPIRED',
          expiredAt: error.expiredAt,
        });
        return;
      }

      if (error instanceof jwt.JsonWebTokenError) {
        res.status(401).json({
          error: 'Invalid token',
          code: 'AUTH_INVALID',
          message: error.message,
        });
        return;
      }

      logger.error({ error }, 'JWT verification failed');
      res.status(500).json({
        error: 'Authentication failed',
        code: 'AUTH_ERROR',
      });
    }
  };
}

/**
 * Issue a token for the status API (operators, tests)
 */
export function generateToken(subject: string, options: JwtAuthOptions, expiresIn: number = 60 * 60 * 24 * 30): string {
  return jwt.sign({ sub: subject }, options.secret, { issuer: options.issuer, expiresIn });
}
