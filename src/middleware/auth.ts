// Authentication middleware
import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';

import { OPERATOR_IDENTITY } from '../auth/AdminGate.js';
import { config } from '../config/index.js';

export interface AuthRequest extends Request {
  user?: {
    address: string;
  };
}

function readAddressClaim(decoded: string | jwt.JwtPayload): string | undefined {
  if (typeof decoded === 'string') return undefined;
  const address: unknown = decoded.address;
  return typeof address === 'string' && address.length > 0 ? address : undefined;
}

/**
 * Authenticate via API key or JWT Bearer token.
 * API-key callers act as the operator; JWT callers act as their `address` claim.
 */
export function authenticate(req: AuthRequest, res: Response, next: NextFunction) {
  const apiKey = req.header('x-api-key');
  if (apiKey === config.apiKey) {
    req.user = { address: OPERATOR_IDENTITY };
    return next();
  }

  const authHeader = req.header('Authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    const token = authHeader.substring(7);
    try {
      const address = readAddressClaim(jwt.verify(token, config.jwtSecret));
      if (!address) {
        return res.status(401).json({ error: 'Token missing address claim' });
      }
      req.user = { address: address.toLowerCase() };
      return next();
    } catch (err) {
      return res.status(401).json({ error: 'Invalid token' });
    }
  }

  return res.status(401).json({ error: 'Authentication required' });
}
