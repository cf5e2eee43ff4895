import type { Request, Response, NextFunction } from 'express';
import type { AppConfig } from '../config/env';
import type { AccountService } from '../services/accountService';
import type { Principal, Role } from '../types';
import { AuthorizationFailure } from '../utils/errors';
import { TOKEN_COOKIE, verifyToken } from '../utils/token';

export interface AuthRequest extends Request {
  principal?: Principal;
}

const readToken = (req: Request): string | null => {
  const fromCookie: unknown = req.cookies ? req.cookies[TOKEN_COOKIE] : undefined;
  if (typeof fromCookie === 'string' && fromCookie !== '') {
    return fromCookie;
  }
  const header = req.headers.authorization;
  if (header && header.startsWith('Bearer ')) {
    return header.replace('Bearer ', '').trim() || null;
  }
  return null;
};

export const createAuth = (accounts: AccountService, config: AppConfig) => {
  // Null for a missing or invalid token, or a customer that no longer exists
  const resolvePrincipal = async (req: Request): Promise<Principal | null> => {
    const token = readToken(req);
    if (!token) {
      return null;
    }
    const claims = verifyToken(token, config);
    if (!claims) {
      return null;
    }
    if (claims.role === 'owner') {
      return claims.sub === config.ownerEmail ? { role: 'owner', email: claims.sub } : null;
    }
    return accounts.resolveCustomer(claims.sub);
  };

  const authenticate = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const principal = await resolvePrincipal(req);
      if (!principal) {
        next(new AuthorizationFailure('Authentication required'));
        return;
      }
      req.principal = principal;
      next();
    } catch (error) {
      next(error);
    }
  };

  // Like authenticate, but anonymous requests go through
  const optionalAuth = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      req.principal = (await resolvePrincipal(req)) ?? undefined;
      next();
    } catch (error) {
      next(error);
    }
  };

  const authorize = (...roles: Role[]) => {
    return (req: AuthRequest, res: Response, next: NextFunction): void => {
      if (!req.principal) {
        next(new AuthorizationFailure('Authentication required'));
        return;
      }
      if (!roles.includes(req.principal.role)) {
        next(new AuthorizationFailure('Access denied', 403));
        return;
      }
      next();
    };
  };

  return { authenticate, optionalAuth, authorize };
};

export type Auth = ReturnType<typeof createAuth>;
