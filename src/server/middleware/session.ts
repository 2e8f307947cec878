import type { NextFunction, Request, Response } from 'express';
import type { SessionContext } from '../../shared/api.js';
import type { IdentityProvider } from '../services/auth.js';

const ANONYMOUS: SessionContext = { authenticated: false };

export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) return null;
  const token = header.slice('Bearer '.length).trim();
  return token || null;
}

/**
 * Resolves the caller's Firebase ID token into an explicit SessionContext on
 * `res.locals.session`. Without a provider every caller is anonymous.
 */
export function sessionContext(provider: IdentityProvider | null) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!provider || !token) {
      res.locals.session = ANONYMOUS;
      return next();
    }

    try {
      const user = await provider.verifyIdToken(token);
      res.locals.session = user ? { authenticated: true, user } : ANONYMOUS;
      next();
    } catch (err) {
      next(err);
    }
  };
}

function isSessionContext(value: unknown): value is SessionContext {
  if (!value || typeof value !== 'object' || !('authenticated' in value)) return false;
  if (value.authenticated === false) return true;
  return value.authenticated === true && 'user' in value && typeof value.user === 'object' && value.user !== null;
}

export function getSession(res: Response): SessionContext {
  const session: unknown = res.locals.session;
  return isSessionContext(session) ? session : ANONYMOUS;
}
