/**
 * Session Middleware
 * Resolves the planner session from the session cookie (or a bearer token)
 * and attaches it to the request
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { SESSION_COOKIE, getBearerSessionId } from '../services/auth';
import type { SessionStore, TripSession } from '../services/tripSession';

// Extend Express Request to include the planner session
declare global {
  namespace Express {
    interface Request {
      tripSession?: TripSession;
    }
  }
}

export function getRequestSessionId(req: Request): string | null {
  const cookies: Record<string, unknown> | undefined = req.cookies;
  const fromCookie = cookies?.[SESSION_COOKIE];
  if (typeof fromCookie === 'string' && fromCookie) {
    return fromCookie;
  }
  return getBearerSessionId(req.headers);
}

/**
 * Require a live session; responds 401 otherwise
 */
export function requireSession(sessions: SessionStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const sessionId = getRequestSessionId(req);
    const session = sessionId ? sessions.get(sessionId) : undefined;

    if (!session) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    req.tripSession = session;
    next();
  };
}

/**
 * Session attached by requireSession. Only call from routes mounted behind it.
 */
export function sessionOf(req: Request): TripSession {
  if (!req.tripSession) {
    throw new Error('requireSession middleware is not mounted for this route');
  }
  return req.tripSession;
}
