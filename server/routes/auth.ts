/**
 * Authentication Routes
 * Handles login, logout, and session lookup
 */

import { Router, type Request, type Response } from 'express';
import { ZodError } from 'zod';
import { loginSchema } from '@shared/schema';
import { INVALID_CREDENTIALS, SESSION_COOKIE, authenticate } from '../services/auth';
import { getRequestSessionId } from '../middleware/requireSession';
import { loginRateLimiter } from '../middleware/rateLimiter';
import type { AppDeps } from '../routes';

export function createAuthRouter(deps: AppDeps): Router {
  const router = Router();

  // Cookie options for session
  const sessionCookieOptions = {
    httpOnly: true,
    secure: deps.config.NODE_ENV === 'production',
    sameSite: 'lax' as const,
    maxAge: 12 * 60 * 60 * 1000, // 12 hours
    path: '/',
  };

  /**
   * POST /api/auth/login
   * Check credentials and start a planner session
   */
  router.post('/login', loginRateLimiter, (req: Request, res: Response) => {
    try {
      const data = loginSchema.parse(req.body);

      const users = deps.getUsers();
      if (!users.ok) {
        console.error('[Auth] Login unavailable:', users.error);
        return res.status(503).json({ error: users.error });
      }

      const username = authenticate(users.value, data.username, data.password);
      if (!username) {
        return res.status(401).json({ error: INVALID_CREDENTIALS });
      }

      const session = deps.sessions.create(username);
      res.cookie(SESSION_COOKIE, session.id, sessionCookieOptions);
      console.log(`[Auth] ${username} logged in`);

      res.json({
        success: true,
        user: username,
        sessionId: session.id,
        message: `Welcome, ${username}!`,
      });
    } catch (err) {
      if (err instanceof ZodError) {
        return res.status(400).json({ error: err.errors[0]?.message || 'Invalid input' });
      }

      console.error('[Auth] Login error:', err);
      res.status(500).json({ error: 'Login failed' });
    }
  });

  /**
   * POST /api/auth/logout
   * Discard the session and clear the cookie
   */
  router.post('/logout', (req: Request, res: Response) => {
    const sessionId = getRequestSessionId(req);
    if (sessionId) {
      deps.sessions.discard(sessionId);
    }

    res.clearCookie(SESSION_COOKIE, { path: '/' });
    res.json({ success: true });
  });

  /**
   * GET /api/auth/me
   * Get the logged-in user
   */
  router.get('/me', (req: Request, res: Response) => {
    const sessionId = getRequestSessionId(req);
    const session = sessionId ? deps.sessions.get(sessionId) : undefined;

    if (!session) {
      res.clearCookie(SESSION_COOKIE, { path: '/' });
      return res.status(401).json({ error: 'Not authenticated' });
    }

    res.json({ user: session.username });
  });

  return router;
}
