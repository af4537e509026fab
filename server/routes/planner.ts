/**
 * Planner Routes
 * Ask the AI for an itinerary for the session's current trip
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { requireSession, sessionOf } from '../middleware/requireSession';
import { aiRateLimiter } from '../middleware/rateLimiter';
import { formatDocument, toDocument } from '../services/tripDocument';
import { askForItinerary } from '../services/tripPlanner';
import type { AppDeps } from '../routes';

export function createPlannerRouter(deps: AppDeps): Router {
  const router = Router();

  router.use(requireSession(deps.sessions));

  /**
   * GET /api/planner/status
   * Whether the planner AI is configured; the reason when it is not
   */
  router.get('/status', (_req: Request, res: Response) => {
    const client = deps.getAIClient();
    res.json(client.ok ? { ready: true } : { ready: false, message: client.error });
  });

  /**
   * POST /api/planner/plan
   * Blocks until the model answers. Failures come back as itinerary text.
   */
  router.post('/plan', aiRateLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessionOf(req);
      const documentText = formatDocument(toDocument(session.currentTrip));

      console.log(`[Planner] Planning "${session.currentTrip.trip_name || '(unsaved trip)'}" for ${session.username}`);
      const itinerary = await askForItinerary(documentText, deps.getAIClient());

      session.itineraryText = itinerary;
      res.json({ itinerary });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
