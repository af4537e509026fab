/**
 * Trip Routes
 * The trip being edited in this session, plus save/select/delete of saved trips
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { poiFormInputSchema, selectTripSchema, tripFormInputSchema, type TripProfile } from '@shared/schema';
import { describeStop } from '@shared/tripFields';
import { requireSession, sessionOf } from '../middleware/requireSession';
import {
  cancelDelete,
  confirmDelete,
  listTripNames,
  requestDelete,
  saveCurrentTrip,
  selectTrip,
  type TripOperationResult,
} from '../services/tripService';
import {
  addPointOfInterest,
  applyTripForm,
  removePointOfInterest,
  updatePointOfInterest,
  STOP_NOT_FOUND,
  type FormResult,
} from '../services/tripForm';
import { formatDocument, toDocument } from '../services/tripDocument';
import type { AppDeps } from '../routes';

const STATUS_CODES = {
  ok: 200,
  invalid: 400,
  not_found: 404,
  storage_error: 500,
} as const;

function sendOperation<T extends object>(res: Response, result: TripOperationResult<T>) {
  if (result.status !== 'ok') {
    return res.status(STATUS_CODES[result.status]).json({ error: result.error });
  }
  const { status: _status, ...body } = result;
  return res.json({ success: true, ...body });
}

function parseIndex(raw: string): number {
  return /^\d+$/.test(raw) ? Number(raw) : -1;
}

function firstIssue(error: z.ZodError): string {
  return error.errors[0]?.message || 'Invalid input';
}

export function createTripsRouter(deps: AppDeps): Router {
  const router = Router();
  const { store } = deps;

  router.use(requireSession(deps.sessions));

  /**
   * Apply an edit to the session's trip; 400 with nothing changed on failure
   */
  function applyEdit(req: Request, res: Response, result: FormResult<TripProfile>) {
    if (!result.ok) {
      const status = result.error === STOP_NOT_FOUND ? 404 : 400;
      return res.status(status).json({ error: result.error });
    }
    const session = sessionOf(req);
    session.currentTrip = result.value;
    return res.json({ currentTrip: session.currentTrip });
  }

  /**
   * GET /api/trips
   * Saved trip names plus the session's current selection
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessionOf(req);
      const trips = await listTripNames(store, session.username);

      res.json({
        trips,
        selected: session.selectedTripName,
        currentTrip: session.currentTrip,
        stops: session.currentTrip.points_of_interest.map((poi, i) => describeStop(poi, i + 1)),
        confirmDelete: session.confirmDelete,
        itineraryText: session.itineraryText,
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/trips/select
   * Switch to a saved trip, or "<New Trip>" for a blank one
   */
  router.post('/select', async (req: Request, res: Response, next: NextFunction) => {
    const validation = selectTripSchema.safeParse(req.body);
    if (!validation.success) {
      return res.status(400).json({ error: firstIssue(validation.error) });
    }

    try {
      const session = sessionOf(req);
      await selectTrip(store, session, validation.data.name);
      res.json({ selected: session.selectedTripName, currentTrip: session.currentTrip });
    } catch (err) {
      next(err);
    }
  });

  /**
   * PATCH /api/trips/current
   * Apply form values to the trip being edited (not saved until /save)
   */
  router.patch('/current', (req: Request, res: Response) => {
    const validation = tripFormInputSchema.safeParse(req.body);
    if (!validation.success) {
      return res.status(400).json({ error: firstIssue(validation.error) });
    }

    const session = sessionOf(req);
    session.currentTrip = applyTripForm(session.currentTrip, validation.data);
    res.json({ currentTrip: session.currentTrip });
  });

  /**
   * POST /api/trips/current/save
   */
  router.post('/current/save', async (req: Request, res: Response, next: NextFunction) => {
    try {
      sendOperation(res, await saveCurrentTrip(store, sessionOf(req)));
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/trips/current/delete
   * Ask for confirmation before deleting the selected trip
   */
  router.post('/current/delete', (req: Request, res: Response) => {
    sendOperation(res, requestDelete(sessionOf(req)));
  });

  router.post('/current/delete/confirm', async (req: Request, res: Response, next: NextFunction) => {
    try {
      sendOperation(res, await confirmDelete(store, sessionOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/current/delete/cancel', (req: Request, res: Response) => {
    sendOperation(res, cancelDelete(sessionOf(req)));
  });

  /**
   * POST /api/trips/current/poi
   * Append a point of interest
   */
  router.post('/current/poi', (req: Request, res: Response) => {
    const validation = poiFormInputSchema.safeParse(req.body);
    if (!validation.success) {
      return res.status(400).json({ error: firstIssue(validation.error) });
    }
    applyEdit(req, res, addPointOfInterest(sessionOf(req).currentTrip, validation.data));
  });

  router.patch('/current/poi/:index', (req: Request, res: Response) => {
    const validation = poiFormInputSchema.safeParse(req.body);
    if (!validation.success) {
      return res.status(400).json({ error: firstIssue(validation.error) });
    }
    const index = parseIndex(req.params.index);
    applyEdit(req, res, updatePointOfInterest(sessionOf(req).currentTrip, index, validation.data));
  });

  router.delete('/current/poi/:index', (req: Request, res: Response) => {
    const index = parseIndex(req.params.index);
    applyEdit(req, res, removePointOfInterest(sessionOf(req).currentTrip, index));
  });

  /**
   * GET /api/trips/current/document
   * The configuration document the planner AI would receive
   */
  router.get('/current/document', (req: Request, res: Response) => {
    const document = toDocument(sessionOf(req).currentTrip);
    res.json({ document, text: formatDocument(document) });
  });

  return router;
}
