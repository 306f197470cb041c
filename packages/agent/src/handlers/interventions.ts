/**
 * Interventions Handlers
 *
 * Log and look up interventions by local date.
 */

import { Router, type Request, type Response } from 'express';
import type { ApiResponse, InterventionEntry } from '../shared.js';
import { dateParamSchema, logInterventionSchema } from '../shared.js';
import { validate, validateParams } from '../middleware/validate.js';
import {
  clearTodayInterventions,
  getInterventions,
  getTodayInterventions,
  logIntervention,
  type LoggedIntervention,
} from '../services/intervention.service.js';

export const interventionsRouter = Router();

// GET /interventions/today
interventionsRouter.get('/today', (_req: Request, res: Response): void => {
  const response: ApiResponse<InterventionEntry[]> = {
    success: true,
    data: getTodayInterventions(),
  };
  res.json(response);
});

// GET /interventions/:date
interventionsRouter.get('/:date', validateParams(dateParamSchema), (req: Request, res: Response): void => {
  const { date } = dateParamSchema.parse(req.params);
  const response: ApiResponse<InterventionEntry[]> = {
    success: true,
    data: getInterventions(date),
  };
  res.json(response);
});

// POST /interventions
interventionsRouter.post(
  '/',
  validate(logInterventionSchema),
  (req: Request, res: Response): void => {
    const { raw, cleaned } = logInterventionSchema.parse(req.body);
    const response: ApiResponse<LoggedIntervention> = {
      success: true,
      data: logIntervention(raw, cleaned),
    };
    res.status(201).json(response);
  }
);

// DELETE /interventions/today
interventionsRouter.delete('/today', (_req: Request, res: Response): void => {
  const response: ApiResponse<{ cleared: boolean }> = {
    success: true,
    data: { cleared: clearTodayInterventions() },
  };
  res.json(response);
});
