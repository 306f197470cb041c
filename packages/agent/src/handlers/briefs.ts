/**
 * Briefs Handlers
 */

import { Router, type Request, type Response } from 'express';
import type { ApiResponse, Brief } from '../shared.js';
import { daysQuerySchema } from '../shared.js';
import { getConfig } from '../config.js';
import { NotFoundError } from '../middleware/error-handler.js';
import { validateQuery } from '../middleware/validate.js';
import { getLatestBrief, loadRecentBriefs } from '../services/history.service.js';

export const briefsRouter = Router();

// GET /briefs/latest
briefsRouter.get('/latest', (_req: Request, res: Response): void => {
  const brief = getLatestBrief();
  if (!brief) {
    throw new NotFoundError('Brief', 'latest');
  }

  const response: ApiResponse<Brief> = { success: true, data: brief };
  res.json(response);
});

// GET /briefs/recent?days=N
briefsRouter.get('/recent', validateQuery(daysQuerySchema), (req: Request, res: Response): void => {
  const { days } = daysQuerySchema.parse(req.query);
  const response: ApiResponse<Brief[]> = {
    success: true,
    data: loadRecentBriefs(days ?? getConfig().recentBriefsDays),
  };
  res.json(response);
});
