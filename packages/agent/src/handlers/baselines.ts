/**
 * Baselines Handlers
 */

import { Router, type Request, type Response } from 'express';
import type { ApiResponse, BaselineSet } from '../shared.js';
import { loadBaselines, resetBaselines } from '../services/baseline.service.js';

export const baselinesRouter = Router();

// GET /baselines
baselinesRouter.get('/', (_req: Request, res: Response): void => {
  const response: ApiResponse<BaselineSet> = { success: true, data: loadBaselines() };
  res.json(response);
});

// POST /baselines/reset
baselinesRouter.post('/reset', (_req: Request, res: Response): void => {
  const response: ApiResponse<BaselineSet> = { success: true, data: resetBaselines() };
  res.json(response);
});
