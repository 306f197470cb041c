/**
 * Jobs Handlers
 *
 * Manual triggers for the ingestion jobs. The scheduler calls the same
 * endpoints.
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ApiResponse, BackfillResult, MorningBriefOutcome, PruneResult } from '../shared.js';
import { backfillRequestSchema } from '../shared.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validate } from '../middleware/validate.js';
import { createBriefGenerator } from '../services/brief-generator.service.js';
import { backfillHistory, runMorningBrief } from '../services/morning-brief.service.js';
import { createOuraClient } from '../services/oura.service.js';
import { pruneRawSnapshots } from '../services/retention.service.js';

export const jobsRouter = Router();

// POST /jobs/morning-brief
jobsRouter.post(
  '/morning-brief',
  asyncHandler(async (_req: Request, res: Response, _next: NextFunction) => {
    const outcome = await runMorningBrief({
      source: createOuraClient(),
      generator: createBriefGenerator(),
    });

    const response: ApiResponse<MorningBriefOutcome> = { success: true, data: outcome };
    res.status(outcome.status === 'delayed' ? 202 : 200).json(response);
  })
);

// POST /jobs/backfill
jobsRouter.post(
  '/backfill',
  validate(backfillRequestSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { days } = backfillRequestSchema.parse(req.body);
    const result = await backfillHistory(createOuraClient(), days);

    const response: ApiResponse<BackfillResult> = { success: true, data: result };
    res.json(response);
  })
);

// POST /jobs/prune
jobsRouter.post('/prune', (_req: Request, res: Response): void => {
  const response: ApiResponse<PruneResult> = { success: true, data: pruneRawSnapshots() };
  res.json(response);
});
