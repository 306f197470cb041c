/**
 * Metrics Handlers
 *
 * Read access to stored daily records.
 */

import { Router, type Request, type Response } from 'express';
import type { ApiResponse, DailyRecord } from '../shared.js';
import { dateParamSchema, daysQuerySchema } from '../shared.js';
import { getConfig } from '../config.js';
import { NotFoundError } from '../middleware/error-handler.js';
import { validateParams, validateQuery } from '../middleware/validate.js';
import { getDailyRecordRepository } from '../repositories/index.js';
import { loadHistoricalRecords } from '../services/history.service.js';

export const metricsRouter = Router();

// GET /metrics?days=N
metricsRouter.get('/', validateQuery(daysQuerySchema), (req: Request, res: Response): void => {
  const { days } = daysQuerySchema.parse(req.query);
  const records = loadHistoricalRecords(days ?? getConfig().briefHistoryDays);

  const response: ApiResponse<DailyRecord[]> = { success: true, data: records };
  res.json(response);
});

// GET /metrics/:date
metricsRouter.get('/:date', validateParams(dateParamSchema), (req: Request, res: Response): void => {
  const { date } = dateParamSchema.parse(req.params);
  const record = getDailyRecordRepository().findByDate(date);
  if (!record) {
    throw new NotFoundError('Daily record', date);
  }

  const response: ApiResponse<DailyRecord> = { success: true, data: record };
  res.json(response);
});
