import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { errorHandler } from './middleware/error-handler.js';
import { agentRouter } from './handlers/agent.js';
import { baselinesRouter } from './handlers/baselines.js';
import { briefsRouter } from './handlers/briefs.js';
import { healthRouter } from './handlers/health.js';
import { interventionsRouter } from './handlers/interventions.js';
import { jobsRouter } from './handlers/jobs.js';
import { metricsRouter } from './handlers/metrics.js';

export function createApp(): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: true }));
  app.use(express.json());

  app.use('/health', healthRouter);
  app.use('/metrics', metricsRouter);
  app.use('/baselines', baselinesRouter);
  app.use('/interventions', interventionsRouter);
  app.use('/briefs', briefsRouter);
  app.use('/jobs', jobsRouter);
  app.use('/agent', agentRouter);

  app.use(errorHandler);

  return app;
}
