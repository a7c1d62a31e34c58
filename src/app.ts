import cors from 'cors';
import express, { Express } from 'express';

import type { Advisor } from './agents/advisor';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createAdviceRouter } from './routes/advice';
import { createAnalyzeRouter } from './routes/analyze';
import { createLearningPathRouter } from './routes/create';
import { createInfoRouter } from './routes/info';
import { createMatchRouter } from './routes/match';
import { createResearchRouter } from './routes/research';
import { createUiRouter } from './routes/ui';

export type AppOptions = {
  advisor: Advisor | null;
  corsOrigin?: string;
};

export const createApp = ({ advisor, corsOrigin = '*' }: AppOptions): Express => {
  const app = express();

  // "*" reflects the caller's origin so credentialed requests still pass.
  const origin = corsOrigin === '*' ? true : corsOrigin.split(',').map((entry) => entry.trim());
  app.use(cors({ origin, credentials: true }));
  app.use(requestLogger);
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/', createInfoRouter(advisor));
  app.use('/analyze', createAnalyzeRouter(advisor));
  app.use('/match', createMatchRouter(advisor));
  app.use('/create', createLearningPathRouter(advisor));
  app.use('/research', createResearchRouter(advisor));
  app.use('/advice', createAdviceRouter(advisor));
  app.use('/ui', createUiRouter(advisor));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
