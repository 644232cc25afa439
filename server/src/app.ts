import express from 'express';
import cors from 'cors';
import { errorHandler } from './middleware/errorHandler.js';
import { createHuntsRouter } from './routes/hunts.js';
import { createProgressRouter } from './routes/progress.js';
import { createPuzzlesRouter } from './routes/puzzles.js';
import { createTeamsRouter } from './routes/teams.js';
import type { Services } from './services/index.js';

export function createApp(services: Services) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/hunts', createHuntsRouter(services));
  app.use('/teams', createTeamsRouter(services));
  app.use('/puzzles', createPuzzlesRouter(services));
  app.use('/', createProgressRouter(services));

  app.use(errorHandler);

  return app;
}
