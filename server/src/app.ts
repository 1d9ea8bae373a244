import express from 'express';
import cors from 'cors';
import authRouter from './routes/auth.js';
import teamsRouter from './routes/teams.js';
import swimmersRouter from './routes/swimmers.js';
import eventsRouter from './routes/events.js';
import meetsRouter from './routes/meets.js';
import timeStandardsRouter from './routes/timeStandards.js';
import swimTimesRouter from './routes/swimTimes.js';
import followsRouter from './routes/follows.js';
import suitsRouter from './routes/suits.js';
import { errorHandler } from './middleware/errorHandler.js';
import { env } from './env.js';

export function createApp() {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', environment: env.ENVIRONMENT });
  });

  const api = express.Router();
  api.use('/auth', authRouter);
  api.use('/teams', teamsRouter);
  api.use('/swimmers', swimmersRouter);
  api.use('/events', eventsRouter);
  api.use('/meets', meetsRouter);
  api.use('/time-standards', timeStandardsRouter);
  api.use('/swim-times', swimTimesRouter);
  api.use('/follows', followsRouter);
  api.use('/suits', suitsRouter);

  app.use('/api/v1', api);
  app.use(errorHandler);

  return app;
}
