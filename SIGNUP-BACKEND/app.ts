// app.ts
import express from 'express';
import cors from 'cors';
import { Services } from './lib/services';
import { scheduleRouter } from './routes/schedule';
import { signupRouter } from './routes/signup';
import { adminRouter } from './routes/admin';
import { errorHandler } from './middleware/error';

export function createApp(s: Services) {
  const app = express();
  app.use(cors({ origin: s.config.corsOrigin }));
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), uptime: process.uptime() });
  });

  app.use('/api/schedule', scheduleRouter(s));
  app.use('/api/signup', signupRouter(s));
  app.use('/api/admin', adminRouter(s));

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND', path: req.path });
  });
  app.use(errorHandler);

  return app;
}
