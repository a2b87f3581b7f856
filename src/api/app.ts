import express from 'express';
import { Supervisor } from '../services/supervision/index.js';
import { setupOpenAPI } from './openapi/index.js';
import { createSupervisionRouter } from './routes/supervision.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';

export function createApp(supervisor: Supervisor = new Supervisor()): express.Express {
  const app = express();

  app.use(express.json({ limit: '5mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createSupervisionRouter(supervisor));

  app.use(errorHandler);

  return app;
}
