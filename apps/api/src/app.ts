import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { EngineError } from '@finplan/engine';
import { AppError } from './errors.js';
import { loadConfig, type AppConfig } from './config.js';
import { debtRoutes } from './routes/debt.js';
import { savingsRoutes } from './routes/savings.js';
import { apiKeyAuth } from './middleware/auth.js';

export function createApp(config: AppConfig = loadConfig()) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(
        { error: { code: err.code, message: err.message, suggestion: err.suggestion } },
        err.status,
      );
    }

    if (err instanceof EngineError) {
      return c.json(
        { error: { code: err.code, message: err.message, suggestion: 'Adjust the scenario inputs' } },
        422,
      );
    }

    console.error(err);
    return c.json(
      { error: { code: 'INTERNAL_ERROR', message: err.message, suggestion: 'Check server logs' } },
      500,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: '0.1.0' }));

  app.use('/api/v1/*', apiKeyAuth(config.apiKey));

  app.route('/api/v1/simulate', debtRoutes(config.currency));
  app.route('/api/v1/savings', savingsRoutes(config.currency));

  return app;
}
