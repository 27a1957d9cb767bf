import express from 'express';
import type { FlowOptions } from '../config/flow-config.js';
import { loadConfig, toFlowOptions } from '../config/loader.js';
import { createLogger } from '../utils/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { createScenariosRouter } from './routes/scenarios.js';

const log = createLogger('dashboard');

/**
 * Build the app. Frames are computed per request with `options`; nothing is
 * cached between requests.
 */
export function createApp(options: FlowOptions = toFlowOptions(loadConfig())) {
  const app = express();

  app.use('/api/scenarios', createScenariosRouter(options));

  // API error handler (must come after API routes)
  app.use('/api', errorHandler);

  return app;
}

export async function startDashboard(port: number): Promise<void> {
  const app = createApp();

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`trustflow dashboard running at http://localhost:${port}`);

      const shutdown = () => {
        log.info('Shutting down dashboard');
        server.close(() => {
          resolve();
        });
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        log.error(`Port ${port} is already in use. Try: trustflow serve --port ${port + 1}`);
      }
      reject(err);
    });
  });
}
