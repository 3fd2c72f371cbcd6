import express from 'express';
import { Container } from './container';
import logger from './config/logger';
import { createWhatsAppRouter } from './routes/whatsapp.routes';

export function createApp(container: Container): express.Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/', createWhatsAppRouter(container.whatsappController));

  app.get('/', (req, res) => {
    res.json({
      service: 'RouteFare Bot API',
      status: 'running',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        whatsapp: {
          webhook: '/webhook (GET for verification, POST for messages)',
        },
      },
    });
  });

  app.get('/health', async (req, res) => {
    try {
      const report = await container.health();
      const healthy = report.database !== 'disconnected' && report.sessions !== 'disconnected';
      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'ok' : 'error',
        ...report,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.error('Health check failed:', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      res.status(503).json({
        status: 'error',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  return app;
}
