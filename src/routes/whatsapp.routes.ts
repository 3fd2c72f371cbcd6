import { Router } from 'express';
import logger from '../config/logger';
import { WhatsAppController } from '../controllers/whatsapp.controller';

/**
 * WhatsApp webhook endpoints
 * GET /webhook - Webhook verification (Meta requirement)
 * POST /webhook - Incoming messages and events
 */
export function createWhatsAppRouter(controller: WhatsAppController): Router {
  const router = Router();

  router.get('/webhook', (req, res) => {
    controller.verifyWebhook(req, res).catch((error: unknown) => {
      logger.error('Unhandled webhook verification error:', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      if (!res.headersSent) {
        res.status(500).send('Internal error');
      }
    });
  });

  router.post('/webhook', (req, res) => {
    controller.receiveWebhook(req, res).catch((error: unknown) => {
      logger.error('Unhandled webhook receive error:', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      if (!res.headersSent) {
        res.status(500).send('Internal error');
      }
    });
  });

  return router;
}
