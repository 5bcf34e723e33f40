import express, { Router } from 'express';
import { WebhookController } from '../controllers/webhook.controller';
import { webhookRateLimiter } from '../middleware/rate-limiter';

/**
 * Gateway callbacks. Mounted ahead of the JSON parser: signatures are
 * computed over the raw bytes. Every method is routed so the handler can
 * answer 405 itself.
 */
export const webhookRoutes = (webhookController: WebhookController): Router => {
  const router = Router();
  const rawBody = express.raw({ type: '*/*', limit: '1mb' });

  router.all('/gatewayWebhook', webhookRateLimiter, rawBody, webhookController.handleGatewayWebhook);
  router.all('/momoWebhook', webhookRateLimiter, rawBody, webhookController.handleMomoWebhook);

  return router;
};
