import { Request, Response } from 'express';
import { WebhookRequest, WebhookService } from '../services/webhook.service';
import { WebhookOutcome } from '../types';
import { asyncHandler } from '../utils/async-handler';
import { logger } from '../utils/logger';

const toWebhookRequest = (req: Request): WebhookRequest => ({
  method: req.method,
  rawBody: Buffer.isBuffer(req.body) ? req.body : '',
  headers: req.headers,
  query: req.query
});

const reply = (res: Response, source: string, outcome: WebhookOutcome): void => {
  if (outcome.kind === 'rejected' || outcome.kind === 'retry') {
    logger.warn(`${source} webhook ${outcome.kind}: ${outcome.message}`);
  }
  res.status(outcome.httpStatus).send(outcome.kind === 'retry' ? 'Error' : outcome.message);
};

export class WebhookController {
  constructor(private readonly webhookService: WebhookService) {}

  handleGatewayWebhook = asyncHandler(async (req: Request, res: Response) => {
    reply(res, 'Card gateway', await this.webhookService.handlePaystackWebhook(toWebhookRequest(req)));
  });

  handleMomoWebhook = asyncHandler(async (req: Request, res: Response) => {
    reply(res, 'MoMo', await this.webhookService.handleMomoWebhook(toWebhookRequest(req)));
  });
}
