import Joi from 'joi';
import { config, MomoEnvironment } from '../config';
import { MomoStatusResult, normalizeMomoStatus } from '../gateways/momo.gateway';
import { normalizePaystackStatus, PaymentGateway } from '../gateways/paystack.gateway';
import { DocumentStore } from '../store/document-store';
import { GatewayResult, TransactionStatus, WebhookOutcome } from '../types';
import { hmacHex, safeCompare } from '../utils/crypto';
import { ERROR_CODES, errorMessage, isAppError } from '../utils/errors';
import { logger } from '../utils/logger';
import { fromMinorUnits } from '../utils/money';
import { DepositService } from './deposit.service';
import { MomoService } from './momo.service';
import { WithdrawalService } from './withdrawal.service';

export interface WebhookRequest {
  method: string;
  rawBody: Buffer | string;
  headers: Record<string, string | string[] | undefined>;
  query: Record<string, unknown>;
}

export interface WebhookOptions {
  paystackSecretKey?: string;
  momoSigningSecret?: string;
  momoWebhookToken?: string;
  momoEnvironment: MomoEnvironment;
  requireCrossVerification: boolean;
}

const defaultOptions = (): WebhookOptions => ({
  paystackSecretKey: config.paystack.secretKey,
  momoSigningSecret: config.momo.webhookSigningSecret,
  momoWebhookToken: config.momo.webhookToken,
  momoEnvironment: config.momo.environment,
  requireCrossVerification: config.webhook.requireCrossVerification
});

interface PaystackEventData {
  reference: string;
  amount?: number;
  currency?: string;
  channel?: string;
  status?: string;
  transfer_code?: string;
  reason?: string;
}

interface PaystackEvent {
  event: string;
  data: PaystackEventData;
}

const paystackEventSchema = Joi.object<PaystackEvent>({
  event: Joi.string().required(),
  data: Joi.object<PaystackEventData>({
    reference: Joi.string().required(),
    amount: Joi.number(),
    currency: Joi.string(),
    channel: Joi.string(),
    status: Joi.string(),
    transfer_code: Joi.string(),
    reason: Joi.string().allow('')
  })
    .unknown(true)
    .required()
}).unknown(true);

interface MomoCallback {
  externalId: string;
  status: string;
  financialTransactionId?: string;
}

const momoCallbackSchema = Joi.object<MomoCallback>({
  externalId: Joi.string().required(),
  status: Joi.string().required(),
  financialTransactionId: Joi.string()
}).unknown(true);

type PaystackEventName = 'charge.success' | 'transfer.success' | 'transfer.failed' | 'transfer.reversed';

type PaystackHandler = (event: PaystackEventData, verified: GatewayResult | null) => Promise<WebhookOutcome>;

const processed = (message: string): WebhookOutcome => ({ kind: 'processed', httpStatus: 200, message });
const ignored = (message: string): WebhookOutcome => ({ kind: 'ignored', httpStatus: 200, message });
const rejected = (
  httpStatus: 400 | 401 | 403 | 404 | 405 | 502 | 503,
  message: string
): WebhookOutcome => ({ kind: 'rejected', httpStatus, message });

const header = (headers: WebhookRequest['headers'], name: string): string | undefined => {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
};

const parseJson = (rawBody: Buffer | string): unknown => {
  try {
    return JSON.parse(rawBody.toString());
  } catch (error) {
    logger.warn('Webhook body is not valid JSON', { error: errorMessage(error) });
    return undefined;
  }
};

/**
 * Inbound gateway callbacks. Every delivery is authenticated, matched to a
 * record we created and re-checked against the gateway before money moves.
 * Replays settle to `ignored` through processed and refunded flags and the
 * state machine.
 */
export class WebhookService {
  private readonly paystackHandlers: Record<PaystackEventName, PaystackHandler> = {
    'charge.success': (event, verified) => this.handleChargeSuccess(event, verified),
    'transfer.success': (event, verified) => this.settleTransfer(event, verified, TransactionStatus.COMPLETED),
    'transfer.failed': (event, verified) => this.settleTransfer(event, verified, TransactionStatus.FAILED),
    'transfer.reversed': (event, verified) => this.settleTransfer(event, verified, TransactionStatus.FAILED)
  };

  constructor(
    private readonly store: DocumentStore,
    private readonly gateway: PaymentGateway,
    private readonly deposits: DepositService,
    private readonly withdrawals: WithdrawalService,
    private readonly momo: MomoService,
    private readonly options: WebhookOptions = defaultOptions()
  ) {}

  async handlePaystackWebhook(request: WebhookRequest): Promise<WebhookOutcome> {
    if (request.method !== 'POST') {
      return rejected(405, 'Method Not Allowed');
    }

    const secret = this.options.paystackSecretKey;
    if (!secret) {
      logger.error('Card gateway webhook rejected: secret key not configured');
      return rejected(503, 'Service not configured');
    }

    const signature = header(request.headers, 'x-paystack-signature');
    if (!signature) {
      return rejected(401, 'Missing signature');
    }
    if (!safeCompare(signature, hmacHex('sha512', secret, request.rawBody))) {
      logger.warn('Card gateway webhook rejected: invalid signature');
      return rejected(401, 'Invalid signature');
    }

    const { value: event, error } = paystackEventSchema.validate(parseJson(request.rawBody));
    if (error || event === undefined) {
      return rejected(400, 'Bad Request');
    }

    const name = event.event;
    if (!this.isPaystackEvent(name)) {
      logger.info(`Unhandled card gateway event ${name}`);
      return ignored(`Unhandled event ${name}`);
    }

    const { reference } = event.data;
    const isCharge = name === 'charge.success';
    const exists = isCharge
      ? await this.store.get('payments', reference)
      : await this.store.get('withdrawals', reference);
    if (!exists) {
      logger.warn(`Card gateway webhook for unknown reference ${reference}`, { event: name });
      return rejected(404, 'Transaction not found');
    }

    let verified: GatewayResult | null = null;
    try {
      verified = isCharge
        ? await this.gateway.verifyTransaction(reference)
        : await this.gateway.fetchTransfer(reference);
    } catch (verifyError) {
      logger.warn('Card gateway cross-verification failed', { reference, error: errorMessage(verifyError) });
    }
    if (!verified && this.options.requireCrossVerification) {
      return rejected(502, 'Unable to verify transaction status');
    }

    return this.dispatch(reference, () => this.paystackHandlers[name](event.data, verified));
  }

  async handleMomoWebhook(request: WebhookRequest): Promise<WebhookOutcome> {
    if (request.method !== 'POST') {
      return rejected(405, 'Method Not Allowed');
    }

    const signingSecret = this.options.momoSigningSecret;
    if (signingSecret) {
      const signature = header(request.headers, 'x-momo-signature');
      if (!signature || !safeCompare(signature, hmacHex('sha256', signingSecret, request.rawBody))) {
        logger.warn('MoMo webhook rejected: invalid signature');
        return rejected(401, 'Invalid signature');
      }
    }

    const expectedToken = this.options.momoWebhookToken;
    if (expectedToken) {
      const token = request.query.token;
      if (typeof token !== 'string' || !safeCompare(token, expectedToken)) {
        logger.warn('MoMo webhook rejected: invalid or missing token');
        return rejected(403, 'Forbidden');
      }
    } else if (this.options.momoEnvironment === 'production') {
      logger.error('MoMo webhook rejected: no webhook token configured in production');
      return rejected(503, 'Service misconfigured');
    }

    const { value: callback, error } = momoCallbackSchema.validate(parseJson(request.rawBody));
    if (error || callback === undefined) {
      return rejected(400, 'Bad Request');
    }

    const record = await this.store.get('momo_transactions', callback.externalId);
    if (!record) {
      logger.warn(`MoMo webhook for unknown reference ${callback.externalId}`);
      return rejected(404, 'Transaction not found');
    }

    let verifiedStatus: string | null = null;
    let verified: MomoStatusResult | null = null;
    try {
      const result = await this.momo.queryProviderStatus(record);
      verified = result;
      verifiedStatus = result.providerStatus;
      if (verifiedStatus !== callback.status) {
        logger.warn('MoMo callback status differs from provider', {
          referenceId: callback.externalId,
          callback: callback.status,
          provider: verifiedStatus
        });
      }
    } catch (verifyError) {
      logger.warn('MoMo cross-verification failed', {
        referenceId: callback.externalId,
        error: errorMessage(verifyError)
      });
    }
    if (!verified && this.options.requireCrossVerification) {
      return rejected(502, 'Unable to verify transaction status');
    }

    const effective = {
      status: verified?.status ?? normalizeMomoStatus(callback.status),
      providerStatus: verified?.providerStatus ?? callback.status,
      financialTransactionId: verified?.financialTransactionId ?? callback.financialTransactionId
    };
    return this.dispatch(callback.externalId, async () => {
      const settlement = await this.momo.applyProviderStatus(
        callback.externalId,
        effective,
        { callbackStatus: callback.status, verifiedStatus }
      );
      return settlement.applied
        ? processed(`MoMo transaction ${settlement.status}`)
        : ignored(`No action for status ${effective.providerStatus}`);
    });
  }

  private isPaystackEvent(event: string): event is PaystackEventName {
    return Object.prototype.hasOwnProperty.call(this.paystackHandlers, event);
  }

  private async dispatch(reference: string, handle: () => Promise<WebhookOutcome>): Promise<WebhookOutcome> {
    try {
      return await handle();
    } catch (error) {
      if (isAppError(error, ERROR_CODES.TXN_INVALID_STATE)) {
        logger.info(`Webhook for ${reference} ignored: ${error.message}`);
        return ignored(error.message);
      }
      logger.error('Webhook processing error', { reference, error: errorMessage(error) });
      return { kind: 'retry', httpStatus: 500, message: 'Error processing webhook' };
    }
  }

  private async handleChargeSuccess(event: PaystackEventData, verified: GatewayResult | null): Promise<WebhookOutcome> {
    const status = verified?.status ?? TransactionStatus.COMPLETED;
    if (status !== TransactionStatus.COMPLETED) {
      logger.warn(`Charge ${event.reference} reported successful but gateway says ${verified?.providerStatus}`);
      return ignored(`Charge not successful: ${verified?.providerStatus}`);
    }

    const confirmation = await this.deposits.confirmDeposit(event.reference, {
      amount: verified?.amount ?? fromMinorUnits(event.amount ?? 0),
      currency: verified?.currency ?? event.currency ?? '',
      channel: event.channel
    });
    return confirmation.alreadyProcessed
      ? ignored('Payment already processed')
      : processed(`Credited ${confirmation.amount} ${confirmation.currency}`);
  }

  /**
   * The gateway's answer wins over the event name; the event only decides
   * what to do when verification was unavailable and not required.
   */
  private async settleTransfer(
    event: PaystackEventData,
    verified: GatewayResult | null,
    implied: TransactionStatus
  ): Promise<WebhookOutcome> {
    const reported = event.status ? normalizePaystackStatus(event.status) : implied;
    if (verified && verified.status !== reported) {
      logger.warn('Transfer event status differs from gateway', {
        reference: event.reference,
        event: reported,
        gateway: verified.providerStatus
      });
    }
    const status = verified?.status ?? reported;

    if (status === TransactionStatus.COMPLETED) {
      const settlement = await this.withdrawals.completeTransfer(event.reference, event.transfer_code);
      return processed(`Withdrawal ${settlement.status}`);
    }
    if (status === TransactionStatus.FAILED) {
      const settlement = await this.withdrawals.failTransfer(event.reference, event.reason || 'Transfer failed');
      return settlement.refunded
        ? processed(`Withdrawal ${settlement.status} and refunded`)
        : ignored('Withdrawal already refunded');
    }
    return ignored(`No action for transfer status ${verified?.providerStatus ?? status}`);
  }
}
