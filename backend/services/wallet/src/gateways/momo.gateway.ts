import Joi from 'joi';
import { AppConfig, config, MomoProductCredentials } from '../config';
import { GatewayResult, MomoPayment, MomoProduct, TransactionStatus } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { createAppError, ERROR_CODES, serviceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { normalizeStatus } from '../services/transaction-state.service';
import { HttpResponse, HttpTransport } from './http-transport';

export type MomoOptions = AppConfig['momo'];

export interface MomoSubmission {
  referenceId: string;
  accepted: boolean;
  httpStatus: number;
}

export interface MomoStatusResult extends GatewayResult {
  financialTransactionId?: string;
  reason?: string;
}

export interface MomoAccountBalance {
  product: MomoProduct;
  availableBalance: number;
  currency: string;
}

/**
 * Mobile-money provider operations. Submissions are asynchronous: the
 * provider answers 202 and settles later through the callback or a
 * status query.
 */
export interface MobileMoneyGateway {
  requestToPay(payment: MomoPayment): Promise<MomoSubmission>;
  getRequestToPayStatus(referenceId: string): Promise<MomoStatusResult>;
  transfer(payment: MomoPayment): Promise<MomoSubmission>;
  getTransferStatus(referenceId: string): Promise<MomoStatusResult>;
  /** Balance of the merchant account behind a product. */
  getBalance(product: MomoProduct): Promise<MomoAccountBalance>;
}

// Refresh a minute before the provider expires the token
const TOKEN_EXPIRY_MARGIN_MS = 60 * 1000;

const tokenSchema = Joi.object<{ access_token: string; expires_in: number }>({
  access_token: Joi.string().required(),
  expires_in: Joi.number().integer().positive().default(3600)
}).unknown(true);

interface StatusData {
  status: string;
  amount?: string;
  currency?: string;
  externalId?: string;
  financialTransactionId?: string;
  reason?: unknown;
}

const statusSchema = Joi.object<StatusData>({
  status: Joi.string().required(),
  amount: Joi.string(),
  currency: Joi.string(),
  externalId: Joi.string(),
  financialTransactionId: Joi.string(),
  reason: Joi.any()
}).unknown(true);

// The provider sends availableBalance as a decimal string
const balanceSchema = Joi.object<{ availableBalance: number; currency: string }>({
  availableBalance: Joi.number().required(),
  currency: Joi.string().required()
}).unknown(true);

/**
 * Provider statuses are SUCCESSFUL, FAILED and PENDING; anything else is
 * treated as still pending.
 */
export const normalizeMomoStatus = (providerStatus: string): TransactionStatus => {
  const status = normalizeStatus(providerStatus);
  if (status === TransactionStatus.COMPLETED || status === TransactionStatus.FAILED) {
    return status;
  }
  return TransactionStatus.PENDING;
};

/** MSISDN without the leading plus. */
export const toMsisdn = (phoneNumber: string): string => phoneNumber.replace(/^\+/, '').replace(/\s+/g, '');

export class MtnMomoGateway implements MobileMoneyGateway {
  private readonly tokens = new Map<MomoProduct, { token: string; expiresAt: number }>();

  constructor(
    private readonly http: HttpTransport,
    private readonly options: MomoOptions = config.momo,
    private readonly clock: Clock = systemClock
  ) {}

  async requestToPay(payment: MomoPayment): Promise<MomoSubmission> {
    const response = await this.call('collection', 'POST', '/v1_0/requesttopay', payment.referenceId, {
      amount: String(payment.amount),
      currency: payment.currency,
      externalId: payment.referenceId,
      payer: { partyIdType: 'MSISDN', partyId: toMsisdn(payment.phoneNumber) },
      payerMessage: payment.payerMessage,
      payeeNote: payment.payeeNote
    });
    return { referenceId: payment.referenceId, accepted: response.status === 202, httpStatus: response.status };
  }

  async transfer(payment: MomoPayment): Promise<MomoSubmission> {
    const response = await this.call('disbursement', 'POST', '/v1_0/transfer', payment.referenceId, {
      amount: String(payment.amount),
      currency: payment.currency,
      externalId: payment.referenceId,
      payee: { partyIdType: 'MSISDN', partyId: toMsisdn(payment.phoneNumber) },
      payerMessage: payment.payerMessage,
      payeeNote: payment.payeeNote
    });
    return { referenceId: payment.referenceId, accepted: response.status === 202, httpStatus: response.status };
  }

  async getRequestToPayStatus(referenceId: string): Promise<MomoStatusResult> {
    return this.status('collection', `/v1_0/requesttopay/${encodeURIComponent(referenceId)}`, referenceId);
  }

  async getTransferStatus(referenceId: string): Promise<MomoStatusResult> {
    return this.status('disbursement', `/v1_0/transfer/${encodeURIComponent(referenceId)}`, referenceId);
  }

  async getBalance(product: MomoProduct): Promise<MomoAccountBalance> {
    const response = await this.call(product, 'GET', '/v1_0/account/balance');
    if (response.status !== 200) {
      throw serviceError('momo', new Error(`Balance query returned HTTP ${response.status}`), { product });
    }

    const { value, error } = balanceSchema.validate(response.data);
    if (error || value === undefined) {
      throw serviceError('momo', new Error('Unexpected balance payload'), { product });
    }
    return { product, availableBalance: value.availableBalance, currency: value.currency };
  }

  private async status(product: MomoProduct, path: string, referenceId: string): Promise<MomoStatusResult> {
    const response = await this.call(product, 'GET', path, referenceId);
    if (response.status !== 200) {
      throw serviceError('momo', new Error(`Status query returned HTTP ${response.status}`), {
        referenceId,
        product
      });
    }

    const { value, error } = statusSchema.validate(response.data);
    if (error || value === undefined) {
      throw serviceError('momo', new Error('Unexpected status payload'), { referenceId, product });
    }

    return {
      status: normalizeMomoStatus(value.status),
      providerStatus: value.status,
      providerReference: value.externalId ?? referenceId,
      amount: value.amount === undefined ? undefined : Number(value.amount),
      currency: value.currency,
      financialTransactionId: value.financialTransactionId,
      reason: typeof value.reason === 'string' ? value.reason : undefined,
      raw: value
    };
  }

  private credentials(product: MomoProduct): Required<MomoProductCredentials> {
    const credentials = product === 'collection' ? this.options.collections : this.options.disbursements;
    const { subscriptionKey, apiUser, apiKey } = credentials;
    if (!subscriptionKey || !apiUser || !apiKey) {
      const service = product === 'collection' ? 'momo_collections' : 'momo_disbursements';
      throw createAppError(ERROR_CODES.CONFIG_MISSING, `The ${service} service is not configured.`, { service });
    }
    return { subscriptionKey, apiUser, apiKey };
  }

  /**
   * Bearer token per product, cached until shortly before it expires.
   */
  private async accessToken(product: MomoProduct): Promise<string> {
    const now = this.clock().getTime();
    const cached = this.tokens.get(product);
    if (cached && cached.expiresAt > now) {
      return cached.token;
    }

    const { subscriptionKey, apiUser, apiKey } = this.credentials(product);
    let response: HttpResponse;
    try {
      response = await this.http.send({
        method: 'POST',
        url: `${this.options.baseUrl}/${product}/token/`,
        headers: {
          Authorization: `Basic ${Buffer.from(`${apiUser}:${apiKey}`).toString('base64')}`,
          'Ocp-Apim-Subscription-Key': subscriptionKey,
          'Content-Type': 'application/json'
        }
      });
    } catch (error) {
      throw serviceError('momo', error, { product, step: 'token' });
    }

    const { value, error } = tokenSchema.validate(response.data);
    if (response.status !== 200 || error || value === undefined) {
      throw serviceError('momo', new Error(`Token request returned HTTP ${response.status}`), {
        product,
        step: 'token'
      });
    }

    this.tokens.set(product, {
      token: value.access_token,
      expiresAt: now + value.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS
    });
    logger.debug(`Obtained MoMo ${product} access token`);
    return value.access_token;
  }

  private callbackUrl(): string | undefined {
    if (this.options.environment === 'sandbox' || !this.options.callbackUrl) {
      return undefined;
    }
    if (!this.options.webhookToken) {
      return this.options.callbackUrl;
    }
    const url = new URL(this.options.callbackUrl);
    url.searchParams.set('token', this.options.webhookToken);
    return url.toString();
  }

  private async call(
    product: MomoProduct,
    method: 'GET' | 'POST',
    path: string,
    referenceId?: string,
    body?: unknown
  ): Promise<HttpResponse> {
    const { subscriptionKey } = this.credentials(product);
    const token = await this.accessToken(product);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      ...(referenceId ? { 'X-Reference-Id': referenceId } : {}),
      'X-Target-Environment': this.options.targetEnvironment,
      'Ocp-Apim-Subscription-Key': subscriptionKey,
      'Content-Type': 'application/json'
    };
    const callbackUrl = method === 'POST' ? this.callbackUrl() : undefined;
    if (callbackUrl) {
      headers['X-Callback-Url'] = callbackUrl;
    }

    try {
      return await this.http.send({
        method,
        url: `${this.options.baseUrl}/${product}${path}`,
        headers,
        data: body
      });
    } catch (error) {
      throw serviceError('momo', error, { product, path, referenceId });
    }
  }
}
