import Joi from 'joi';
import { config } from '../config';
import {
  Bank,
  CheckoutSession,
  GatewayResult,
  ResolvedAccount,
  TransactionStatus,
  TransferInitiation,
  TransferRecipient
} from '../types';
import { createAppError, ERROR_CODES, ErrorDetails, serviceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { fromMinorUnits, toMinorUnits } from '../utils/money';
import { HttpMethod, HttpResponse, HttpTransport } from './http-transport';

export interface PaystackOptions {
  secretKey?: string;
  baseUrl: string;
  callbackUrl?: string;
}

export type RecipientType = 'nuban' | 'mobile_money';

export interface CreateRecipientParams {
  type: RecipientType;
  name: string;
  accountNumber: string;
  bankCode: string;
  currency: string;
}

export interface InitiateTransferParams {
  amount: number;
  currency: string;
  recipientCode: string;
  reference: string;
  reason: string;
}

export interface InitializeTransactionParams {
  email: string;
  amount: number;
  currency: string;
  reference: string;
  metadata: Record<string, string>;
}

export interface ChargeParams extends InitializeTransactionParams {
  provider: string;
  phoneNumber: string;
}

/**
 * Card/bank gateway operations the wallet relies on.
 */
export interface PaymentGateway {
  verifyTransaction(reference: string): Promise<GatewayResult>;
  fetchTransfer(reference: string): Promise<GatewayResult>;
  createTransferRecipient(params: CreateRecipientParams): Promise<TransferRecipient>;
  initiateTransfer(params: InitiateTransferParams): Promise<TransferInitiation>;
  finalizeTransfer(transferCode: string, otp: string): Promise<GatewayResult>;
  initializeTransaction(params: InitializeTransactionParams): Promise<CheckoutSession>;
  charge(params: ChargeParams): Promise<GatewayResult>;
  listBanks(country: string): Promise<Bank[]>;
  resolveAccount(accountNumber: string, bankCode: string): Promise<ResolvedAccount>;
}

const PAYSTACK_STATUS: Record<string, TransactionStatus> = {
  success: TransactionStatus.COMPLETED,
  failed: TransactionStatus.FAILED,
  abandoned: TransactionStatus.FAILED,
  reversed: TransactionStatus.FAILED,
  rejected: TransactionStatus.FAILED,
  otp: TransactionStatus.PENDING_OTP,
  processing: TransactionStatus.PROCESSING
};

/**
 * Anything the gateway has not settled either way is still pending.
 */
export const normalizePaystackStatus = (providerStatus: string): TransactionStatus =>
  PAYSTACK_STATUS[providerStatus.toLowerCase()] ?? TransactionStatus.PENDING;

interface Envelope {
  status: boolean;
  message: string;
  data?: unknown;
}

const envelopeSchema = Joi.object<Envelope>({
  status: Joi.boolean().required(),
  message: Joi.string().allow('').default(''),
  data: Joi.any()
}).unknown(true);

interface TransactionData {
  reference: string;
  status: string;
  amount: number;
  currency: string;
}

const transactionSchema = Joi.object<TransactionData>({
  reference: Joi.string().required(),
  status: Joi.string().required(),
  amount: Joi.number().required(),
  currency: Joi.string().required()
}).unknown(true);

interface TransferData {
  reference: string;
  status: string;
  amount?: number;
  currency?: string;
  transfer_code?: string;
}

const transferSchema = Joi.object<TransferData>({
  reference: Joi.string().required(),
  status: Joi.string().required(),
  amount: Joi.number(),
  currency: Joi.string(),
  transfer_code: Joi.string()
}).unknown(true);

interface ChargeData {
  reference: string;
  status: string;
}

const chargeSchema = Joi.object<ChargeData>({
  reference: Joi.string().required(),
  status: Joi.string().required()
}).unknown(true);

const recipientSchema = Joi.object<{ recipient_code: string; details?: { account_name?: string } }>({
  recipient_code: Joi.string().required(),
  details: Joi.object({ account_name: Joi.string().allow(null, '') }).unknown(true)
}).unknown(true);

const checkoutSchema = Joi.object<{ authorization_url: string; access_code: string; reference: string }>({
  authorization_url: Joi.string().required(),
  access_code: Joi.string().required(),
  reference: Joi.string().required()
}).unknown(true);

const banksSchema = Joi.array<Array<{ name: string; code: string; type?: string }>>().items(
  Joi.object({
    name: Joi.string().required(),
    code: Joi.string().required(),
    type: Joi.string()
  }).unknown(true)
);

const accountSchema = Joi.object<{ account_number: string; account_name: string }>({
  account_number: Joi.string().required(),
  account_name: Joi.string().required()
}).unknown(true);

export class PaystackGateway implements PaymentGateway {
  constructor(
    private readonly http: HttpTransport,
    private readonly options: PaystackOptions = config.paystack
  ) {}

  async verifyTransaction(reference: string): Promise<GatewayResult> {
    const data = await this.request('GET', `/transaction/verify/${encodeURIComponent(reference)}`, transactionSchema, {
      reference
    });
    return {
      status: normalizePaystackStatus(data.status),
      providerStatus: data.status,
      providerReference: data.reference,
      amount: fromMinorUnits(data.amount),
      currency: data.currency,
      raw: data
    };
  }

  async fetchTransfer(reference: string): Promise<GatewayResult> {
    const data = await this.request('GET', `/transfer/verify/${encodeURIComponent(reference)}`, transferSchema, {
      reference
    });
    return this.toTransferResult(data);
  }

  async createTransferRecipient(params: CreateRecipientParams): Promise<TransferRecipient> {
    const data = await this.request(
      'POST',
      '/transferrecipient',
      recipientSchema,
      { type: params.type },
      {
        type: params.type,
        name: params.name,
        account_number: params.accountNumber,
        bank_code: params.bankCode,
        currency: params.currency
      }
    );
    return {
      recipientCode: data.recipient_code,
      accountName: data.details?.account_name || undefined
    };
  }

  async initiateTransfer(params: InitiateTransferParams): Promise<TransferInitiation> {
    const data = await this.request(
      'POST',
      '/transfer',
      transferSchema,
      { reference: params.reference },
      {
        source: 'balance',
        amount: toMinorUnits(params.amount),
        currency: params.currency,
        recipient: params.recipientCode,
        reference: params.reference,
        reason: params.reason
      }
    );
    const result = this.toTransferResult(data);
    return {
      ...result,
      transferCode: data.transfer_code,
      requiresOtp: result.status === TransactionStatus.PENDING_OTP
    };
  }

  async finalizeTransfer(transferCode: string, otp: string): Promise<GatewayResult> {
    const data = await this.request(
      'POST',
      '/transfer/finalize_transfer',
      transferSchema,
      { transferCode },
      { transfer_code: transferCode, otp }
    );
    return this.toTransferResult(data);
  }

  async initializeTransaction(params: InitializeTransactionParams): Promise<CheckoutSession> {
    const data = await this.request(
      'POST',
      '/transaction/initialize',
      checkoutSchema,
      { reference: params.reference },
      {
        email: params.email,
        amount: toMinorUnits(params.amount),
        currency: params.currency,
        reference: params.reference,
        metadata: params.metadata,
        ...(this.options.callbackUrl ? { callback_url: this.options.callbackUrl } : {})
      }
    );
    return {
      authorizationUrl: data.authorization_url,
      accessCode: data.access_code,
      reference: data.reference
    };
  }

  async charge(params: ChargeParams): Promise<GatewayResult> {
    const data = await this.request(
      'POST',
      '/charge',
      chargeSchema,
      { reference: params.reference },
      {
        email: params.email,
        amount: toMinorUnits(params.amount),
        currency: params.currency,
        reference: params.reference,
        metadata: params.metadata,
        mobile_money: { phone: params.phoneNumber, provider: params.provider }
      }
    );
    return {
      status: normalizePaystackStatus(data.status),
      providerStatus: data.status,
      providerReference: data.reference,
      amount: params.amount,
      currency: params.currency,
      raw: data
    };
  }

  async listBanks(country: string): Promise<Bank[]> {
    const data = await this.request('GET', '/bank', banksSchema, { country }, undefined, {
      country,
      perPage: '100'
    });
    return data.map((bank) => ({ name: bank.name, code: bank.code, type: bank.type }));
  }

  async resolveAccount(accountNumber: string, bankCode: string): Promise<ResolvedAccount> {
    const data = await this.request('GET', '/bank/resolve', accountSchema, { bankCode }, undefined, {
      account_number: accountNumber,
      bank_code: bankCode
    });
    return { accountNumber: data.account_number, accountName: data.account_name };
  }

  private toTransferResult(data: TransferData): GatewayResult {
    return {
      status: normalizePaystackStatus(data.status),
      providerStatus: data.status,
      providerReference: data.reference,
      amount: data.amount === undefined ? undefined : fromMinorUnits(data.amount),
      currency: data.currency,
      raw: data
    };
  }

  /**
   * Sends one request and decodes the `data` member of the envelope.
   * Transport failures, non-2xx replies and `status: false` envelopes all
   * surface as SERVICE_PAYSTACK_ERROR.
   */
  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: Joi.Schema<T>,
    context: ErrorDetails,
    body?: unknown,
    params?: Record<string, string>
  ): Promise<T> {
    if (!this.options.secretKey) {
      throw createAppError(ERROR_CODES.CONFIG_MISSING, 'The paystack service is not configured.', {
        service: 'paystack'
      });
    }

    let response: HttpResponse;
    try {
      response = await this.http.send({
        method,
        url: `${this.options.baseUrl}${path}`,
        headers: {
          Authorization: `Bearer ${this.options.secretKey}`,
          'Content-Type': 'application/json'
        },
        params,
        data: body
      });
    } catch (error) {
      throw serviceError('paystack', error, { path, ...context });
    }

    const envelope = envelopeSchema.validate(response.data);
    if (envelope.error || envelope.value === undefined) {
      throw serviceError('paystack', new Error(`Malformed response (HTTP ${response.status})`), { path, ...context });
    }
    if (response.status >= 400 || !envelope.value.status) {
      throw serviceError('paystack', new Error(envelope.value.message || `HTTP ${response.status}`), {
        path,
        httpStatus: response.status,
        ...context
      });
    }

    const decoded = schema.validate(envelope.value.data);
    if (decoded.error || decoded.value === undefined) {
      logger.warn('Unexpected Paystack payload', { path, error: decoded.error?.message });
      throw serviceError('paystack', new Error('Unexpected response payload'), { path, ...context });
    }
    return decoded.value;
  }
}
