import { TransactionStatus } from './transaction.types';

/**
 * Gateway response reduced to the internal vocabulary. `raw` keeps the
 * provider payload for logging and records; business logic never reads it.
 */
export interface GatewayResult {
  status: TransactionStatus;
  providerStatus: string;
  providerReference: string;
  amount?: number;
  currency?: string;
  raw: unknown;
}

export interface TransferRecipient {
  recipientCode: string;
  accountName?: string;
}

export interface TransferInitiation extends GatewayResult {
  transferCode?: string;
  requiresOtp: boolean;
}

export interface CheckoutSession {
  authorizationUrl: string;
  accessCode: string;
  reference: string;
}

export interface Bank {
  name: string;
  code: string;
  type?: string;
}

export interface ResolvedAccount {
  accountNumber: string;
  accountName: string;
}

export type MomoProduct = 'collection' | 'disbursement';

export interface MomoPayment {
  referenceId: string;
  amount: number;
  currency: string;
  phoneNumber: string;
  payerMessage: string;
  payeeNote: string;
}

/**
 * Outcome of a webhook delivery. `retry` asks the sender to deliver again.
 */
export type WebhookOutcome =
  | { kind: 'processed'; httpStatus: 200; message: string }
  | { kind: 'ignored'; httpStatus: 200; message: string }
  | { kind: 'rejected'; httpStatus: 400 | 401 | 403 | 404 | 405 | 502 | 503; message: string }
  | { kind: 'retry'; httpStatus: 500; message: string };
