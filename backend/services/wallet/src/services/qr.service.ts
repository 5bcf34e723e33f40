import Joi from 'joi';
import { AppConfig, config } from '../config';
import { ServiceReadiness } from '../config/service-readiness';
import { DocumentStore } from '../store/document-store';
import { RequestContext } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { hmacHex, safeCompare } from '../utils/crypto';
import { createAppError, ERROR_CODES, toClientError } from '../utils/errors';
import { KycService } from './kyc.service';
import { DEFAULT_DISPLAY_NAME } from './wallet.service';

export interface SignQrDto {
  walletId: string;
  amount?: number;
  note?: string;
}

export interface SignedQr {
  payload: string;
  signature: string;
  expiresAt: number;
}

export interface QrPayload {
  walletId: string;
  amount: number;
  note: string;
  timestamp: number;
  userId: string;
}

export interface VerifyQrDto {
  payload: string;
  signature: string;
}

export type QrVerification =
  | { valid: false; reason: string }
  | {
      valid: true;
      walletId: string;
      amount: number;
      note: string;
      recipientName: string;
      profilePhotoUrl: string | null;
    };

const payloadSchema = Joi.object<QrPayload>({
  walletId: Joi.string().required(),
  amount: Joi.number().min(0).default(0),
  note: Joi.string().allow('').default(''),
  timestamp: Joi.number().integer().required(),
  userId: Joi.string().required()
});

/**
 * Signed payment-request QR codes. The payload is the exact JSON string
 * that was signed; verification never re-serializes it.
 */
export class QrService {
  constructor(
    private readonly store: DocumentStore,
    private readonly kyc: KycService,
    private readonly readiness: ServiceReadiness,
    private readonly clock: Clock = systemClock,
    private readonly options: AppConfig['qr'] = config.qr
  ) {}

  async signQrPayload(ctx: RequestContext, dto: SignQrDto): Promise<SignedQr> {
    try {
      const secret = this.secret();
      await this.kyc.enforceKyc(ctx.userId);

      if (!dto.walletId || typeof dto.walletId !== 'string') {
        throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Invalid wallet ID.');
      }
      if (dto.amount !== undefined && (typeof dto.amount !== 'number' || !Number.isFinite(dto.amount) || dto.amount < 0)) {
        throw createAppError(ERROR_CODES.TXN_AMOUNT_INVALID);
      }

      const wallet = await this.store.get('wallets', ctx.userId);
      if (!wallet || wallet.walletId !== dto.walletId) {
        throw createAppError(ERROR_CODES.AUTH_PERMISSION_DENIED, 'Wallet does not belong to user.');
      }

      const timestamp = this.clock().getTime();
      const payload: QrPayload = {
        walletId: dto.walletId,
        amount: dto.amount ?? 0,
        note: dto.note ?? '',
        timestamp,
        userId: ctx.userId
      };
      const serialized = JSON.stringify(payload);

      return {
        payload: serialized,
        signature: hmacHex('sha256', secret, serialized),
        expiresAt: timestamp + this.options.expiryMs
      };
    } catch (error) {
      throw toClientError(error);
    }
  }

  async verifyQrSignature(_ctx: RequestContext, dto: VerifyQrDto): Promise<QrVerification> {
    try {
      const secret = this.secret();
      if (!dto.payload || !dto.signature || typeof dto.payload !== 'string' || typeof dto.signature !== 'string') {
        throw createAppError(ERROR_CODES.SYSTEM_VALIDATION_FAILED, 'Missing payload or signature.');
      }

      if (!safeCompare(dto.signature, hmacHex('sha256', secret, dto.payload))) {
        return { valid: false, reason: 'Invalid signature' };
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(dto.payload);
      } catch {
        return { valid: false, reason: 'Invalid payload format' };
      }
      const { value, error } = payloadSchema.validate(parsed);
      if (error || value === undefined) {
        return { valid: false, reason: 'Invalid payload format' };
      }

      if (this.clock().getTime() - value.timestamp > this.options.expiryMs) {
        return { valid: false, reason: 'QR code expired' };
      }

      const wallet = await this.store.findOne('wallets', { walletId: value.walletId });
      if (!wallet) {
        return { valid: false, reason: 'Wallet not found' };
      }
      const user = await this.store.get('users', wallet.userId);

      return {
        valid: true,
        walletId: value.walletId,
        amount: value.amount,
        note: value.note,
        recipientName: user?.fullName || DEFAULT_DISPLAY_NAME,
        profilePhotoUrl: user?.profilePhotoUrl ?? null
      };
    } catch (error) {
      throw toClientError(error);
    }
  }

  private secret(): string {
    this.readiness.requireReady('qr');
    const secret = this.options.signingSecret;
    if (!secret) {
      throw createAppError(ERROR_CODES.CONFIG_MISSING, 'The qr service is not configured.', { service: 'qr' });
    }
    return secret;
  }
}
