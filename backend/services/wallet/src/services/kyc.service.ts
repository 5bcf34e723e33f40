import { DocumentStore } from '../store/document-store';
import { KycStatus, UserRecord } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { createAppError, ERROR_CODES } from '../utils/errors';
import { logger } from '../utils/logger';

const KYC_STATUSES: ReadonlySet<string> = new Set(Object.values(KycStatus));

const isKycStatus = (value: string): value is KycStatus => KYC_STATUSES.has(value);

export class KycService {
  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Blocks unverified users. Accounts verified before `kycStatus` existed are
   * migrated on first check.
   */
  async enforceKyc(userId: string): Promise<UserRecord> {
    const user = await this.store.get('users', userId);
    if (!user) {
      throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, 'User account not found.', { userId });
    }

    if (user.kycStatus === KycStatus.VERIFIED) {
      return user;
    }

    if (!user.kycStatus && user.kycCompleted === true && user.kycVerified === true) {
      const now = this.clock();
      await this.store.update('users', userId, {
        kycStatus: KycStatus.VERIFIED,
        kycVerifiedAt: now,
        updatedAt: now
      });
      logger.info(`Migrated legacy KYC flags to kycStatus for user ${userId}`);
      return { ...user, kycStatus: KycStatus.VERIFIED, kycVerifiedAt: now, updatedAt: now };
    }

    throw createAppError(ERROR_CODES.KYC_REQUIRED, undefined, {
      userId,
      kycStatus: user.kycStatus ?? 'unset'
    });
  }

  /**
   * Sets the user's KYC status. `verified` requires an approved document
   * record from the identity flow.
   */
  async updateKycStatus(userId: string, status: string): Promise<{ kycStatus: KycStatus }> {
    if (!isKycStatus(status)) {
      throw createAppError(ERROR_CODES.KYC_VERIFICATION_FAILED, 'Invalid KYC status.', { status });
    }

    const user = await this.store.get('users', userId);
    if (!user) {
      throw createAppError(ERROR_CODES.WALLET_NOT_FOUND, 'User account not found.', { userId });
    }

    if (status === KycStatus.VERIFIED) {
      const documents = await this.store.get('kyc_documents', userId);
      if (!documents) {
        throw createAppError(ERROR_CODES.KYC_INCOMPLETE, 'No identity documents on file.', { userId });
      }
      if (documents.status !== 'approved' && documents.status !== 'verified') {
        throw createAppError(ERROR_CODES.KYC_INCOMPLETE, undefined, {
          userId,
          documentStatus: documents.status
        });
      }
    }

    const now = this.clock();
    const verified = status === KycStatus.VERIFIED;
    await this.store.update('users', userId, {
      kycStatus: status,
      kycCompleted: verified,
      kycVerified: verified,
      ...(verified ? { kycVerifiedAt: now } : {}),
      updatedAt: now
    });

    logger.info(`KYC status for user ${userId} set to ${status}`);
    return { kycStatus: status };
  }
}
