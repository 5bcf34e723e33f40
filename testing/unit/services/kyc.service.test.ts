/**
 * KYC Service Unit Tests
 */

import { KycService } from '../../../backend/services/wallet/src/services/kyc.service';
import { decodeRecord } from '../../../backend/services/wallet/src/store/record-schemas';
import { KycStatus } from '../../../backend/services/wallet/src/types';
import { ERROR_CODES } from '../../../backend/services/wallet/src/utils/errors';
import { MemoryDocumentStore } from '../../utils/memory-document-store';
import { START_TIME, TestClock } from '../../utils/test-harness';

describe('KycService', () => {
  let store: MemoryDocumentStore;
  let service: KycService;

  const seedUser = (fields: { kycStatus?: KycStatus; kycCompleted?: boolean; kycVerified?: boolean } = {}) =>
    store.seed('users', {
      id: 'user-1',
      fullName: 'Ada Obi',
      currency: 'NGN',
      createdAt: START_TIME,
      updatedAt: START_TIME,
      ...fields
    });

  beforeEach(() => {
    store = new MemoryDocumentStore();
    service = new KycService(store, new TestClock().now);
  });

  describe('enforceKyc', () => {
    it('should return a verified user', async () => {
      seedUser({ kycStatus: KycStatus.VERIFIED });

      const user = await service.enforceKyc('user-1');
      expect(user.fullName).toBe('Ada Obi');
    });

    it('should reject unknown users as wallet not found', async () => {
      await expect(service.enforceKyc('ghost')).rejects.toMatchObject({ code: ERROR_CODES.WALLET_NOT_FOUND });
    });

    it('should reject pending and rejected users', async () => {
      seedUser({ kycStatus: KycStatus.PENDING });
      await expect(service.enforceKyc('user-1')).rejects.toMatchObject({
        code: ERROR_CODES.KYC_REQUIRED,
        details: { userId: 'user-1', kycStatus: 'pending' }
      });

      seedUser({ kycStatus: KycStatus.REJECTED });
      await expect(service.enforceKyc('user-1')).rejects.toMatchObject({ code: ERROR_CODES.KYC_REQUIRED });
    });

    it('should migrate legacy completion flags', async () => {
      seedUser({ kycCompleted: true, kycVerified: true });

      const user = await service.enforceKyc('user-1');

      expect(user.kycStatus).toBe(KycStatus.VERIFIED);
      const stored = await store.get('users', 'user-1');
      expect(stored?.kycStatus).toBe(KycStatus.VERIFIED);
      expect(stored?.kycVerifiedAt).toEqual(START_TIME);
    });

    it.each([null, ''])('should migrate legacy flags stored with kycStatus %p', async (kycStatus) => {
      store.seed(
        'users',
        decodeRecord('users', {
          id: 'user-1',
          fullName: 'Ada Obi',
          kycStatus,
          kycCompleted: true,
          kycVerified: true,
          createdAt: START_TIME,
          updatedAt: START_TIME
        })
      );

      const user = await service.enforceKyc('user-1');

      expect(user.kycStatus).toBe(KycStatus.VERIFIED);
      expect((await store.get('users', 'user-1'))?.kycStatus).toBe(KycStatus.VERIFIED);
    });

    it('should not migrate when only one legacy flag is set', async () => {
      seedUser({ kycCompleted: true });

      await expect(service.enforceKyc('user-1')).rejects.toMatchObject({
        code: ERROR_CODES.KYC_REQUIRED,
        details: { kycStatus: 'unset' }
      });
    });
  });

  describe('updateKycStatus', () => {
    it('should reject values outside the status set', async () => {
      seedUser();
      await expect(service.updateKycStatus('user-1', 'approved')).rejects.toMatchObject({
        code: ERROR_CODES.KYC_VERIFICATION_FAILED
      });
    });

    it('should require approved documents before verifying', async () => {
      seedUser({ kycStatus: KycStatus.PENDING });
      await expect(service.updateKycStatus('user-1', 'verified')).rejects.toMatchObject({
        code: ERROR_CODES.KYC_INCOMPLETE
      });

      store.seed('kyc_documents', { id: 'user-1', userId: 'user-1', status: 'pending', updatedAt: START_TIME });
      await expect(service.updateKycStatus('user-1', 'verified')).rejects.toMatchObject({
        code: ERROR_CODES.KYC_INCOMPLETE,
        details: { userId: 'user-1', documentStatus: 'pending' }
      });
    });

    it('should verify a user with approved documents', async () => {
      seedUser({ kycStatus: KycStatus.PENDING });
      store.seed('kyc_documents', { id: 'user-1', userId: 'user-1', status: 'approved', updatedAt: START_TIME });

      await expect(service.updateKycStatus('user-1', 'verified')).resolves.toEqual({ kycStatus: KycStatus.VERIFIED });

      const stored = await store.get('users', 'user-1');
      expect(stored?.kycCompleted).toBe(true);
      expect(stored?.kycVerified).toBe(true);
      expect(stored?.kycVerifiedAt).toEqual(START_TIME);
    });

    it('should clear the legacy flags when a user is rejected', async () => {
      seedUser({ kycStatus: KycStatus.VERIFIED, kycCompleted: true, kycVerified: true });

      await service.updateKycStatus('user-1', 'rejected');

      const stored = await store.get('users', 'user-1');
      expect(stored?.kycStatus).toBe(KycStatus.REJECTED);
      expect(stored?.kycVerified).toBe(false);
    });
  });
});
