import { AppConfig, loadConfig } from '../../backend/services/wallet/src/config';
import { Container, createContainer } from '../../backend/services/wallet/src/container';
import { EXCHANGE_RATES_DOC_ID } from '../../backend/services/wallet/src/services/exchange-rate.service';
import { KycStatus, RequestContext, Wallet, WalletStatus } from '../../backend/services/wallet/src/types';
import { Clock } from '../../backend/services/wallet/src/utils/clock';
import { dayKey, monthKey } from '../../backend/services/wallet/src/utils/money';
import { FakeHttpTransport, FakeMomoGateway, FakePaymentGateway } from './fake-gateways';
import { MemoryDocumentStore } from './memory-document-store';

export const START_TIME = new Date('2026-03-10T09:00:00.000Z');

export const TEST_RATES: Record<string, number> = {
  USD: 1,
  NGN: 1500,
  GHS: 15,
  KES: 130,
  EUR: 0.9
};

/**
 * Clock the test moves by hand.
 */
export class TestClock {
  private current: number;

  constructor(start: Date = START_TIME) {
    this.current = start.getTime();
  }

  readonly now: Clock = () => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export const TEST_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  JWT_SECRET: 'test-secret',
  PAYSTACK_SECRET_KEY: 'test-paystack-secret',
  QR_SIGNING_SECRET: 'test-qr-secret',
  MOMO_ENVIRONMENT: 'sandbox',
  MOMO_COLLECTIONS_SUBSCRIPTION_KEY: 'test-collections-key',
  MOMO_COLLECTIONS_API_USER: 'test-collections-user',
  MOMO_COLLECTIONS_API_KEY: 'test-collections-secret',
  MOMO_DISBURSEMENTS_SUBSCRIPTION_KEY: 'test-disbursements-key',
  MOMO_DISBURSEMENTS_API_USER: 'test-disbursements-user',
  MOMO_DISBURSEMENTS_API_KEY: 'test-disbursements-secret',
  MOMO_WEBHOOK_TOKEN: 'test-webhook-token',
  WEBHOOK_REQUIRE_CROSS_VERIFICATION: 'true'
};

/** Configuration built from the test environment plus overrides. */
export const testConfig = (overrides: Record<string, string | undefined> = {}): AppConfig =>
  loadConfig({ ...TEST_ENV, ...overrides });

export interface SeedAccount {
  userId: string;
  fullName?: string;
  walletId: string;
  currency?: string;
  balance?: number;
  kycStatus?: KycStatus;
  status?: WalletStatus;
  dailyLimit?: number;
  monthlyLimit?: number;
}

export interface TestHarness {
  store: MemoryDocumentStore;
  clock: TestClock;
  http: FakeHttpTransport;
  paystack: FakePaymentGateway;
  momoGateway: FakeMomoGateway;
  config: AppConfig;
  container: Container;
  seedAccount(account: SeedAccount): Wallet;
  seedRates(rates?: Record<string, number>, updatedAt?: Date): void;
  ctx(userId: string, ip?: string): RequestContext;
}

/**
 * Every service wired over the in-memory store, fake gateways and a
 * hand-driven clock.
 */
export const createTestHarness = (envOverrides: Record<string, string | undefined> = {}): TestHarness => {
  const store = new MemoryDocumentStore();
  const clock = new TestClock();
  const http = new FakeHttpTransport();
  const paystack = new FakePaymentGateway();
  const momoGateway = new FakeMomoGateway();
  const config = testConfig(envOverrides);

  const container = createContainer({
    store,
    config,
    clock: clock.now,
    http,
    paymentGateway: paystack,
    momoGateway
  });

  const seedAccount = (account: SeedAccount): Wallet => {
    const now = clock.now();
    const currency = account.currency ?? 'NGN';
    store.seed('users', {
      id: account.userId,
      fullName: account.fullName ?? 'Test User',
      currency,
      kycStatus: account.kycStatus ?? KycStatus.VERIFIED,
      createdAt: now,
      updatedAt: now
    });
    const wallet: Wallet = {
      id: account.userId,
      userId: account.userId,
      walletId: account.walletId,
      currency,
      balance: account.balance ?? 0,
      dailySpent: 0,
      dailySpentDate: dayKey(now),
      monthlySpent: 0,
      monthlySpentMonth: monthKey(now),
      dailyLimit: account.dailyLimit ?? config.limits.dailyLimit,
      monthlyLimit: account.monthlyLimit ?? config.limits.monthlyLimit,
      status: account.status ?? WalletStatus.ACTIVE,
      createdAt: now,
      updatedAt: now
    };
    store.seed('wallets', wallet);
    return wallet;
  };

  const seedRates = (rates: Record<string, number> = TEST_RATES, updatedAt: Date = clock.now()): void => {
    store.seed('app_config', {
      id: EXCHANGE_RATES_DOC_ID,
      base: 'USD',
      rates,
      source: 'test',
      updatedAt
    });
    container.rates.invalidate();
  };

  return {
    store,
    clock,
    http,
    paystack,
    momoGateway,
    config,
    container,
    seedAccount,
    seedRates,
    ctx: (userId: string, ip = '203.0.113.10') => ({ userId, role: 'user', ip })
  };
};

export const balanceOf = async (store: MemoryDocumentStore, userId: string): Promise<number | undefined> =>
  (await store.get('wallets', userId))?.balance;
