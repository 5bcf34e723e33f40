import { AppConfig, config as defaultConfig } from './config';
import { ServiceReadiness } from './config/service-readiness';
import { AxiosHttpTransport, HttpTransport } from './gateways/http-transport';
import { MobileMoneyGateway, MtnMomoGateway } from './gateways/momo.gateway';
import { PaymentGateway, PaystackGateway } from './gateways/paystack.gateway';
import { AuditService } from './services/audit.service';
import { DepositService } from './services/deposit.service';
import { ExchangeRateService } from './services/exchange-rate.service';
import { IdempotencyService } from './services/idempotency.service';
import { KycService } from './services/kyc.service';
import { MomoService } from './services/momo.service';
import { OperationRunner } from './services/operation-runner';
import { QrService } from './services/qr.service';
import { RateLimitService } from './services/rate-limit.service';
import { TransactionStateService } from './services/transaction-state.service';
import { WalletService } from './services/wallet.service';
import { WebhookService } from './services/webhook.service';
import { WithdrawalService } from './services/withdrawal.service';
import { DocumentStore } from './store/document-store';
import { Clock, systemClock } from './utils/clock';

export interface ContainerOptions {
  store: DocumentStore;
  config?: AppConfig;
  clock?: Clock;
  http?: HttpTransport;
  paymentGateway?: PaymentGateway;
  momoGateway?: MobileMoneyGateway;
}

export interface Container {
  config: AppConfig;
  store: DocumentStore;
  readiness: ServiceReadiness;
  kyc: KycService;
  rateLimits: RateLimitService;
  idempotency: IdempotencyService;
  audit: AuditService;
  states: TransactionStateService;
  rates: ExchangeRateService;
  wallets: WalletService;
  withdrawals: WithdrawalService;
  deposits: DepositService;
  momo: MomoService;
  qr: QrService;
  webhooks: WebhookService;
}

/**
 * Wires every service against one store. Gateways and transport can be
 * replaced, which is how tests run without the network.
 */
export const createContainer = (options: ContainerOptions): Container => {
  const cfg = options.config ?? defaultConfig;
  const clock = options.clock ?? systemClock;
  const { store } = options;
  const http = options.http ?? new AxiosHttpTransport(cfg.gateways.timeoutMs);

  const paymentGateway = options.paymentGateway ?? new PaystackGateway(http, cfg.paystack);
  const momoGateway = options.momoGateway ?? new MtnMomoGateway(http, cfg.momo, clock);

  const readiness = new ServiceReadiness(cfg);
  const kyc = new KycService(store, clock);
  const rateLimits = new RateLimitService(store, clock);
  const idempotency = new IdempotencyService(store, clock, cfg.idempotency.ttlMs);
  const audit = new AuditService(store, clock);
  const states = new TransactionStateService(store, clock);
  const rates = new ExchangeRateService(store, http, clock, cfg.exchangeRates);
  const runner = new OperationRunner(readiness, kyc, rateLimits, idempotency, audit);

  const wallets = new WalletService(store, runner, kyc, rateLimits, rates, clock, cfg.limits);
  const withdrawals = new WithdrawalService(
    store,
    runner,
    kyc,
    wallets,
    states,
    paymentGateway,
    readiness,
    clock,
    cfg.limits
  );
  const deposits = new DepositService(store, runner, wallets, states, rates, paymentGateway, clock);
  const momo = new MomoService(store, runner, wallets, states, rates, momoGateway, readiness, clock, cfg.momo.environment);
  const qr = new QrService(store, kyc, readiness, clock, cfg.qr);
  const webhooks = new WebhookService(store, paymentGateway, deposits, withdrawals, momo, {
    paystackSecretKey: cfg.paystack.secretKey,
    momoSigningSecret: cfg.momo.webhookSigningSecret,
    momoWebhookToken: cfg.momo.webhookToken,
    momoEnvironment: cfg.momo.environment,
    requireCrossVerification: cfg.webhook.requireCrossVerification
  });

  return {
    config: cfg,
    store,
    readiness,
    kyc,
    rateLimits,
    idempotency,
    audit,
    states,
    rates,
    wallets,
    withdrawals,
    deposits,
    momo,
    qr,
    webhooks
  };
};
