import dotenv from 'dotenv';
import Joi from 'joi';
import { MAX_TRANSFER_FEE } from '../utils/money';

dotenv.config();

export type AppEnvironment = 'development' | 'test' | 'production';
export type MomoEnvironment = 'sandbox' | 'production';

export interface MomoProductCredentials {
  subscriptionKey?: string;
  apiUser?: string;
  apiKey?: string;
}

export interface AppConfig {
  app: {
    name: string;
    env: AppEnvironment;
    port: number;
    isProduction: boolean;
  };
  database: {
    uri: string;
  };
  jwt: {
    secret: string;
  };
  paystack: {
    secretKey?: string;
    baseUrl: string;
    callbackUrl?: string;
  };
  qr: {
    signingSecret?: string;
    expiryMs: number;
  };
  momo: {
    environment: MomoEnvironment;
    baseUrl: string;
    targetEnvironment: string;
    collections: MomoProductCredentials;
    disbursements: MomoProductCredentials;
    webhookToken?: string;
    webhookSigningSecret?: string;
    callbackUrl?: string;
  };
  webhook: {
    requireCrossVerification: boolean;
  };
  exchangeRates: {
    apiUrl: string;
    cacheTtlMs: number;
    maxStalenessMs: number;
  };
  limits: {
    maxTransferAmount: number;
    minWithdrawalAmount: number;
    dailyLimit: number;
    monthlyLimit: number;
    defaultCurrency: string;
  };
  idempotency: {
    ttlMs: number;
  };
  gateways: {
    timeoutMs: number;
  };
}

const optionalSecret = Joi.string().trim().empty('');

const envSchema = Joi.object({
  NODE_ENV: Joi.string().valid('development', 'test', 'production').default('development'),
  PORT: Joi.number().port().default(3003),
  DATABASE_URI: Joi.string().default('mongodb://localhost:27017/wallet-service'),
  JWT_SECRET: Joi.string().default('wallet-service-secret'),

  PAYSTACK_SECRET_KEY: optionalSecret,
  PAYSTACK_BASE_URL: Joi.string().uri().default('https://api.paystack.co'),
  PAYSTACK_CALLBACK_URL: Joi.string().uri().empty(''),

  QR_SIGNING_SECRET: optionalSecret,
  QR_EXPIRY_MS: Joi.number().integer().positive().default(15 * 60 * 1000),

  MOMO_ENVIRONMENT: Joi.string().valid('sandbox', 'production').default('sandbox'),
  MOMO_TARGET_ENVIRONMENT: Joi.string().empty(''),
  MOMO_COLLECTIONS_SUBSCRIPTION_KEY: optionalSecret,
  MOMO_COLLECTIONS_API_USER: optionalSecret,
  MOMO_COLLECTIONS_API_KEY: optionalSecret,
  MOMO_DISBURSEMENTS_SUBSCRIPTION_KEY: optionalSecret,
  MOMO_DISBURSEMENTS_API_USER: optionalSecret,
  MOMO_DISBURSEMENTS_API_KEY: optionalSecret,
  MOMO_WEBHOOK_TOKEN: optionalSecret,
  MOMO_WEBHOOK_SIGNING_SECRET: optionalSecret,
  MOMO_CALLBACK_URL: Joi.string().uri().empty(''),

  WEBHOOK_REQUIRE_CROSS_VERIFICATION: Joi.boolean().default(true),

  EXCHANGE_RATE_API_URL: Joi.string().uri().default('https://api.exchangerate.host/latest'),
  EXCHANGE_RATE_CACHE_TTL_MS: Joi.number().integer().positive().default(30 * 60 * 1000),
  EXCHANGE_RATE_MAX_STALENESS_MS: Joi.number().integer().positive().default(48 * 60 * 60 * 1000),

  MAX_TRANSFER_AMOUNT: Joi.number().positive().default(10_000_000),
  MIN_WITHDRAWAL_AMOUNT: Joi.number().positive().default(100),
  // A maximum-size transfer plus its fee must fit inside the daily limit.
  DEFAULT_DAILY_LIMIT: Joi.number()
    .positive()
    .min(Joi.ref('MAX_TRANSFER_AMOUNT', { adjust: (max: number) => max + MAX_TRANSFER_FEE }))
    .default(20_000_000),
  DEFAULT_MONTHLY_LIMIT: Joi.number().positive().min(Joi.ref('DEFAULT_DAILY_LIMIT')).default(200_000_000),
  DEFAULT_CURRENCY: Joi.string().length(3).uppercase().default('NGN'),

  IDEMPOTENCY_TTL_MS: Joi.number().integer().positive().default(24 * 60 * 60 * 1000),
  GATEWAY_TIMEOUT_MS: Joi.number().integer().positive().default(30_000)
}).unknown(true);

interface ValidatedEnv {
  NODE_ENV: AppEnvironment;
  PORT: number;
  DATABASE_URI: string;
  JWT_SECRET: string;
  PAYSTACK_SECRET_KEY?: string;
  PAYSTACK_BASE_URL: string;
  PAYSTACK_CALLBACK_URL?: string;
  QR_SIGNING_SECRET?: string;
  QR_EXPIRY_MS: number;
  MOMO_ENVIRONMENT: MomoEnvironment;
  MOMO_TARGET_ENVIRONMENT?: string;
  MOMO_COLLECTIONS_SUBSCRIPTION_KEY?: string;
  MOMO_COLLECTIONS_API_USER?: string;
  MOMO_COLLECTIONS_API_KEY?: string;
  MOMO_DISBURSEMENTS_SUBSCRIPTION_KEY?: string;
  MOMO_DISBURSEMENTS_API_USER?: string;
  MOMO_DISBURSEMENTS_API_KEY?: string;
  MOMO_WEBHOOK_TOKEN?: string;
  MOMO_WEBHOOK_SIGNING_SECRET?: string;
  MOMO_CALLBACK_URL?: string;
  WEBHOOK_REQUIRE_CROSS_VERIFICATION: boolean;
  EXCHANGE_RATE_API_URL: string;
  EXCHANGE_RATE_CACHE_TTL_MS: number;
  EXCHANGE_RATE_MAX_STALENESS_MS: number;
  MAX_TRANSFER_AMOUNT: number;
  MIN_WITHDRAWAL_AMOUNT: number;
  DEFAULT_DAILY_LIMIT: number;
  DEFAULT_MONTHLY_LIMIT: number;
  DEFAULT_CURRENCY: string;
  IDEMPOTENCY_TTL_MS: number;
  GATEWAY_TIMEOUT_MS: number;
}

export class ConfigValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Builds the typed configuration from an environment map.
 * Throws ConfigValidationError on malformed values; credentials may be
 * absent here and are reported per service by ServiceReadiness.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const { value, error } = envSchema.validate(env, { abortEarly: false, convert: true });
  if (error || value === undefined) {
    throw new ConfigValidationError(error ? error.details.map((detail) => detail.message) : []);
  }
  const e: ValidatedEnv = value;
  const isProduction = e.NODE_ENV === 'production';

  return {
    app: {
      name: 'wallet-service',
      env: e.NODE_ENV,
      port: e.PORT,
      isProduction
    },
    database: {
      uri: e.DATABASE_URI
    },
    jwt: {
      secret: e.JWT_SECRET
    },
    paystack: {
      secretKey: e.PAYSTACK_SECRET_KEY,
      baseUrl: e.PAYSTACK_BASE_URL,
      callbackUrl: e.PAYSTACK_CALLBACK_URL
    },
    qr: {
      signingSecret: e.QR_SIGNING_SECRET,
      expiryMs: e.QR_EXPIRY_MS
    },
    momo: {
      environment: e.MOMO_ENVIRONMENT,
      baseUrl: e.MOMO_ENVIRONMENT === 'production'
        ? 'https://proxy.momoapi.mtn.com'
        : 'https://sandbox.momodeveloper.mtn.com',
      targetEnvironment: e.MOMO_TARGET_ENVIRONMENT || e.MOMO_ENVIRONMENT,
      collections: {
        subscriptionKey: e.MOMO_COLLECTIONS_SUBSCRIPTION_KEY,
        apiUser: e.MOMO_COLLECTIONS_API_USER,
        apiKey: e.MOMO_COLLECTIONS_API_KEY
      },
      disbursements: {
        subscriptionKey: e.MOMO_DISBURSEMENTS_SUBSCRIPTION_KEY,
        apiUser: e.MOMO_DISBURSEMENTS_API_USER,
        apiKey: e.MOMO_DISBURSEMENTS_API_KEY
      },
      webhookToken: e.MOMO_WEBHOOK_TOKEN,
      webhookSigningSecret: e.MOMO_WEBHOOK_SIGNING_SECRET,
      callbackUrl: e.MOMO_CALLBACK_URL
    },
    webhook: {
      // Cross-verification is never optional in production.
      requireCrossVerification: isProduction || e.WEBHOOK_REQUIRE_CROSS_VERIFICATION
    },
    exchangeRates: {
      apiUrl: e.EXCHANGE_RATE_API_URL,
      cacheTtlMs: e.EXCHANGE_RATE_CACHE_TTL_MS,
      maxStalenessMs: e.EXCHANGE_RATE_MAX_STALENESS_MS
    },
    limits: {
      maxTransferAmount: e.MAX_TRANSFER_AMOUNT,
      minWithdrawalAmount: e.MIN_WITHDRAWAL_AMOUNT,
      dailyLimit: e.DEFAULT_DAILY_LIMIT,
      monthlyLimit: e.DEFAULT_MONTHLY_LIMIT,
      defaultCurrency: e.DEFAULT_CURRENCY
    },
    idempotency: {
      ttlMs: e.IDEMPOTENCY_TTL_MS
    },
    gateways: {
      timeoutMs: e.GATEWAY_TIMEOUT_MS
    }
  };
};

export const config: AppConfig = loadConfig();
