import { AppConfig, MomoProductCredentials } from './index';
import { createAppError, ERROR_CODES } from '../utils/errors';
import { logger } from '../utils/logger';

export type ExternalServiceName =
  | 'paystack'
  | 'qr'
  | 'momo_collections'
  | 'momo_disbursements'
  | 'momo_webhook';

const momoKeys = (prefix: string, credentials: MomoProductCredentials): Array<[string, string | undefined]> => [
  [`${prefix}.subscriptionKey`, credentials.subscriptionKey],
  [`${prefix}.apiUser`, credentials.apiUser],
  [`${prefix}.apiKey`, credentials.apiKey]
];

/**
 * Which external services have every credential they need. Computed once
 * from the loaded configuration.
 */
export class ServiceReadiness {
  private readonly missing: Map<ExternalServiceName, string[]>;

  constructor(private readonly config: AppConfig) {
    const required: Record<ExternalServiceName, Array<[string, string | undefined]>> = {
      paystack: [['paystack.secretKey', config.paystack.secretKey]],
      qr: [['qr.signingSecret', config.qr.signingSecret]],
      momo_collections: momoKeys('momo.collections', config.momo.collections),
      momo_disbursements: momoKeys('momo.disbursements', config.momo.disbursements),
      momo_webhook: [['momo.webhookToken', config.momo.webhookToken]]
    };

    this.missing = new Map();
    for (const [service, keys] of Object.entries(required)) {
      const absent = keys.filter(([, value]) => !value).map(([name]) => name);
      if (absent.length > 0 && isServiceName(service)) {
        this.missing.set(service, absent);
      }
    }
  }

  missingKeys(service: ExternalServiceName): string[] {
    return this.missing.get(service) ?? [];
  }

  isReady(service: ExternalServiceName): boolean {
    return !this.missing.has(service);
  }

  /** Readiness per service, for the health endpoint. */
  report(): Record<ExternalServiceName, boolean> {
    return {
      paystack: this.isReady('paystack'),
      qr: this.isReady('qr'),
      momo_collections: this.isReady('momo_collections'),
      momo_disbursements: this.isReady('momo_disbursements'),
      momo_webhook: this.isReady('momo_webhook')
    };
  }

  /**
   * Throws CONFIG_MISSING naming the first unconfigured service. Key names
   * are logged, never their values.
   */
  requireReady(...services: ExternalServiceName[]): void {
    for (const service of services) {
      if (!this.isReady(service)) {
        throw createAppError(ERROR_CODES.CONFIG_MISSING, `The ${service} service is not configured.`, {
          service
        });
      }
    }
  }

  logStartupReport(): void {
    if (this.missing.size === 0) {
      logger.info('All external services configured');
      return;
    }
    for (const [service, keys] of this.missing) {
      const level = this.config.app.isProduction ? 'error' : 'warn';
      logger.log(level, `Service ${service} is not configured`, { service, missingKeys: keys });
    }
  }
}

const SERVICE_NAMES: ReadonlySet<string> = new Set<ExternalServiceName>([
  'paystack',
  'qr',
  'momo_collections',
  'momo_disbursements',
  'momo_webhook'
]);

const isServiceName = (value: string): value is ExternalServiceName => SERVICE_NAMES.has(value);
