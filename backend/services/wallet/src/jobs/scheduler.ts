import { CronJob } from 'cron';
import { ExchangeRateService } from '../services/exchange-rate.service';
import { IdempotencyService } from '../services/idempotency.service';
import { RateLimitService } from '../services/rate-limit.service';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SchedulerDeps {
  rates: ExchangeRateService;
  idempotency: IdempotencyService;
  rateLimits: RateLimitService;
}

const runJob = (name: string, work: () => Promise<unknown>) => async (): Promise<void> => {
  try {
    await work();
  } catch (error) {
    logger.error(`Scheduled job ${name} failed`, { error: errorMessage(error) });
  }
};

/**
 * Background maintenance: a daily exchange-rate refresh and six-hourly
 * removal of expired idempotency keys and idle rate-limit windows.
 */
export class Scheduler {
  private readonly jobs: CronJob[];

  constructor(deps: SchedulerDeps) {
    this.jobs = [
      new CronJob('0 0 * * *', runJob('refreshExchangeRates', () => deps.rates.refreshRates()), null, false, 'UTC'),
      new CronJob(
        '0 */6 * * *',
        runJob('cleanupExpiredRecords', async () => {
          await deps.idempotency.cleanupExpired();
          await deps.rateLimits.cleanupStale();
        }),
        null,
        false,
        'UTC'
      )
    ];
  }

  start(): void {
    for (const job of this.jobs) {
      job.start();
    }
    logger.info('Background jobs started');
  }

  stop(): void {
    for (const job of this.jobs) {
      job.stop();
    }
  }
}
