import Joi from 'joi';
import { config } from '../config';
import currencyData from '../data/currencies.json';
import { HttpResponse, HttpTransport } from '../gateways/http-transport';
import { DocumentReader, DocumentStore } from '../store/document-store';
import { ExchangeRateTable } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { createAppError, ERROR_CODES, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { roundMoney } from '../utils/money';

export const EXCHANGE_RATES_DOC_ID = 'exchange_rates';
export const BASE_CURRENCY = 'USD';

const SEED_RATES: Record<string, number> = currencyData.seedRates;

export const SUPPORTED_CURRENCIES: readonly string[] = Object.keys(SEED_RATES);

export const isSupportedCurrency = (currency: string): boolean => currency in SEED_RATES;

export interface ExchangeRateOptions {
  apiUrl: string;
  cacheTtlMs: number;
  maxStalenessMs: number;
}

export interface Conversion {
  amount: number;
  rate: number;
}

export interface UsdValuation {
  usdAmount: number;
  rate: number;
  rateAgeMs: number | null;
}

const apiResponseSchema = Joi.object({
  rates: Joi.object().pattern(Joi.string(), Joi.number().positive()).required()
}).unknown(true);

/**
 * Rates as of one read. Cross-currency conversion refuses tables older than
 * the staleness bound; USD valuation for fee accounting does not.
 */
export class RateSnapshot {
  constructor(
    private readonly table: ExchangeRateTable | null,
    private readonly now: Date,
    private readonly maxStalenessMs: number
  ) {}

  get ageMs(): number | null {
    return this.table ? this.now.getTime() - this.table.updatedAt.getTime() : null;
  }

  get isStale(): boolean {
    const age = this.ageMs;
    return age === null || age > this.maxStalenessMs;
  }

  convert(amount: number, from: string, to: string): Conversion {
    if (from === to) {
      return { amount, rate: 1 };
    }
    if (!this.table || this.isStale) {
      throw createAppError(ERROR_CODES.SERVICE_UNAVAILABLE, 'Exchange rates are temporarily unavailable.', {
        from,
        to,
        rateAgeMs: this.ageMs
      });
    }

    const fromRate = this.table.rates[from];
    const toRate = this.table.rates[to];
    if (!fromRate || !toRate) {
      throw createAppError(ERROR_CODES.SERVICE_UNAVAILABLE, 'No exchange rate for this currency pair.', {
        from,
        to
      });
    }

    return {
      amount: roundMoney((amount / fromRate) * toRate),
      rate: toRate / fromRate
    };
  }

  toUsd(amount: number, currency: string): UsdValuation {
    const rate = this.table?.rates[currency] ?? 1;
    return { usdAmount: amount / rate, rate, rateAgeMs: this.ageMs };
  }
}

export class ExchangeRateService {
  private cached: { table: ExchangeRateTable | null; loadedAt: number } | null = null;

  constructor(
    private readonly store: DocumentStore,
    private readonly http: HttpTransport,
    private readonly clock: Clock = systemClock,
    private readonly options: ExchangeRateOptions = config.exchangeRates
  ) {}

  async snapshot(): Promise<RateSnapshot> {
    const now = this.clock();
    if (!this.cached || now.getTime() - this.cached.loadedAt > this.options.cacheTtlMs) {
      this.cached = { table: await this.store.get('app_config', EXCHANGE_RATES_DOC_ID), loadedAt: now.getTime() };
    }
    return new RateSnapshot(this.cached.table, now, this.options.maxStalenessMs);
  }

  /** Reads the table through a unit of work, bypassing the cache. */
  async snapshotWithin(reader: DocumentReader): Promise<RateSnapshot> {
    const table = await reader.get('app_config', EXCHANGE_RATES_DOC_ID);
    return new RateSnapshot(table, this.clock(), this.options.maxStalenessMs);
  }

  invalidate(): void {
    this.cached = null;
  }

  /**
   * Fetches USD-based rates, keeps the supported currencies and persists
   * the table.
   */
  async refreshRates(): Promise<ExchangeRateTable> {
    let response: HttpResponse;
    try {
      response = await this.http.send({
        method: 'GET',
        url: this.options.apiUrl,
        params: { base: BASE_CURRENCY }
      });
    } catch (error) {
      logger.error('Exchange rate fetch failed', { error: errorMessage(error) });
      throw createAppError(ERROR_CODES.SERVICE_UNAVAILABLE, 'Could not fetch exchange rates.');
    }

    const { value, error } = apiResponseSchema.validate(response.data);
    if (response.status !== 200 || error || value === undefined) {
      logger.error('Unexpected exchange rate response', { status: response.status, error: error?.message });
      throw createAppError(ERROR_CODES.SERVICE_UNAVAILABLE, 'Could not fetch exchange rates.', {
        status: response.status
      });
    }

    const fetched: Record<string, number> = value.rates;
    const rates: Record<string, number> = { [BASE_CURRENCY]: 1 };
    for (const currency of SUPPORTED_CURRENCIES) {
      if (fetched[currency]) {
        rates[currency] = fetched[currency];
      }
    }

    const table: ExchangeRateTable = {
      id: EXCHANGE_RATES_DOC_ID,
      base: BASE_CURRENCY,
      rates,
      source: new URL(this.options.apiUrl).hostname,
      updatedAt: this.clock()
    };
    await this.store.insert('app_config', table);
    this.invalidate();

    logger.info(`Exchange rates refreshed for ${Object.keys(rates).length} currencies`);
    return table;
  }

  /**
   * Writes the bundled rates when no table exists yet.
   */
  async seedIfMissing(): Promise<boolean> {
    const existing = await this.store.get('app_config', EXCHANGE_RATES_DOC_ID);
    if (existing) {
      return false;
    }
    await this.store.insert('app_config', {
      id: EXCHANGE_RATES_DOC_ID,
      base: BASE_CURRENCY,
      rates: { ...SEED_RATES },
      source: 'seed',
      updatedAt: this.clock()
    });
    this.invalidate();
    logger.warn('Exchange rate table seeded with bundled rates');
    return true;
  }
}
