import { Request, Response } from 'express';
import { ExchangeRateService } from '../services/exchange-rate.service';
import { asyncHandler } from '../utils/async-handler';
import { logger } from '../utils/logger';

export class AdminController {
  constructor(private readonly rateService: ExchangeRateService) {}

  refreshExchangeRates = asyncHandler(async (req: Request, res: Response) => {
    const table = await this.rateService.refreshRates();
    logger.info('Exchange rates refreshed on demand', { by: req.user?.id, source: table.source });

    res.json({
      success: true,
      data: {
        base: table.base,
        currencies: Object.keys(table.rates).length,
        source: table.source,
        updatedAt: table.updatedAt
      }
    });
  });
}
