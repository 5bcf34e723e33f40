import { Request, Response } from 'express';
import { requestContext } from '../middleware/auth';
import { MomoPaymentDto, MomoService } from '../services/momo.service';
import { asyncHandler } from '../utils/async-handler';
import { RequestBody } from './request-body';

const paymentDto = (req: Request): MomoPaymentDto => {
  const body = RequestBody.of(req);
  return {
    amount: body.amount(),
    currency: body.string('currency'),
    phoneNumber: body.requiredString('phoneNumber'),
    payerMessage: body.string('payerMessage'),
    payeeNote: body.string('payeeNote'),
    idempotencyKey: body.string('idempotencyKey')
  };
};

export class MomoController {
  constructor(private readonly momoService: MomoService) {}

  requestToPay = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.momoService.momoRequestToPay(requestContext(req), paymentDto(req));

    res.status(202).json({
      success: true,
      data: { ...result, message: 'Please approve the payment on your phone' }
    });
  });

  transfer = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.momoService.momoTransfer(requestContext(req), paymentDto(req));

    res.status(202).json({
      success: true,
      data: result
    });
  });

  getBalance = asyncHandler(async (req: Request, res: Response) => {
    const { product } = req.query;
    const balance = await this.momoService.momoGetBalance(
      requestContext(req),
      typeof product === 'string' ? product : undefined
    );

    res.json({
      success: true,
      data: balance
    });
  });

  checkStatus = asyncHandler(async (req: Request, res: Response) => {
    const status = await this.momoService.momoCheckStatus(requestContext(req), req.params.referenceId);

    res.json({
      success: true,
      data: status
    });
  });
}
