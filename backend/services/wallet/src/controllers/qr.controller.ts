import { Request, Response } from 'express';
import { requestContext } from '../middleware/auth';
import { QrService } from '../services/qr.service';
import { asyncHandler } from '../utils/async-handler';
import { RequestBody } from './request-body';

export class QrController {
  constructor(private readonly qrService: QrService) {}

  sign = asyncHandler(async (req: Request, res: Response) => {
    const body = RequestBody.of(req);

    const signed = await this.qrService.signQrPayload(requestContext(req), {
      walletId: body.requiredString('walletId'),
      amount: body.number('amount'),
      note: body.string('note')
    });

    res.json({
      success: true,
      data: signed
    });
  });

  verify = asyncHandler(async (req: Request, res: Response) => {
    const body = RequestBody.of(req);

    const verification = await this.qrService.verifyQrSignature(requestContext(req), {
      payload: body.requiredString('payload'),
      signature: body.requiredString('signature')
    });

    res.json({
      success: true,
      data: verification
    });
  });
}
