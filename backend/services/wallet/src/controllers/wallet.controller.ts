import { Request, Response } from 'express';
import { requestContext } from '../middleware/auth';
import { KycService } from '../services/kyc.service';
import { WalletService } from '../services/wallet.service';
import { ReceiptType } from '../types';
import { asyncHandler } from '../utils/async-handler';
import { RequestBody } from './request-body';

const RECEIPT_TYPES: ReadonlySet<string> = new Set(Object.values(ReceiptType));

const isReceiptType = (value: unknown): value is ReceiptType =>
  typeof value === 'string' && RECEIPT_TYPES.has(value);

export class WalletController {
  constructor(
    private readonly walletService: WalletService,
    private readonly kycService: KycService
  ) {}

  createAccount = asyncHandler(async (req: Request, res: Response) => {
    const ctx = requestContext(req);
    const body = RequestBody.of(req);

    const { created, wallet } = await this.walletService.createAccount(ctx.userId, {
      fullName: body.requiredString('fullName'),
      email: body.string('email'),
      phoneNumber: body.string('phoneNumber'),
      profilePhotoUrl: body.string('profilePhotoUrl'),
      currency: body.string('currency')
    });

    res.status(created ? 201 : 200).json({
      success: true,
      data: wallet
    });
  });

  getWallet = asyncHandler(async (req: Request, res: Response) => {
    const wallet = await this.walletService.getWallet(requestContext(req));

    res.json({
      success: true,
      data: wallet
    });
  });

  listTransactions = asyncHandler(async (req: Request, res: Response) => {
    // The validator has already converted limit to a number
    const limit: unknown = req.query.limit;
    const type: unknown = req.query.type;

    const transactions = await this.walletService.listTransactions(requestContext(req), {
      limit: limit === undefined ? undefined : Number(limit),
      type: isReceiptType(type) ? type : undefined
    });

    res.json({
      success: true,
      data: transactions
    });
  });

  sendMoney = asyncHandler(async (req: Request, res: Response) => {
    const body = RequestBody.of(req);

    const result = await this.walletService.sendMoney(requestContext(req), {
      recipientWalletId: body.requiredString('recipientWalletId'),
      amount: body.amount(),
      note: body.string('note'),
      idempotencyKey: body.string('idempotencyKey')
    });

    res.json({
      success: true,
      data: result
    });
  });

  lookupWallet = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.walletService.lookupWallet(requestContext(req), RequestBody.of(req).raw('walletId'));

    res.json({
      success: true,
      data: result
    });
  });

  updateKycStatus = asyncHandler(async (req: Request, res: Response) => {
    const ctx = requestContext(req);
    const result = await this.kycService.updateKycStatus(ctx.userId, RequestBody.of(req).requiredString('status'));

    res.json({
      success: true,
      data: result
    });
  });
}
