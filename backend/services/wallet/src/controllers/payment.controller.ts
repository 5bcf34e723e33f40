import { Request, Response } from 'express';
import { requestContext } from '../middleware/auth';
import { DepositService } from '../services/deposit.service';
import { WithdrawalService } from '../services/withdrawal.service';
import { WithdrawalType } from '../types';
import { asyncHandler } from '../utils/async-handler';
import { RequestBody } from './request-body';

const WITHDRAWAL_TYPES: ReadonlySet<string> = new Set(Object.values(WithdrawalType));

const isWithdrawalType = (value: unknown): value is WithdrawalType =>
  typeof value === 'string' && WITHDRAWAL_TYPES.has(value);

export class PaymentController {
  constructor(
    private readonly withdrawalService: WithdrawalService,
    private readonly depositService: DepositService
  ) {}

  initiateWithdrawal = asyncHandler(async (req: Request, res: Response) => {
    const body = RequestBody.of(req);
    const type = body.raw('type');

    const result = await this.withdrawalService.initiateWithdrawal(requestContext(req), {
      amount: body.amount(),
      type: isWithdrawalType(type) ? type : undefined,
      bankCode: body.string('bankCode'),
      accountNumber: body.string('accountNumber'),
      accountName: body.requiredString('accountName'),
      mobileMoneyProvider: body.string('mobileMoneyProvider'),
      phoneNumber: body.string('phoneNumber'),
      idempotencyKey: body.string('idempotencyKey')
    });

    res.status(202).json({
      success: true,
      data: result
    });
  });

  finalizeTransfer = asyncHandler(async (req: Request, res: Response) => {
    const body = RequestBody.of(req);

    const result = await this.withdrawalService.finalizeTransfer(requestContext(req), {
      transferCode: body.requiredString('transferCode'),
      otp: body.requiredString('otp'),
      idempotencyKey: body.string('idempotencyKey')
    });

    res.json({
      success: true,
      data: result
    });
  });

  getBanks = asyncHandler(async (req: Request, res: Response) => {
    const { country } = req.query;

    const banks = await this.withdrawalService.getBanks(
      requestContext(req),
      typeof country === 'string' && country !== '' ? country : undefined
    );

    res.json({
      success: true,
      data: banks
    });
  });

  verifyBankAccount = asyncHandler(async (req: Request, res: Response) => {
    const body = RequestBody.of(req);

    const account = await this.withdrawalService.verifyBankAccount(
      requestContext(req),
      body.requiredString('accountNumber'),
      body.requiredString('bankCode')
    );

    res.json({
      success: true,
      data: account
    });
  });

  initializeDeposit = asyncHandler(async (req: Request, res: Response) => {
    const body = RequestBody.of(req);

    const session = await this.depositService.initializeTransaction(requestContext(req), {
      email: body.requiredString('email'),
      amount: body.amount(),
      currency: body.string('currency')
    });

    res.status(201).json({
      success: true,
      data: session
    });
  });

  chargeMobileMoney = asyncHandler(async (req: Request, res: Response) => {
    const body = RequestBody.of(req);

    const result = await this.depositService.chargeMobileMoney(requestContext(req), {
      email: body.requiredString('email'),
      amount: body.amount(),
      currency: body.string('currency'),
      provider: body.requiredString('provider'),
      phoneNumber: body.requiredString('phoneNumber'),
      idempotencyKey: body.string('idempotencyKey')
    });

    res.status(result.completed ? 200 : 202).json({
      success: true,
      data: result
    });
  });

  verifyPayment = asyncHandler(async (req: Request, res: Response) => {
    const confirmation = await this.depositService.verifyPayment(
      requestContext(req),
      RequestBody.of(req).requiredString('reference')
    );

    res.json({
      success: true,
      data: confirmation
    });
  });
}
