import { Router } from 'express';
import { PaymentController } from '../controllers/payment.controller';
import { authenticate } from '../middleware/auth';
import { validateRequest } from '../middleware/validate';
import {
  finalizeTransferValidator,
  initializeDepositValidator,
  initiateWithdrawalValidator,
  listBanksValidator,
  mobileMoneyChargeValidator,
  verifyAccountValidator,
  verifyPaymentValidator
} from '../validators/payment.validators';

export const withdrawalRoutes = (paymentController: PaymentController): Router => {
  const router = Router();

  router.post(
    '/',
    authenticate,
    initiateWithdrawalValidator,
    validateRequest,
    paymentController.initiateWithdrawal
  );

  // Complete a transfer that is waiting on an OTP
  router.post(
    '/finalize',
    authenticate,
    finalizeTransferValidator,
    validateRequest,
    paymentController.finalizeTransfer
  );

  return router;
};

export const bankRoutes = (paymentController: PaymentController): Router => {
  const router = Router();

  router.get(
    '/',
    authenticate,
    listBanksValidator,
    validateRequest,
    paymentController.getBanks
  );

  router.post(
    '/verify-account',
    authenticate,
    verifyAccountValidator,
    validateRequest,
    paymentController.verifyBankAccount
  );

  return router;
};

export const depositRoutes = (paymentController: PaymentController): Router => {
  const router = Router();

  router.post(
    '/initialize',
    authenticate,
    initializeDepositValidator,
    validateRequest,
    paymentController.initializeDeposit
  );

  router.post(
    '/mobile-money',
    authenticate,
    mobileMoneyChargeValidator,
    validateRequest,
    paymentController.chargeMobileMoney
  );

  router.post(
    '/verify',
    authenticate,
    verifyPaymentValidator,
    validateRequest,
    paymentController.verifyPayment
  );

  return router;
};
