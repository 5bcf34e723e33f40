import { Router } from 'express';
import { MomoController } from '../controllers/momo.controller';
import { authenticate, authorize } from '../middleware/auth';
import { validateRequest } from '../middleware/validate';
import { momoBalanceValidator, momoPaymentValidator, momoStatusValidator } from '../validators/momo.validators';

export const momoRoutes = (momoController: MomoController): Router => {
  const router = Router();

  // Collection: the payer approves on their phone
  router.post(
    '/request-to-pay',
    authenticate,
    momoPaymentValidator,
    validateRequest,
    momoController.requestToPay
  );

  // Disbursement from the wallet
  router.post(
    '/transfer',
    authenticate,
    momoPaymentValidator,
    validateRequest,
    momoController.transfer
  );

  router.get(
    '/status/:referenceId',
    authenticate,
    momoStatusValidator,
    validateRequest,
    momoController.checkStatus
  );

  // Merchant account balance, for operations staff
  router.get(
    '/balance',
    authenticate,
    authorize('admin'),
    momoBalanceValidator,
    validateRequest,
    momoController.getBalance
  );

  return router;
};
