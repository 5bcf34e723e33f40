import { Router } from 'express';
import { WalletController } from '../controllers/wallet.controller';
import { authenticate } from '../middleware/auth';
import { validateRequest } from '../middleware/validate';
import {
  createAccountValidator,
  listTransactionsValidator,
  lookupWalletValidator,
  sendMoneyValidator,
  updateKycStatusValidator
} from '../validators/wallet.validators';

export const accountRoutes = (walletController: WalletController): Router => {
  const router = Router();

  // Create the caller's account and wallet
  router.post(
    '/',
    authenticate,
    createAccountValidator,
    validateRequest,
    walletController.createAccount
  );

  return router;
};

export const walletRoutes = (walletController: WalletController): Router => {
  const router = Router();

  router.get(
    '/',
    authenticate,
    walletController.getWallet
  );

  router.get(
    '/transactions',
    authenticate,
    listTransactionsValidator,
    validateRequest,
    walletController.listTransactions
  );

  // Wallet-to-wallet transfer
  router.post(
    '/send',
    authenticate,
    sendMoneyValidator,
    validateRequest,
    walletController.sendMoney
  );

  router.post(
    '/lookup',
    authenticate,
    lookupWalletValidator,
    validateRequest,
    walletController.lookupWallet
  );

  return router;
};

export const kycRoutes = (walletController: WalletController): Router => {
  const router = Router();

  router.post(
    '/status',
    authenticate,
    updateKycStatusValidator,
    validateRequest,
    walletController.updateKycStatus
  );

  return router;
};
