import { Router } from 'express';
import { Container } from '../container';
import { AdminController } from '../controllers/admin.controller';
import { MomoController } from '../controllers/momo.controller';
import { PaymentController } from '../controllers/payment.controller';
import { QrController } from '../controllers/qr.controller';
import { WalletController } from '../controllers/wallet.controller';
import { adminRoutes } from './admin.routes';
import { momoRoutes } from './momo.routes';
import { bankRoutes, depositRoutes, withdrawalRoutes } from './payment.routes';
import { qrRoutes } from './qr.routes';
import { accountRoutes, kycRoutes, walletRoutes } from './wallet.routes';

export const createApiRouter = (container: Container): Router => {
  const router = Router();

  const walletController = new WalletController(container.wallets, container.kyc);
  const paymentController = new PaymentController(container.withdrawals, container.deposits);

  router.use('/accounts', accountRoutes(walletController));
  router.use('/wallet', walletRoutes(walletController));
  router.use('/kyc', kycRoutes(walletController));
  router.use('/withdrawals', withdrawalRoutes(paymentController));
  router.use('/banks', bankRoutes(paymentController));
  router.use('/deposits', depositRoutes(paymentController));
  router.use('/momo', momoRoutes(new MomoController(container.momo)));
  router.use('/qr', qrRoutes(new QrController(container.qr)));
  router.use('/admin', adminRoutes(new AdminController(container.rates)));

  return router;
};
