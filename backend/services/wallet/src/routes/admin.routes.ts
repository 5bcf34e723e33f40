import { Router } from 'express';
import { AdminController } from '../controllers/admin.controller';
import { authenticate, authorize } from '../middleware/auth';

export const adminRoutes = (adminController: AdminController): Router => {
  const router = Router();

  router.post(
    '/exchange-rates/refresh',
    authenticate,
    authorize('admin'),
    adminController.refreshExchangeRates
  );

  return router;
};
