import { Router } from 'express';
import { QrController } from '../controllers/qr.controller';
import { authenticate } from '../middleware/auth';
import { validateRequest } from '../middleware/validate';
import { signQrValidator, verifyQrValidator } from '../validators/qr.validators';

export const qrRoutes = (qrController: QrController): Router => {
  const router = Router();

  router.post('/sign', authenticate, signQrValidator, validateRequest, qrController.sign);
  router.post('/verify', authenticate, verifyQrValidator, validateRequest, qrController.verify);

  return router;
};
