import { Router } from 'express';
import * as InvoiceController from '../controllers/InvoiceController';
import { authenticateToken, authorizeRoles } from '../middleware/authMiddleware';

const router = Router();

router.use(authenticateToken, authorizeRoles('admin', 'cashier'));

router.get('/open-clients', InvoiceController.getOpenClients);
router.get('/coupons/:code', InvoiceController.checkCoupon);
router.get('/:clientId', InvoiceController.getInvoice);
router.post('/:clientId/settle', InvoiceController.settleInvoice);
router.post('/:clientId/settle-all', InvoiceController.settleAllOpen);

export default router;
