import { Router } from 'express';
import * as OrderController from '../controllers/OrderController';
import { authenticateToken, authorizeRoles } from '../middleware/authMiddleware';

const router = Router();

router.use(authenticateToken);

router.get('/', authorizeRoles('admin', 'cashier'), OrderController.getOrders);
router.post('/', authorizeRoles('admin', 'cashier'), OrderController.createOrder);
router.get('/:id', authorizeRoles('admin', 'cashier'), OrderController.getOrder);

// Corrections to open orders
router.patch('/:id', authorizeRoles('admin'), OrderController.updateOrder);
router.delete('/:id', authorizeRoles('admin'), OrderController.removeOrder);

export default router;
