import { Router } from 'express';
import * as LoyaltyController from '../controllers/LoyaltyController';
import { authenticateToken, authorizeRoles } from '../middleware/authMiddleware';

const router = Router();

router.use(authenticateToken);

router.get('/', authorizeRoles('admin', 'cashier'), LoyaltyController.getLoyaltySummary);
router.get('/:clientId', authorizeRoles('admin', 'cashier'), LoyaltyController.getClientPoints);
router.post('/:clientId/redeem', authorizeRoles('admin', 'cashier'), LoyaltyController.redeemReward);
router.post('/:clientId/adjust', authorizeRoles('admin'), LoyaltyController.adjustPoints);

export default router;
