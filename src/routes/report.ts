import { Router } from 'express';
import * as ReportController from '../controllers/ReportController';
import { authenticateToken, authorizeRoles } from '../middleware/authMiddleware';

const router = Router();

router.get('/revenue', authenticateToken, authorizeRoles('admin'), ReportController.getRevenueReport);
router.get('/stock', authenticateToken, authorizeRoles('admin', 'cashier'), ReportController.getStockSummary);

export default router;
