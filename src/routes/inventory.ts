import { Router } from 'express';
import * as InventoryController from '../controllers/InventoryController';
import { authenticateToken, authorizeRoles } from '../middleware/authMiddleware';

const router = Router();

router.use(authenticateToken);

// Products
router.get('/products', authorizeRoles('admin', 'cashier'), InventoryController.getProducts);
router.post('/products', authorizeRoles('admin'), InventoryController.createProduct);
router.get('/products/:id', authorizeRoles('admin', 'cashier'), InventoryController.getProduct);
router.patch('/products/:id', authorizeRoles('admin'), InventoryController.updateProduct);
router.delete('/products/:id', authorizeRoles('admin'), InventoryController.removeProduct);

// Stock movements
router.get('/stock', authorizeRoles('admin', 'cashier'), InventoryController.getStockMutations);
router.post('/stock', authorizeRoles('admin', 'cashier'), InventoryController.recordStockMutation);

export default router;
