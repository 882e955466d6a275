import { Router } from 'express';
import * as ClientController from '../controllers/ClientController';
import { authenticateToken, authorizeRoles } from '../middleware/authMiddleware';

const router = Router();

router.use(authenticateToken);

router.get('/', authorizeRoles('admin', 'cashier'), ClientController.getClients);
router.post('/', authorizeRoles('admin', 'cashier'), ClientController.createClient);
router.get('/:id', authorizeRoles('admin', 'cashier'), ClientController.getClient);
router.patch('/:id', authorizeRoles('admin', 'cashier'), ClientController.updateClient);
router.delete('/:id', authorizeRoles('admin'), ClientController.removeClient);

export default router;
