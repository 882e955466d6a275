import { Router } from 'express';
import * as EventController from '../controllers/EventController';
import { authenticateToken, authorizeRoles } from '../middleware/authMiddleware';

const router = Router();

router.use(authenticateToken);

router.get('/', authorizeRoles('admin', 'cashier'), EventController.getEvents);
router.get('/:id', authorizeRoles('admin', 'cashier'), EventController.getEvent);
router.post('/', authorizeRoles('admin'), EventController.createEvent);
router.patch('/:id', authorizeRoles('admin'), EventController.updateEvent);
router.delete('/:id', authorizeRoles('admin'), EventController.removeEvent);

export default router;
