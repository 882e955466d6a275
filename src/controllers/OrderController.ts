import { Request, Response } from 'express';
import { OrderService } from '../services/OrderService';
import { sendError } from '../utils/httpError';

export const getOrders = async (req: Request, res: Response) => {
    try {
        const orders = await OrderService.list({
            status: req.query.status,
            client_id: req.query.client_id,
        });
        return res.json({ orders });
    } catch (error) {
        return sendError(res, error, 'Error fetching orders');
    }
};

export const getOrder = async (req: Request, res: Response) => {
    try {
        const order = await OrderService.get(req.params.id);
        return res.json({ order });
    } catch (error) {
        return sendError(res, error, 'Error fetching order');
    }
};

export const createOrder = async (req: Request, res: Response) => {
    try {
        const order = await OrderService.create(req.body ?? {});
        return res.status(201).json({ message: 'Order registered', order });
    } catch (error) {
        return sendError(res, error, 'Error registering order');
    }
};

export const updateOrder = async (req: Request, res: Response) => {
    try {
        const order = await OrderService.update(req.params.id, req.body ?? {});
        return res.json({ message: 'Order updated', order });
    } catch (error) {
        return sendError(res, error, 'Error updating order');
    }
};

export const removeOrder = async (req: Request, res: Response) => {
    try {
        await OrderService.remove(req.params.id);
        return res.json({ message: 'Order deleted' });
    } catch (error) {
        return sendError(res, error, 'Error deleting order');
    }
};
