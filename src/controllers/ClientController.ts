import { Request, Response } from 'express';
import { ClientService } from '../services/ClientService';
import { sendError } from '../utils/httpError';
import { normalizeText } from '../utils/parse';

export const getClients = async (req: Request, res: Response) => {
    try {
        const clients = await ClientService.list(normalizeText(req.query.q));
        return res.json({ clients });
    } catch (error) {
        return sendError(res, error, 'Error fetching clients');
    }
};

export const getClient = async (req: Request, res: Response) => {
    try {
        const client = await ClientService.get(req.params.id);
        return res.json({ client });
    } catch (error) {
        return sendError(res, error, 'Error fetching client');
    }
};

export const createClient = async (req: Request, res: Response) => {
    try {
        const client = await ClientService.create(req.body ?? {});
        return res.status(201).json({ message: 'Client created', client });
    } catch (error) {
        return sendError(res, error, 'Error creating client');
    }
};

export const updateClient = async (req: Request, res: Response) => {
    try {
        const client = await ClientService.update(req.params.id, req.body ?? {});
        return res.json({ message: 'Client updated', client });
    } catch (error) {
        return sendError(res, error, 'Error updating client');
    }
};

export const removeClient = async (req: Request, res: Response) => {
    try {
        await ClientService.remove(req.params.id);
        return res.json({ message: 'Client deleted' });
    } catch (error) {
        return sendError(res, error, 'Error deleting client');
    }
};
