import { Request, Response } from 'express';
import { EventService } from '../services/EventService';
import { sendError } from '../utils/httpError';
import { normalizeText } from '../utils/parse';

export const getEvents = async (req: Request, res: Response) => {
    try {
        const events = await EventService.list(normalizeText(req.query.month) || undefined);
        return res.json({ events });
    } catch (error) {
        return sendError(res, error, 'Error fetching events');
    }
};

export const getEvent = async (req: Request, res: Response) => {
    try {
        const event = await EventService.get(normalizeText(req.params.id));
        return res.json({ event });
    } catch (error) {
        return sendError(res, error, 'Error fetching event');
    }
};

export const createEvent = async (req: Request, res: Response) => {
    try {
        const event = await EventService.create(req.body ?? {});
        return res.status(201).json({ message: 'Event scheduled', event });
    } catch (error) {
        return sendError(res, error, 'Error scheduling event');
    }
};

export const updateEvent = async (req: Request, res: Response) => {
    try {
        const event = await EventService.update(normalizeText(req.params.id), req.body ?? {});
        return res.json({ message: 'Event updated', event });
    } catch (error) {
        return sendError(res, error, 'Error updating event');
    }
};

export const removeEvent = async (req: Request, res: Response) => {
    try {
        await EventService.remove(normalizeText(req.params.id));
        return res.json({ message: 'Event deleted' });
    } catch (error) {
        return sendError(res, error, 'Error deleting event');
    }
};
