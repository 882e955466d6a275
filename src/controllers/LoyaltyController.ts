import { Request, Response } from 'express';
import { LoyaltyService } from '../services/LoyaltyService';
import { sendError } from '../utils/httpError';

export const getLoyaltySummary = async (req: Request, res: Response) => {
    try {
        const clients = await LoyaltyService.summary();
        return res.json({ clients });
    } catch (error) {
        return sendError(res, error, 'Error fetching loyalty summary');
    }
};

export const getClientPoints = async (req: Request, res: Response) => {
    try {
        const balance = await LoyaltyService.balance(req.params.clientId);
        return res.json(balance);
    } catch (error) {
        return sendError(res, error, 'Error fetching loyalty points');
    }
};

export const adjustPoints = async (req: Request, res: Response) => {
    try {
        const result = await LoyaltyService.adjust(req.params.clientId, req.body ?? {}, req.user);
        return res.status(201).json({ message: 'Points adjusted', ...result });
    } catch (error) {
        return sendError(res, error, 'Error adjusting loyalty points');
    }
};

export const redeemReward = async (req: Request, res: Response) => {
    try {
        const result = await LoyaltyService.redeem(req.params.clientId, req.user);
        return res.status(201).json({ message: 'Reward redeemed', ...result });
    } catch (error) {
        return sendError(res, error, 'Error redeeming reward');
    }
};
