import { Request, Response } from 'express';
import { ReportService } from '../services/ReportService';
import { sendError } from '../utils/httpError';
import { normalizeText, parseDateParam, parsePositiveInt } from '../utils/parse';

export const getRevenueReport = async (req: Request, res: Response) => {
    try {
        const rawFrom = normalizeText(req.query.from);
        const rawTo = normalizeText(req.query.to);
        const from = parseDateParam(rawFrom);
        // A bare day as `to` covers that whole (UTC) day.
        const to = parseDateParam(/^\d{4}-\d{2}-\d{2}$/.test(rawTo) ? `${rawTo}T23:59:59.999Z` : rawTo);
        if ((rawFrom && !from) || (rawTo && !to)) {
            return res.status(400).json({ message: 'from/to must be valid dates (YYYY-MM-DD)' });
        }

        const rawDays = normalizeText(req.query.forecast_days);
        const forecastDays = rawDays ? parsePositiveInt(rawDays) : undefined;
        if (forecastDays === null) {
            return res.status(400).json({ message: 'forecast_days must be a positive integer' });
        }

        const report = await ReportService.revenue({ from, to, forecastDays });
        return res.json(report);
    } catch (error) {
        return sendError(res, error, 'Error building revenue report');
    }
};

export const getStockSummary = async (req: Request, res: Response) => {
    try {
        const products = await ReportService.stock();
        const totalAvailable = products.reduce((sum, row) => sum + row.available, 0);
        return res.json({ products, total_available: totalAvailable });
    } catch (error) {
        return sendError(res, error, 'Error building stock summary');
    }
};
