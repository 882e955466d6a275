import { Request, Response } from 'express';
import { InvoiceEngine } from '../services/InvoiceEngine';
import { getCouponTable } from '../services/CouponTable';
import { sendError } from '../utils/httpError';
import { normalizeText, parseIdList } from '../utils/parse';
import { PAYMENT_METHODS, parsePaymentMethod } from '../utils/paymentMethod';

const readCouponCode = (value: unknown): string | null => (typeof value === 'string' ? value : null);

export const getOpenClients = async (req: Request, res: Response) => {
    try {
        const clients = await InvoiceEngine.listOpenClients();
        return res.json({ clients });
    } catch (error) {
        return sendError(res, error, 'Error fetching clients with open orders');
    }
};

export const getInvoice = async (req: Request, res: Response) => {
    try {
        const invoice = await InvoiceEngine.computeInvoice(normalizeText(req.params.clientId));
        if (!invoice) {
            return res.json({ message: 'No open orders for this client', invoice: null });
        }

        const couponCode = readCouponCode(req.query.coupon);
        return res.json({
            invoice: couponCode === null ? invoice : InvoiceEngine.applyCoupon(invoice, couponCode)
        });
    } catch (error) {
        return sendError(res, error, 'Error computing invoice');
    }
};

export const checkCoupon = (req: Request, res: Response) => {
    const code = req.params.code;
    const rate = getCouponTable().resolve(code);
    return res.json({ code, valid: rate !== null, discount_rate: rate ?? 0 });
};

export const settleInvoice = async (req: Request, res: Response) => {
    try {
        const method = parsePaymentMethod(req.body?.payment_method);
        if (!method) {
            return res.status(400).json({ message: `payment_method must be one of: ${PAYMENT_METHODS.join(', ')}` });
        }
        const orderIds = parseIdList(req.body?.order_ids);
        if (!orderIds || orderIds.length === 0) {
            return res.status(400).json({ message: 'order_ids from the computed invoice are required' });
        }

        const result = await InvoiceEngine.settleOrders(normalizeText(req.params.clientId), orderIds, method, {
            coupon_code: readCouponCode(req.body?.coupon_code),
            actor: req.user,
        });
        return res.json({ message: 'Payment recorded', result });
    } catch (error) {
        return sendError(res, error, 'Error settling invoice');
    }
};

// Settles whatever is open right now, even orders added after the invoice was shown.
export const settleAllOpen = async (req: Request, res: Response) => {
    try {
        const method = parsePaymentMethod(req.body?.payment_method);
        if (!method) {
            return res.status(400).json({ message: `payment_method must be one of: ${PAYMENT_METHODS.join(', ')}` });
        }

        const result = await InvoiceEngine.settleInvoice(normalizeText(req.params.clientId), method, {
            coupon_code: readCouponCode(req.body?.coupon_code),
            actor: req.user,
        });
        return res.json({
            message: result.settled_count > 0 ? 'Payment recorded' : 'No open orders to settle',
            result
        });
    } catch (error) {
        return sendError(res, error, 'Error settling open orders');
    }
};
