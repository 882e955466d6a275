import { Op, WhereOperators, WhereOptions } from 'sequelize';
import { Order, Product, Settlement } from '../models';
import { InvalidInputError, withStorage } from '../utils/errors';
import { DailyTotal, forecastRevenue, toDayKey } from '../utils/forecast';
import { fromCents, toCents } from '../utils/money';
import { PAYMENT_METHODS, PaymentMethod } from '../utils/paymentMethod';

export interface RevenueReportOptions {
    from?: Date | null;
    to?: Date | null;
    forecastDays?: number;
}

export interface RevenueReport {
    from: string | null;
    to: string | null;
    total: number;
    daily: DailyTotal[];
    by_method: Record<PaymentMethod, number>;
    forecast: DailyTotal[];
}

export interface StockSummaryRow {
    product_id: string;
    name: string;
    stock_quantity: number;
    open_quantity: number;
    available: number;
}

export const DEFAULT_FORECAST_DAYS = 30;
export const MAX_FORECAST_DAYS = 365;

export class ReportService {
    /** Settled revenue (after discounts) per UTC day and per payment method, plus a linear forecast. */
    static async revenue(options: RevenueReportOptions = {}): Promise<RevenueReport> {
        const forecastDays = options.forecastDays ?? DEFAULT_FORECAST_DAYS;
        if (!Number.isInteger(forecastDays) || forecastDays < 1 || forecastDays > MAX_FORECAST_DAYS) {
            throw new InvalidInputError(`forecast_days must be between 1 and ${MAX_FORECAST_DAYS}`);
        }
        if (options.from && options.to && options.from.getTime() > options.to.getTime()) {
            throw new InvalidInputError('from must not be after to');
        }

        const range: WhereOperators = {};
        if (options.from) range[Op.gte] = options.from;
        if (options.to) range[Op.lte] = options.to;
        const where: WhereOptions = options.from || options.to ? { settled_at: range } : {};

        const settlements = await withStorage(() => Settlement.findAll({
            where,
            attributes: ['payment_method', 'total_after_discount', 'settled_at'],
            order: [['settled_at', 'ASC']],
        }));

        const dailyCents = new Map<string, number>();
        const methodCents = new Map<PaymentMethod, number>(PAYMENT_METHODS.map((method) => [method, 0]));
        let totalCents = 0;

        settlements.forEach((settlement) => {
            const cents = toCents(settlement.total_after_discount);
            const day = toDayKey(new Date(settlement.settled_at));
            dailyCents.set(day, (dailyCents.get(day) ?? 0) + cents);
            methodCents.set(settlement.payment_method, (methodCents.get(settlement.payment_method) ?? 0) + cents);
            totalCents += cents;
        });

        const daily = Array.from(dailyCents.entries())
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([date, cents]) => ({ date, total: fromCents(cents) }));

        const byMethod = {
            debit: fromCents(methodCents.get('debit') ?? 0),
            credit: fromCents(methodCents.get('credit') ?? 0),
            pix: fromCents(methodCents.get('pix') ?? 0),
            cash: fromCents(methodCents.get('cash') ?? 0),
        };

        return {
            from: options.from ? options.from.toISOString() : null,
            to: options.to ? options.to.toISOString() : null,
            total: fromCents(totalCents),
            daily,
            by_method: byMethod,
            forecast: forecastRevenue(daily, forecastDays),
        };
    }

    /**
     * Stock on hand against quantities still on open tabs. Settled sales have
     * already left `stock_quantity`; `available` is what is left once the open
     * orders are served. Most available first.
     */
    static async stock(): Promise<StockSummaryRow[]> {
        const [products, openOrders] = await withStorage(() => Promise.all([
            Product.findAll({ attributes: ['id', 'name', 'stock_quantity'] }),
            Order.findAll({ where: { status: 'open' }, attributes: ['product_id', 'quantity'] }),
        ]));

        const openByProduct = new Map<string, number>();
        openOrders.forEach((order) => {
            openByProduct.set(order.product_id, (openByProduct.get(order.product_id) ?? 0) + Number(order.quantity || 0));
        });

        return products
            .map((product) => {
                const stockQuantity = Number(product.stock_quantity || 0);
                const openQuantity = openByProduct.get(product.id) ?? 0;
                return {
                    product_id: product.id,
                    name: product.name,
                    stock_quantity: stockQuantity,
                    open_quantity: openQuantity,
                    available: stockQuantity - openQuantity,
                };
            })
            .sort((a, b) => b.available - a.available || a.name.localeCompare(b.name));
    }
}
