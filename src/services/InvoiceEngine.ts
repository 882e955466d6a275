import { Op, Transaction, TransactionOptions } from 'sequelize';
import { Client, LoyaltyEntry, Order, Product, Settlement, StockMutation, sequelize } from '../models';
import { Actor } from '../models/User';
import { LOYALTY_POINTS_UNIT } from '../config/settings';
import { CouponTable, getCouponTable } from './CouponTable';
import { applyRateToCents, fromCents, parseAmount, toCents } from '../utils/money';
import { InvalidInputError, InvoiceConflictError, translateStorageError, withStorage } from '../utils/errors';
import { PaymentMethod, PaidOrderStatus, paidStatusFor } from '../utils/paymentMethod';
import { rollbackQuietly } from '../utils/transaction';

export interface InvoiceLine {
    product_id: string;
    product_name: string;
    quantity: number;
    unit_price: number;
    line_total: number;
}

export interface Invoice {
    client_id: string;
    client_name: string;
    order_ids: string[];
    lines: InvoiceLine[];
    total_before_discount: number;
    coupon_code: string | null;
    discount_rate: number;
    discount_amount: number;
    total_after_discount: number;
    computed_at: string;
}

export interface OpenClient {
    client_id: string;
    name: string;
    open_order_count: number;
}

export interface PricedOrderRow {
    order_id: string;
    product_id: string;
    product_name: string;
    quantity: unknown;
    unit_price: unknown;
}

export interface SettleOptions {
    coupon_code?: string | null;
    actor?: Actor | null;
    coupons?: CouponTable;
    now?: Date;
}

export interface SettleResult {
    settlement_id: string | null;
    client_id: string;
    payment_method: PaymentMethod;
    status: PaidOrderStatus;
    settled_count: number;
    order_ids: string[];
    total_before_discount: number;
    coupon_code: string | null;
    discount_rate: number;
    total_after_discount: number;
    points_awarded: number;
    settled_at: string;
}

/**
 * Groups order rows by product, one line per product in order of first
 * appearance. Quantities and prices are parsed leniently; unreadable values
 * count as 0.
 */
export const priceOrderRows = (rows: PricedOrderRow[]): { lines: InvoiceLine[]; totalCents: number } => {
    const byProduct = new Map<string, { line: InvoiceLine; unitCents: number; lineCents: number }>();

    rows.forEach((row) => {
        const quantity = Math.max(0, Math.trunc(parseAmount(row.quantity)));
        const unitCents = toCents(row.unit_price);
        const existing = byProduct.get(row.product_id);
        if (existing) {
            existing.line.quantity += quantity;
            existing.lineCents += quantity * unitCents;
            return;
        }
        byProduct.set(row.product_id, {
            line: {
                product_id: row.product_id,
                product_name: row.product_name,
                quantity,
                unit_price: fromCents(unitCents),
                line_total: 0,
            },
            unitCents,
            lineCents: quantity * unitCents,
        });
    });

    let totalCents = 0;
    const lines = Array.from(byProduct.values()).map(({ line, lineCents }) => {
        totalCents += lineCents;
        return { ...line, line_total: fromCents(lineCents) };
    });
    return { lines, totalCents };
};

const transactionOptions = (): TransactionOptions => {
    // The in-memory test database has a single writer and no isolation levels.
    if (sequelize.getDialect() !== 'mysql') return {};
    return { isolationLevel: Transaction.ISOLATION_LEVELS.SERIALIZABLE };
};

export class InvoiceEngine {
    /**
     * Clients that have at least one open order, sorted by name.
     */
    static async listOpenClients(): Promise<OpenClient[]> {
        const orders = await withStorage(() => Order.findAll({
            where: { status: 'open' },
            attributes: ['id', 'client_id'],
            include: [{ model: Client, attributes: ['id', 'name'] }],
        }));

        const byClient = new Map<string, OpenClient>();
        orders.forEach((order) => {
            const entry = byClient.get(order.client_id);
            if (entry) {
                entry.open_order_count += 1;
                return;
            }
            byClient.set(order.client_id, {
                client_id: order.client_id,
                name: order.Client?.name ?? '',
                open_order_count: 1,
            });
        });

        return Array.from(byClient.values()).sort((a, b) => a.name.localeCompare(b.name));
    }

    /**
     * Prices every open order of a client at the products' current unit
     * price. Returns null when the client has nothing to invoice.
     */
    static async computeInvoice(clientId: string, now = new Date()): Promise<Invoice | null> {
        const orders = await withStorage(() => Order.findAll({
            where: { client_id: clientId, status: 'open' },
            include: [
                { model: Client, attributes: ['id', 'name'] },
                { model: Product, attributes: ['id', 'name', 'unit_price'] },
            ],
            order: [['createdAt', 'ASC'], ['id', 'ASC']],
        }));

        if (orders.length === 0) return null;

        const { lines, totalCents } = priceOrderRows(orders.map((order) => ({
            order_id: order.id,
            product_id: order.product_id,
            product_name: order.Product?.name ?? '',
            quantity: order.quantity,
            unit_price: order.Product?.unit_price,
        })));
        const total = fromCents(totalCents);

        return {
            client_id: clientId,
            client_name: orders[0].Client?.name ?? '',
            order_ids: orders.map((order) => order.id),
            lines,
            total_before_discount: total,
            coupon_code: null,
            discount_rate: 0,
            discount_amount: 0,
            total_after_discount: total,
            computed_at: now.toISOString(),
        };
    }

    /**
     * Applies a coupon to a computed invoice. Unknown or empty codes leave the
     * invoice undiscounted; this never throws.
     */
    static applyCoupon(invoice: Invoice, code: string, coupons: CouponTable = getCouponTable()): Invoice {
        const rate = coupons.resolve(code);
        const beforeCents = toCents(invoice.total_before_discount);

        if (rate === null) {
            return {
                ...invoice,
                coupon_code: null,
                discount_rate: 0,
                discount_amount: 0,
                total_after_discount: fromCents(beforeCents),
            };
        }

        const afterCents = applyRateToCents(beforeCents, rate);
        return {
            ...invoice,
            coupon_code: code,
            discount_rate: rate,
            discount_amount: fromCents(beforeCents - afterCents),
            total_after_discount: fromCents(afterCents),
        };
    }

    /**
     * Settles exactly the orders that were priced (the `order_ids` of a
     * computed invoice). If any of them is gone, belongs to another client or
     * is no longer open, nothing is settled and InvoiceConflictError is thrown.
     */
    static async settleOrders(
        clientId: string,
        orderIds: string[],
        method: PaymentMethod,
        options: SettleOptions = {}
    ): Promise<SettleResult> {
        const uniqueIds = Array.from(new Set(orderIds.map((id) => String(id).trim()).filter(Boolean)));
        if (uniqueIds.length === 0) {
            throw new InvalidInputError('order_ids must list at least one order to settle');
        }
        return this.settle(clientId, method, uniqueIds, options);
    }

    /**
     * Settles every order of the client that is open at the moment the
     * transaction runs, including orders added after the invoice was shown.
     * Zero open orders is a successful no-op.
     */
    static async settleInvoice(clientId: string, method: PaymentMethod, options: SettleOptions = {}): Promise<SettleResult> {
        return this.settle(clientId, method, null, options);
    }

    private static async settle(
        clientId: string,
        method: PaymentMethod,
        orderIds: string[] | null,
        options: SettleOptions
    ): Promise<SettleResult> {
        const settledAt = options.now ?? new Date();
        const status = paidStatusFor(method);
        const coupons = options.coupons ?? getCouponTable();

        const t = await withStorage(() => sequelize.transaction(transactionOptions()));
        try {
            const orders = await Order.findAll({
                where: orderIds
                    ? { id: { [Op.in]: orderIds } }
                    : { client_id: clientId, status: 'open' },
                order: [['createdAt', 'ASC'], ['id', 'ASC']],
                transaction: t,
                lock: t.LOCK.UPDATE,
            });

            if (orderIds) {
                const found = new Set(orders.map((order) => order.id));
                const missing = orderIds.filter((id) => !found.has(id));
                const foreign = orders.filter((order) => order.client_id !== clientId).map((order) => order.id);
                const closed = orders.filter((order) => order.status !== 'open').map((order) => order.id);
                if (missing.length > 0 || foreign.length > 0 || closed.length > 0) {
                    throw new InvoiceConflictError('Invoice is stale; recompute it before settling', {
                        missing_order_ids: missing,
                        other_client_order_ids: foreign,
                        already_settled_order_ids: closed,
                    });
                }
            }

            if (orders.length === 0) {
                await t.commit();
                return {
                    settlement_id: null,
                    client_id: clientId,
                    payment_method: method,
                    status,
                    settled_count: 0,
                    order_ids: [],
                    total_before_discount: 0,
                    coupon_code: null,
                    discount_rate: 0,
                    total_after_discount: 0,
                    points_awarded: 0,
                    settled_at: settledAt.toISOString(),
                };
            }

            const productIds = Array.from(new Set(orders.map((order) => order.product_id)));
            const products = await Product.findAll({
                where: { id: { [Op.in]: productIds } },
                attributes: ['id', 'name', 'unit_price'],
                transaction: t,
            });
            const productById = new Map(products.map((product) => [product.id, product]));

            const { lines, totalCents } = priceOrderRows(orders.map((order) => ({
                order_id: order.id,
                product_id: order.product_id,
                product_name: productById.get(order.product_id)?.name ?? '',
                quantity: order.quantity,
                unit_price: productById.get(order.product_id)?.unit_price,
            })));

            const couponCode = options.coupon_code ?? '';
            const rate = coupons.resolve(couponCode);
            const afterCents = rate === null ? totalCents : applyRateToCents(totalCents, rate);

            const settlement = await Settlement.create({
                client_id: clientId,
                payment_method: method,
                coupon_code: rate === null ? null : couponCode,
                discount_rate: rate ?? 0,
                total_before_discount: fromCents(totalCents),
                total_after_discount: fromCents(afterCents),
                order_count: orders.length,
                settled_by: options.actor?.id ?? null,
                settled_at: settledAt,
            }, { transaction: t });

            const ids = orders.map((order) => order.id);
            const [updated] = await Order.update(
                { status, settled_at: settledAt, settlement_id: settlement.id },
                { where: { id: { [Op.in]: ids }, status: 'open' }, transaction: t }
            );
            if (updated !== ids.length) {
                throw new InvoiceConflictError('Orders changed while settling; nothing was settled', {
                    expected: ids.length,
                    updated,
                });
            }

            // Sold quantities leave stock now; stock may go negative when sales outran counted stock.
            for (const line of lines) {
                if (line.quantity <= 0) continue;
                await StockMutation.create({
                    product_id: line.product_id,
                    type: 'out',
                    qty: line.quantity,
                    note: `Sale, settlement ${settlement.id}`,
                    created_by: options.actor?.id ?? null,
                }, { transaction: t });
                await Product.decrement({ stock_quantity: line.quantity }, {
                    where: { id: line.product_id },
                    transaction: t,
                });
            }

            const points = Math.floor(afterCents / (LOYALTY_POINTS_UNIT * 100));
            if (points > 0) {
                await LoyaltyEntry.create({
                    client_id: clientId,
                    points,
                    reason: 'purchase',
                    settlement_id: settlement.id,
                    created_by: options.actor?.id ?? null,
                }, { transaction: t });
            }

            await t.commit();

            return {
                settlement_id: settlement.id,
                client_id: clientId,
                payment_method: method,
                status,
                settled_count: ids.length,
                order_ids: ids,
                total_before_discount: fromCents(totalCents),
                coupon_code: settlement.coupon_code,
                discount_rate: rate ?? 0,
                total_after_discount: fromCents(afterCents),
                points_awarded: points,
                settled_at: settledAt.toISOString(),
            };
        } catch (error) {
            await rollbackQuietly(t, 'InvoiceEngine');
            throw translateStorageError(error);
        }
    }
}
