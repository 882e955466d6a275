import { Includeable } from 'sequelize';
import { Client, Order, Product } from '../models';
import { OrderStatus, isOrderStatus } from '../utils/paymentMethod';
import { InvalidInputError, InvoiceConflictError, NotFoundError, withStorage } from '../utils/errors';
import { normalizeText, parsePositiveInt } from '../utils/parse';

export interface OrderInput {
    client_id?: unknown;
    product_id?: unknown;
    quantity?: unknown;
}

export interface OrderFilter {
    status?: unknown;
    client_id?: unknown;
}

const ORDER_INCLUDES: Includeable[] = [
    { model: Client, attributes: ['id', 'name'] },
    { model: Product, attributes: ['id', 'name', 'unit_price'] },
];

const ensureExists = async (clientId: string, productId: string) => {
    const [client, product] = await withStorage(() => Promise.all([
        Client.findByPk(clientId, { attributes: ['id'] }),
        Product.findByPk(productId, { attributes: ['id'] }),
    ]));
    if (!client) throw new NotFoundError(`Client ${clientId} not found`);
    if (!product) throw new NotFoundError(`Product ${productId} not found`);
};

/** Paid orders are frozen; only open ones may be edited or removed. */
const findOpenOrderOrFail = async (id: string) => {
    const order = await withStorage(() => Order.findByPk(id));
    if (!order) throw new NotFoundError(`Order ${id} not found`);
    if (order.status !== 'open') {
        throw new InvoiceConflictError(`Order ${id} is already ${order.status} and can no longer change`, {
            status: order.status,
        });
    }
    return order;
};

export class OrderService {
    static async create(input: OrderInput) {
        const clientId = normalizeText(input.client_id);
        const productId = normalizeText(input.product_id);
        const quantity = parsePositiveInt(input.quantity);
        if (!clientId || !productId) throw new InvalidInputError('client_id and product_id are required');
        if (quantity === null) throw new InvalidInputError('quantity must be a positive integer');

        await ensureExists(clientId, productId);
        const order = await withStorage(() => Order.create({
            client_id: clientId,
            product_id: productId,
            quantity,
            status: 'open',
        }));
        return order;
    }

    static async list(filter: OrderFilter = {}) {
        const where: { status?: OrderStatus; client_id?: string } = {};
        if (filter.status !== undefined && filter.status !== '') {
            if (!isOrderStatus(filter.status)) throw new InvalidInputError(`Unknown order status ${String(filter.status)}`);
            where.status = filter.status;
        }
        const clientId = normalizeText(filter.client_id);
        if (clientId) where.client_id = clientId;

        return withStorage(() => Order.findAll({
            where,
            include: ORDER_INCLUDES,
            order: [['createdAt', 'DESC'], ['id', 'DESC']],
        }));
    }

    static async get(id: string) {
        const order = await withStorage(() => Order.findByPk(id, { include: ORDER_INCLUDES }));
        if (!order) throw new NotFoundError(`Order ${id} not found`);
        return order;
    }

    static async update(id: string, input: OrderInput) {
        const order = await findOpenOrderOrFail(id);
        const updates: { product_id?: string; quantity?: number } = {};

        if (input.client_id !== undefined && normalizeText(input.client_id) !== order.client_id) {
            throw new InvalidInputError('An order cannot be moved to another client');
        }
        if (input.product_id !== undefined) {
            const productId = normalizeText(input.product_id);
            if (!productId) throw new InvalidInputError('product_id cannot be empty');
            await ensureExists(order.client_id, productId);
            updates.product_id = productId;
        }
        if (input.quantity !== undefined) {
            const quantity = parsePositiveInt(input.quantity);
            if (quantity === null) throw new InvalidInputError('quantity must be a positive integer');
            updates.quantity = quantity;
        }

        // Guard on status so an order settled in the meantime is left alone.
        const [updated] = await withStorage(() => Order.update(updates, { where: { id, status: 'open' } }));
        if (updated === 0) throw new InvoiceConflictError(`Order ${id} was settled before the change was saved`);
        return this.get(id);
    }

    static async remove(id: string) {
        await findOpenOrderOrFail(id);
        const removed = await withStorage(() => Order.destroy({ where: { id, status: 'open' } }));
        if (removed === 0) throw new InvoiceConflictError(`Order ${id} was settled before it could be removed`);
    }
}
