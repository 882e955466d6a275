import { OrderService } from '../services/OrderService';
import { InvalidInputError, InvoiceConflictError, NotFoundError } from '../utils/errors';
import { closeDatabase, createClient, createOrder, createProduct, minutesAfter, resetDatabase } from './helpers/db';

const T0 = new Date('2026-03-01T12:00:00.000Z');

describe('OrderService', () => {
    beforeEach(resetDatabase);
    afterAll(closeDatabase);

    it('creates an open order', async () => {
        const ana = await createClient('Ana');
        const water = await createProduct('Water', 5);

        const order = await OrderService.create({ client_id: ana.id, product_id: water.id, quantity: '2' });

        expect(order.status).toBe('open');
        expect(order.quantity).toBe(2);
        expect(order.client_id).toBe(ana.id);
    });

    it.each([0, -1, 1.5, 'two', ''])('rejects quantity %p', async (quantity) => {
        const ana = await createClient('Ana');
        const water = await createProduct('Water', 5);

        await expect(OrderService.create({ client_id: ana.id, product_id: water.id, quantity }))
            .rejects.toBeInstanceOf(InvalidInputError);
    });

    it('requires an existing client and product', async () => {
        const ana = await createClient('Ana');
        const water = await createProduct('Water', 5);
        const missing = '00000000-0000-4000-8000-000000000000';

        await expect(OrderService.create({ client_id: missing, product_id: water.id, quantity: 1 }))
            .rejects.toThrow(`Client ${missing} not found`);
        await expect(OrderService.create({ client_id: ana.id, product_id: missing, quantity: 1 }))
            .rejects.toThrow(`Product ${missing} not found`);
        await expect(OrderService.create({ product_id: water.id, quantity: 1 }))
            .rejects.toBeInstanceOf(InvalidInputError);
    });

    it('filters by status and client, newest first', async () => {
        const ana = await createClient('Ana');
        const bruno = await createClient('Bruno');
        const water = await createProduct('Water', 5);
        const first = await createOrder(ana, water, 1, T0);
        const second = await createOrder(ana, water, 2, minutesAfter(T0, 5));
        await createOrder(ana, water, 3, minutesAfter(T0, 6), 'paid_cash');
        await createOrder(bruno, water, 4, minutesAfter(T0, 7));

        const open = await OrderService.list({ status: 'open', client_id: ana.id });

        expect(open.map((order) => order.id)).toEqual([second.id, first.id]);
        expect(open[0].Product?.name).toBe('Water');
        expect(await OrderService.list({ status: 'paid_cash' })).toHaveLength(1);
        expect(await OrderService.list()).toHaveLength(4);
        await expect(OrderService.list({ status: 'closed' })).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('edits an open order', async () => {
        const ana = await createClient('Ana');
        const water = await createProduct('Water', 5);
        const chips = await createProduct('Chips', 8);
        const order = await createOrder(ana, water, 1, T0);

        const updated = await OrderService.update(order.id, { product_id: chips.id, quantity: 4 });

        expect(updated.product_id).toBe(chips.id);
        expect(updated.quantity).toBe(4);
        expect(updated.Product?.name).toBe('Chips');
    });

    it('refuses to move an order to another client', async () => {
        const ana = await createClient('Ana');
        const bruno = await createClient('Bruno');
        const water = await createProduct('Water', 5);
        const order = await createOrder(ana, water, 1, T0);

        await expect(OrderService.update(order.id, { client_id: bruno.id }))
            .rejects.toThrow('An order cannot be moved to another client');
    });

    it('freezes paid orders', async () => {
        const ana = await createClient('Ana');
        const water = await createProduct('Water', 5);
        const paid = await createOrder(ana, water, 1, T0, 'paid_pix');

        await expect(OrderService.update(paid.id, { quantity: 2 })).rejects.toBeInstanceOf(InvoiceConflictError);
        await expect(OrderService.remove(paid.id)).rejects.toMatchObject({
            code: 'INVOICE_CONFLICT',
            details: { status: 'paid_pix' },
        });
        expect((await OrderService.get(paid.id)).quantity).toBe(1);
    });

    it('removes an open order', async () => {
        const ana = await createClient('Ana');
        const water = await createProduct('Water', 5);
        const order = await createOrder(ana, water, 1, T0);

        await OrderService.remove(order.id);

        await expect(OrderService.get(order.id)).rejects.toBeInstanceOf(NotFoundError);
    });
});
