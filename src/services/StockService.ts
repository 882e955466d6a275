import { Product, StockMutation, sequelize } from '../models';
import { Actor } from '../models/User';
import { STOCK_MUTATION_TYPES, StockMutationType } from '../models/StockMutation';
import { InvalidInputError, NotFoundError, translateStorageError, withStorage } from '../utils/errors';
import { rollbackQuietly } from '../utils/transaction';
import { normalizeText, optionalText, parseNonNegativeInt, parsePositiveInt } from '../utils/parse';

export interface StockMovementInput {
    product_id?: unknown;
    type?: unknown;
    qty?: unknown;
    note?: unknown;
}

const parseMutationType = (value: unknown): StockMutationType | null => {
    const normalized = normalizeText(value).toLowerCase();
    return STOCK_MUTATION_TYPES.find((type) => type === normalized) ?? null;
};

export class StockService {
    /**
     * Records a stock movement. `in` and `out` move the quantity by `qty`;
     * `adjustment` sets the counted quantity and stores the signed delta.
     */
    static async record(input: StockMovementInput, actor?: Actor | null) {
        const productId = normalizeText(input.product_id);
        if (!productId) throw new InvalidInputError('product_id is required');
        const type = parseMutationType(input.type);
        if (!type) throw new InvalidInputError(`type must be one of: ${STOCK_MUTATION_TYPES.join(', ')}`);
        const qty = type === 'adjustment' ? parseNonNegativeInt(input.qty) : parsePositiveInt(input.qty);
        if (qty === null) {
            throw new InvalidInputError(type === 'adjustment'
                ? 'qty must be the counted stock (non-negative integer)'
                : 'qty must be a positive integer');
        }

        const t = await withStorage(() => sequelize.transaction());
        try {
            const product = await Product.findByPk(productId, { transaction: t, lock: t.LOCK.UPDATE });
            if (!product) throw new NotFoundError(`Product ${productId} not found`);

            const current = Number(product.stock_quantity || 0);
            let next = current;
            if (type === 'in') next = current + qty;
            if (type === 'out') {
                if (qty > current) {
                    throw new InvalidInputError(`Insufficient stock for ${product.name}`, { available: current, requested: qty });
                }
                next = current - qty;
            }
            if (type === 'adjustment') next = qty;

            const mutation = await StockMutation.create({
                product_id: product.id,
                type,
                qty: type === 'adjustment' ? next - current : qty,
                note: optionalText(input.note),
                created_by: actor?.id ?? null,
            }, { transaction: t });
            await product.update({ stock_quantity: next }, { transaction: t });

            await t.commit();
            return { mutation, stock_quantity: next };
        } catch (error) {
            await rollbackQuietly(t, 'StockService');
            throw translateStorageError(error);
        }
    }

    static async list(productId?: string) {
        return withStorage(() => StockMutation.findAll({
            where: productId ? { product_id: productId } : undefined,
            include: [{ model: Product, attributes: ['id', 'name'] }],
            order: [['createdAt', 'DESC'], ['id', 'DESC']],
        }));
    }
}
