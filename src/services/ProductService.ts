import { Order, Product, StockMutation, sequelize } from '../models';
import { Actor } from '../models/User';
import { ConflictError, InvalidInputError, NotFoundError, translateStorageError, withStorage } from '../utils/errors';
import { parseAmount } from '../utils/money';
import { rollbackQuietly } from '../utils/transaction';
import { containsText, normalizeText, optionalText, parseNonNegativeInt, parsePrice } from '../utils/parse';

export interface ProductInput {
    name?: unknown;
    supplier?: unknown;
    unit_price?: unknown;
    stock_quantity?: unknown;
}

const findProductOrFail = async (id: string) => {
    const product = await withStorage(() => Product.findByPk(id));
    if (!product) throw new NotFoundError(`Product ${id} not found`);
    return product;
};

export class ProductService {
    static async list(query = '') {
        const q = query.trim();
        const products = await withStorage(() => Product.findAll({ order: [['name', 'ASC']] }));
        return q ? products.filter((row) => containsText(row.name, q)) : products;
    }

    static async get(id: string) {
        return findProductOrFail(id);
    }

    static async unitPrice(id: string): Promise<number> {
        const product = await findProductOrFail(id);
        return parseAmount(product.unit_price);
    }

    /** Creates the product and books its opening stock as an `in` movement. */
    static async create(input: ProductInput, actor?: Actor | null) {
        const name = normalizeText(input.name);
        if (!name) throw new InvalidInputError('Product name is required');
        const unitPrice = parsePrice(input.unit_price);
        if (unitPrice === null) throw new InvalidInputError('unit_price must be a non-negative number');
        const openingStock = input.stock_quantity === undefined ? 0 : parseNonNegativeInt(input.stock_quantity);
        if (openingStock === null) throw new InvalidInputError('stock_quantity must be a non-negative integer');

        const t = await withStorage(() => sequelize.transaction());
        try {
            const product = await Product.create({
                name,
                supplier: optionalText(input.supplier),
                unit_price: unitPrice,
                stock_quantity: openingStock,
            }, { transaction: t });

            if (openingStock > 0) {
                await StockMutation.create({
                    product_id: product.id,
                    type: 'in',
                    qty: openingStock,
                    note: 'Opening stock',
                    created_by: actor?.id ?? null,
                }, { transaction: t });
            }

            await t.commit();
            return product;
        } catch (error) {
            await rollbackQuietly(t, 'ProductService');
            throw translateStorageError(error);
        }
    }

    /** Stock is only changed through StockService movements. */
    static async update(id: string, input: ProductInput) {
        const product = await findProductOrFail(id);
        const updates: { name?: string; supplier?: string | null; unit_price?: number } = {};

        if (input.name !== undefined) {
            const name = normalizeText(input.name);
            if (!name) throw new InvalidInputError('Product name cannot be empty');
            updates.name = name;
        }
        if (input.supplier !== undefined) updates.supplier = optionalText(input.supplier);
        if (input.unit_price !== undefined) {
            const unitPrice = parsePrice(input.unit_price);
            if (unitPrice === null) throw new InvalidInputError('unit_price must be a non-negative number');
            updates.unit_price = unitPrice;
        }
        if (input.stock_quantity !== undefined) {
            throw new InvalidInputError('stock_quantity is changed through stock movements');
        }

        return withStorage(() => product.update(updates));
    }

    static async remove(id: string) {
        const product = await findProductOrFail(id);
        const orderCount = await withStorage(() => Order.count({ where: { product_id: id } }));
        if (orderCount > 0) {
            throw new ConflictError('Product is referenced by orders and cannot be deleted', { orders: orderCount });
        }
        await withStorage(() => product.destroy());
    }
}
