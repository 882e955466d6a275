import { Request, Response } from 'express';
import { ProductService } from '../services/ProductService';
import { StockService } from '../services/StockService';
import { sendError } from '../utils/httpError';
import { normalizeText } from '../utils/parse';

// --- Products ---

export const getProducts = async (req: Request, res: Response) => {
    try {
        const products = await ProductService.list(normalizeText(req.query.q));
        return res.json({ products });
    } catch (error) {
        return sendError(res, error, 'Error fetching products');
    }
};

export const getProduct = async (req: Request, res: Response) => {
    try {
        const product = await ProductService.get(req.params.id);
        return res.json({ product });
    } catch (error) {
        return sendError(res, error, 'Error fetching product');
    }
};

export const createProduct = async (req: Request, res: Response) => {
    try {
        const product = await ProductService.create(req.body ?? {}, req.user);
        return res.status(201).json({ message: 'Product created', product });
    } catch (error) {
        return sendError(res, error, 'Error creating product');
    }
};

export const updateProduct = async (req: Request, res: Response) => {
    try {
        const product = await ProductService.update(req.params.id, req.body ?? {});
        return res.json({ message: 'Product updated', product });
    } catch (error) {
        return sendError(res, error, 'Error updating product');
    }
};

export const removeProduct = async (req: Request, res: Response) => {
    try {
        await ProductService.remove(req.params.id);
        return res.json({ message: 'Product deleted' });
    } catch (error) {
        return sendError(res, error, 'Error deleting product');
    }
};

// --- Stock movements ---

export const getStockMutations = async (req: Request, res: Response) => {
    try {
        const productId = normalizeText(req.query.product_id);
        const mutations = await StockService.list(productId || undefined);
        return res.json({ mutations });
    } catch (error) {
        return sendError(res, error, 'Error fetching stock movements');
    }
};

export const recordStockMutation = async (req: Request, res: Response) => {
    try {
        const result = await StockService.record(req.body ?? {}, req.user);
        return res.status(201).json({ message: 'Stock movement recorded', ...result });
    } catch (error) {
        return sendError(res, error, 'Error recording stock movement');
    }
};
