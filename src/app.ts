import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import authRoutes from './routes/auth';
import clientRoutes from './routes/client';
import inventoryRoutes from './routes/inventory';
import orderRoutes from './routes/order';
import invoiceRoutes from './routes/invoice';
import loyaltyRoutes from './routes/loyalty';
import reportRoutes from './routes/report';
import eventRoutes from './routes/event';

const app = express();

// Middleware
app.use(cors());
app.use(helmet());
if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('dev'));
}
app.use(express.json({ limit: '1mb' }));

// Routes
app.use('/api/v1/auth', authRoutes);
app.use('/api/v1/clients', clientRoutes);
app.use('/api/v1/orders', orderRoutes);
app.use('/api/v1/invoices', invoiceRoutes);
app.use('/api/v1/loyalty', loyaltyRoutes);
app.use('/api/v1/reports', reportRoutes);
app.use('/api/v1/events', eventRoutes);
app.use('/api/v1', inventoryRoutes); // /api/v1/products, /api/v1/stock

app.get('/', (req, res) => {
    res.send('Beach Club POS Backend Running');
});

app.use((req, res) => {
    res.status(404).json({ message: `Route ${req.method} ${req.path} not found` });
});

// Malformed JSON bodies and anything else thrown outside a controller.
app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
        return next(err);
    }
    if (err instanceof SyntaxError) {
        return res.status(400).json({ message: 'Malformed JSON body' });
    }
    console.error('Unhandled request error:', err);
    return res.status(500).json({ message: 'Internal server error' });
});

export default app;
