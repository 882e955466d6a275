import dotenv from 'dotenv';
dotenv.config();

import app from './app';
import { sequelize } from './models';
import { PORT } from './config/settings';
import { getCouponTable } from './services/CouponTable';

const startServer = async () => {
    try {
        // A malformed coupon file aborts startup.
        const coupons = getCouponTable();
        console.log(`Coupon table loaded (${coupons.codes().length} codes)`);

        await sequelize.authenticate();
        await sequelize.sync();
        console.log('Database connected and synchronized');

        app.listen(PORT, () => {
            console.log(`Server running on port ${PORT}`);
        });
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
};

void startServer();
