import dotenv from 'dotenv';
dotenv.config();

import bcrypt from 'bcrypt';
import { sequelize, User, Client, Product, StockMutation, ClubEvent } from '../models';
import { UserRole } from '../models/User';

async function seedDatabase() {
    try {
        console.log('🌱 Starting database seeding...\n');

        console.log('📊 Syncing database...');
        const isMySql = sequelize.getDialect() === 'mysql';
        if (isMySql) {
            await sequelize.query('SET FOREIGN_KEY_CHECKS = 0');
        }
        try {
            await sequelize.sync({ force: true }); // WARNING: This will drop all tables!
        } finally {
            if (isMySql) {
                await sequelize.query('SET FOREIGN_KEY_CHECKS = 1');
            }
        }
        console.log('✅ Database synced\n');

        console.log('👥 Seeding users...');
        const userSeeds: Array<{ username: string; name: string; password: string; role: UserRole }> = [
            { username: 'admin', name: 'Club Admin', password: 'admin123', role: 'admin' },
            { username: 'cashier', name: 'Front Desk', password: 'cashier123', role: 'cashier' },
        ];
        for (const seed of userSeeds) {
            await User.create({
                username: seed.username,
                name: seed.name,
                password: await bcrypt.hash(seed.password, 10),
                role: seed.role,
            });
        }
        console.log(`✅ ${userSeeds.length} users\n`);

        console.log('🥤 Seeding products...');
        const productSeeds = [
            { name: 'Water', supplier: 'Local Distributor', unit_price: 5, stock_quantity: 120 },
            { name: 'Coconut Water', supplier: 'Local Distributor', unit_price: 9.5, stock_quantity: 60 },
            { name: 'Chips', supplier: 'Snack Supply', unit_price: 8, stock_quantity: 80 },
            { name: 'Court Rental (1h)', supplier: null, unit_price: 60, stock_quantity: 0 },
        ];
        for (const seed of productSeeds) {
            const product = await Product.create(seed);
            if (seed.stock_quantity > 0) {
                await StockMutation.create({
                    product_id: product.id,
                    type: 'in',
                    qty: seed.stock_quantity,
                    note: 'Opening stock',
                });
            }
        }
        console.log(`✅ ${productSeeds.length} products\n`);

        console.log('🏐 Seeding clients...');
        const clientSeeds = [
            { name: 'Ana', phone: '555-0101' },
            { name: 'Bruno', phone: '555-0102' },
            { name: 'Carla', phone: null },
        ];
        await Client.bulkCreate(clientSeeds);
        console.log(`✅ ${clientSeeds.length} clients\n`);

        console.log('📅 Seeding events...');
        const eventSeeds = [
            { name: 'Beach Volleyball Cup', description: 'Teams of two, sign up at the bar', event_date: '2026-12-05' },
            { name: 'Sunset Acoustic Night', description: null, event_date: '2026-12-19' },
        ];
        await ClubEvent.bulkCreate(eventSeeds);
        console.log(`✅ ${eventSeeds.length} events\n`);

        console.log('🎉 Seeding finished');
        console.log('   admin / admin123');
        console.log('   cashier / cashier123');
        await sequelize.close();
    } catch (error) {
        console.error('❌ Seeding failed:', error);
        process.exit(1);
    }
}

void seedDatabase();
