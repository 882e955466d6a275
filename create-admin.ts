import dotenv from 'dotenv';
dotenv.config();

import bcrypt from 'bcrypt';
import sequelize from './src/config/database';
import User from './src/models/User';

async function createAdminUser() {
    try {
        const username = String(process.env.ADMIN_USERNAME || 'admin').trim().toLowerCase();
        const password = String(process.env.ADMIN_PASSWORD || '');
        if (password.length < 8) {
            throw new Error('Set ADMIN_PASSWORD (at least 8 characters) before creating the admin user');
        }

        await sequelize.authenticate();
        console.log('✅ Database connected');

        // Sync User model
        await User.sync();

        const hashedPassword = await bcrypt.hash(password, 10);

        const existingAdmin = await User.findOne({ where: { username } });

        if (existingAdmin) {
            existingAdmin.password = hashedPassword;
            existingAdmin.role = 'admin';
            existingAdmin.status = 'active';
            await existingAdmin.save();
            console.log('✅ Admin user updated');
        } else {
            await User.create({
                username,
                name: 'Administrator',
                password: hashedPassword,
                role: 'admin',
                status: 'active'
            });
            console.log('✅ Admin user created');
        }

        console.log(`\n📝 Login with username '${username}' and the password from ADMIN_PASSWORD`);

        await sequelize.close();
    } catch (error) {
        console.error('❌ Error:', error instanceof Error ? error.message : error);
        process.exit(1);
    }
}

void createAdminUser();
