import { Dialect, Options, Sequelize } from 'sequelize';
import dotenv from 'dotenv';

dotenv.config();

const SUPPORTED_DIALECTS: Dialect[] = ['mysql'];

const parsePositiveInt = (raw: string | undefined, fallback: number): number => {
    const parsed = Number(raw ?? '');
    if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
    return Math.floor(parsed);
};

const resolveDialect = (): Dialect => {
    const raw = String(process.env.DB_DIALECT || 'mysql').trim().toLowerCase();
    const match = SUPPORTED_DIALECTS.find((dialect) => dialect === raw);
    if (!match) {
        throw new Error(`Unsupported DB_DIALECT '${raw}'. Use one of: ${SUPPORTED_DIALECTS.join(', ')}`);
    }
    return match;
};

// pg-mem is a dev dependency, so it is only loaded for the test database.
const memoryPostgres = (): object => {
    const pgMem: typeof import('pg-mem') = require('pg-mem');
    return pgMem.newDb({ autoCreateForeignKeyIndices: true }).adapters.createPg();
};

const buildOptions = (): Options => {
    // Jest sets NODE_ENV=test; every test file gets its own in-memory Postgres.
    if (process.env.NODE_ENV === 'test') {
        return {
            dialect: 'postgres',
            dialectModule: memoryPostgres(),
            logging: false,
        };
    }

    const dialect = resolveDialect();
    const connectTimeout = parsePositiveInt(process.env.DB_CONNECT_TIMEOUT_MS, 10000);

    return {
        dialect,
        host: process.env.DB_HOST || 'localhost',
        port: parsePositiveInt(process.env.DB_PORT, 3306),
        database: process.env.DB_NAME || 'beach_club_pos',
        username: process.env.DB_USER || 'root',
        password: process.env.DB_PASS || '',
        logging: process.env.DB_LOGGING === 'true' ? console.log : false,
        dialectOptions: { connectTimeout },
        pool: {
            max: parsePositiveInt(process.env.DB_POOL_MAX, 10),
            min: 0,
            acquire: parsePositiveInt(process.env.DB_ACQUIRE_MS, 15000),
            idle: 10000,
        },
    };
};

const sequelize = new Sequelize(buildOptions());

export default sequelize;
