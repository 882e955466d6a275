import { Transaction } from 'sequelize';

export const rollbackQuietly = async (t: Transaction, context: string) => {
    try {
        await t.rollback();
    } catch (rollbackError) {
        console.error(`[${context}] Rollback failed:`, rollbackError);
    }
};
