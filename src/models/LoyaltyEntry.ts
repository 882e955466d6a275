import { DataTypes, Model, Optional } from 'sequelize';
import sequelize from '../config/database';

export const LOYALTY_REASONS = ['purchase', 'redemption', 'adjustment'] as const;
export type LoyaltyReason = typeof LOYALTY_REASONS[number];

interface LoyaltyEntryAttributes {
    id: number;
    client_id: string; // UUID
    points: number; // negative for redemptions
    reason: LoyaltyReason;
    settlement_id?: string | null;
    note?: string | null;
    created_by?: string | null;
}

interface LoyaltyEntryCreationAttributes extends Optional<LoyaltyEntryAttributes, 'id' | 'settlement_id' | 'note' | 'created_by'> { }

class LoyaltyEntry extends Model<LoyaltyEntryAttributes, LoyaltyEntryCreationAttributes> implements LoyaltyEntryAttributes {
    declare id: number;
    declare client_id: string;
    declare points: number;
    declare reason: LoyaltyReason;
    declare settlement_id: string | null;
    declare note: string | null;
    declare created_by: string | null;

    declare readonly createdAt: Date;
    declare readonly updatedAt: Date;
}

LoyaltyEntry.init(
    {
        id: {
            type: DataTypes.INTEGER,
            autoIncrement: true,
            primaryKey: true,
        },
        client_id: {
            type: DataTypes.UUID,
            allowNull: false,
        },
        points: {
            type: DataTypes.INTEGER,
            allowNull: false,
        },
        reason: {
            type: DataTypes.STRING(20),
            validate: { isIn: [[...LOYALTY_REASONS]] },
            allowNull: false,
        },
        settlement_id: {
            type: DataTypes.UUID,
            allowNull: true,
        },
        note: {
            type: DataTypes.STRING,
            allowNull: true,
        },
        created_by: {
            type: DataTypes.UUID,
            allowNull: true,
        },
    },
    {
        sequelize,
        tableName: 'loyalty_entries',
    }
);

export default LoyaltyEntry;
