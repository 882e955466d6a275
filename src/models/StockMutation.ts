import { DataTypes, Model, Optional } from 'sequelize';
import sequelize from '../config/database';

export const STOCK_MUTATION_TYPES = ['in', 'out', 'adjustment'] as const;
export type StockMutationType = typeof STOCK_MUTATION_TYPES[number];

interface StockMutationAttributes {
    id: number;
    product_id: string; // UUID
    type: StockMutationType;
    qty: number;
    note?: string | null;
    created_by?: string | null; // UUID
}

interface StockMutationCreationAttributes extends Optional<StockMutationAttributes, 'id' | 'note' | 'created_by'> { }

class StockMutation extends Model<StockMutationAttributes, StockMutationCreationAttributes> implements StockMutationAttributes {
    declare id: number;
    declare product_id: string;
    declare type: StockMutationType;
    declare qty: number;
    declare note: string | null;
    declare created_by: string | null;

    declare readonly createdAt: Date;
    declare readonly updatedAt: Date;
}

StockMutation.init(
    {
        id: {
            type: DataTypes.INTEGER,
            autoIncrement: true,
            primaryKey: true,
        },
        product_id: {
            type: DataTypes.UUID,
            allowNull: false,
        },
        type: {
            type: DataTypes.STRING(20),
            validate: { isIn: [[...STOCK_MUTATION_TYPES]] },
            allowNull: false,
        },
        qty: {
            type: DataTypes.INTEGER,
            allowNull: false,
        },
        note: {
            type: DataTypes.TEXT,
            allowNull: true,
        },
        created_by: {
            type: DataTypes.UUID,
            allowNull: true,
        },
    },
    {
        sequelize,
        tableName: 'stock_mutations',
    }
);

export default StockMutation;
