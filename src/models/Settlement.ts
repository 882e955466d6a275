import { DataTypes, Model, Optional } from 'sequelize';
import sequelize from '../config/database';
import { PAYMENT_METHODS, PaymentMethod } from '../utils/paymentMethod';

interface SettlementAttributes {
    id: string; // UUID
    client_id: string; // UUID
    payment_method: PaymentMethod;
    coupon_code?: string | null;
    discount_rate: number;
    total_before_discount: number;
    total_after_discount: number;
    order_count: number;
    settled_by?: string | null; // UUID
    settled_at: Date;
}

interface SettlementCreationAttributes extends Optional<SettlementAttributes, 'id' | 'coupon_code' | 'settled_by'> { }

class Settlement extends Model<SettlementAttributes, SettlementCreationAttributes> implements SettlementAttributes {
    declare id: string;
    declare client_id: string;
    declare payment_method: PaymentMethod;
    declare coupon_code: string | null;
    declare discount_rate: number;
    declare total_before_discount: number;
    declare total_after_discount: number;
    declare order_count: number;
    declare settled_by: string | null;
    declare settled_at: Date;

    declare readonly createdAt: Date;
    declare readonly updatedAt: Date;
}

Settlement.init(
    {
        id: {
            type: DataTypes.UUID,
            defaultValue: DataTypes.UUIDV4,
            primaryKey: true,
        },
        client_id: {
            type: DataTypes.UUID,
            allowNull: false,
        },
        payment_method: {
            type: DataTypes.STRING(20),
            validate: { isIn: [[...PAYMENT_METHODS]] },
            allowNull: false,
        },
        coupon_code: {
            type: DataTypes.STRING,
            allowNull: true,
        },
        discount_rate: {
            type: DataTypes.DECIMAL(5, 4),
            allowNull: false,
            defaultValue: 0,
        },
        total_before_discount: {
            type: DataTypes.DECIMAL(15, 2),
            allowNull: false,
            defaultValue: 0,
        },
        total_after_discount: {
            type: DataTypes.DECIMAL(15, 2),
            allowNull: false,
            defaultValue: 0,
        },
        order_count: {
            type: DataTypes.INTEGER,
            allowNull: false,
        },
        settled_by: {
            type: DataTypes.UUID,
            allowNull: true,
        },
        settled_at: {
            type: DataTypes.DATE,
            allowNull: false,
        },
    },
    {
        sequelize,
        tableName: 'settlements',
        hooks: {
            beforeDestroy: () => {
                throw new Error('Settlements are permanent and cannot be deleted.');
            }
        },
        indexes: [
            {
                fields: ['settled_at']
            }
        ]
    }
);

export default Settlement;
