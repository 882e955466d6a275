import { DataTypes, Model, Optional } from 'sequelize';
import sequelize from '../config/database';
import { ORDER_STATUSES, OrderStatus } from '../utils/paymentMethod';
import type Client from './Client';
import type Product from './Product';

interface OrderAttributes {
    id: string; // UUID
    client_id: string; // UUID
    product_id: string; // UUID
    quantity: number;
    status: OrderStatus;
    settled_at?: Date | null;
    settlement_id?: string | null; // UUID
    createdAt?: Date;
    updatedAt?: Date;
}

interface OrderCreationAttributes extends Optional<OrderAttributes, 'id' | 'status' | 'settled_at' | 'settlement_id'> { }

class Order extends Model<OrderAttributes, OrderCreationAttributes> implements OrderAttributes {
    declare id: string;
    declare client_id: string;
    declare product_id: string;
    declare quantity: number;
    declare status: OrderStatus;
    declare settled_at: Date | null;
    declare settlement_id: string | null;

    declare readonly createdAt: Date;
    declare readonly updatedAt: Date;
    declare readonly Client?: Client;
    declare readonly Product?: Product;
}

Order.init(
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
        product_id: {
            type: DataTypes.UUID,
            allowNull: false,
        },
        quantity: {
            type: DataTypes.INTEGER,
            allowNull: false,
            validate: {
                isInt: true,
                min: 1,
            },
        },
        status: {
            type: DataTypes.STRING(20),
            validate: { isIn: [[...ORDER_STATUSES]] },
            allowNull: false,
            defaultValue: 'open',
        },
        settled_at: {
            type: DataTypes.DATE,
            allowNull: true,
        },
        settlement_id: {
            type: DataTypes.UUID,
            allowNull: true,
        },
    },
    {
        sequelize,
        tableName: 'orders',
        indexes: [
            {
                fields: ['client_id', 'status']
            }
        ]
    }
);

export default Order;
