import { DataTypes, Model, Optional } from 'sequelize';
import sequelize from '../config/database';

interface ProductAttributes {
    id: string; // UUID
    name: string;
    supplier?: string | null;
    unit_price: number;
    stock_quantity: number;
}

interface ProductCreationAttributes extends Optional<ProductAttributes, 'id' | 'supplier' | 'stock_quantity'> { }

class Product extends Model<ProductAttributes, ProductCreationAttributes> implements ProductAttributes {
    declare id: string;
    declare name: string;
    declare supplier: string | null;
    // DECIMAL columns come back as strings from mysql2; read through parseAmount.
    declare unit_price: number;
    declare stock_quantity: number;

    declare readonly createdAt: Date;
    declare readonly updatedAt: Date;
}

Product.init(
    {
        id: {
            type: DataTypes.UUID,
            defaultValue: DataTypes.UUIDV4,
            primaryKey: true,
        },
        name: {
            type: DataTypes.STRING,
            allowNull: false,
            unique: true,
            validate: {
                notEmpty: true,
            },
        },
        supplier: {
            type: DataTypes.STRING,
            allowNull: true,
        },
        unit_price: {
            type: DataTypes.DECIMAL(15, 2),
            allowNull: false,
            defaultValue: 0,
        },
        stock_quantity: {
            type: DataTypes.INTEGER,
            allowNull: false,
            defaultValue: 0,
        },
    },
    {
        sequelize,
        tableName: 'products',
    }
);

export default Product;
