import { DataTypes, Model, Optional } from 'sequelize';
import sequelize from '../config/database';

interface ClientAttributes {
    id: string; // UUID
    name: string;
    phone?: string | null;
    email?: string | null;
}

interface ClientCreationAttributes extends Optional<ClientAttributes, 'id' | 'phone' | 'email'> { }

class Client extends Model<ClientAttributes, ClientCreationAttributes> implements ClientAttributes {
    declare id: string;
    declare name: string;
    declare phone: string | null;
    declare email: string | null;

    declare readonly createdAt: Date;
    declare readonly updatedAt: Date;
}

Client.init(
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
        phone: {
            type: DataTypes.STRING,
            allowNull: true,
        },
        email: {
            type: DataTypes.STRING,
            allowNull: true,
            validate: {
                isEmail: true,
            },
        },
    },
    {
        sequelize,
        tableName: 'clients',
    }
);

export default Client;
