import { DataTypes, Model, Optional } from 'sequelize';
import sequelize from '../config/database';

export const USER_ROLES = ['admin', 'cashier'] as const;
export type UserRole = typeof USER_ROLES[number];

interface UserAttributes {
    id: string;
    username: string;
    name: string;
    password: string;
    role: UserRole;
    status: 'active' | 'inactive';
}

interface UserCreationAttributes extends Optional<UserAttributes, 'id' | 'status'> { }

class User extends Model<UserAttributes, UserCreationAttributes> implements UserAttributes {
    declare id: string;
    declare username: string;
    declare name: string;
    declare password: string;
    declare role: UserRole;
    declare status: 'active' | 'inactive';

    declare readonly createdAt: Date;
    declare readonly updatedAt: Date;
}

User.init(
    {
        id: {
            type: DataTypes.UUID,
            defaultValue: DataTypes.UUIDV4,
            primaryKey: true,
        },
        username: {
            type: DataTypes.STRING,
            allowNull: false,
            unique: true,
        },
        name: {
            type: DataTypes.STRING,
            allowNull: false,
        },
        password: {
            type: DataTypes.STRING,
            allowNull: false,
        },
        role: {
            type: DataTypes.STRING(20),
            validate: { isIn: [[...USER_ROLES]] },
            defaultValue: 'cashier',
        },
        status: {
            type: DataTypes.STRING(20),
            validate: { isIn: [['active', 'inactive']] },
            defaultValue: 'active',
        },
    },
    {
        sequelize,
        tableName: 'users',
    }
);

export default User;

/** The authenticated user on whose behalf a service call runs. */
export interface Actor {
    id: string;
    username: string;
    role: UserRole;
}
