import { DataTypes, Model, Optional } from 'sequelize';
import sequelize from '../config/database';

interface ClubEventAttributes {
    id: string; // UUID
    name: string;
    description?: string | null;
    event_date: string; // YYYY-MM-DD
    registration_open: boolean;
}

interface ClubEventCreationAttributes extends Optional<ClubEventAttributes, 'id' | 'description' | 'registration_open'> { }

class ClubEvent extends Model<ClubEventAttributes, ClubEventCreationAttributes> implements ClubEventAttributes {
    declare id: string;
    declare name: string;
    declare description: string | null;
    declare event_date: string;
    declare registration_open: boolean;

    declare readonly createdAt: Date;
    declare readonly updatedAt: Date;
}

ClubEvent.init(
    {
        id: {
            type: DataTypes.UUID,
            defaultValue: DataTypes.UUIDV4,
            primaryKey: true,
        },
        name: {
            type: DataTypes.STRING,
            allowNull: false,
            validate: {
                notEmpty: true,
            },
        },
        description: {
            type: DataTypes.TEXT,
            allowNull: true,
        },
        event_date: {
            type: DataTypes.DATEONLY,
            allowNull: false,
        },
        registration_open: {
            type: DataTypes.BOOLEAN,
            allowNull: false,
            defaultValue: true,
        },
    },
    {
        sequelize,
        tableName: 'events',
        indexes: [
            {
                fields: ['event_date']
            }
        ]
    }
);

export default ClubEvent;
