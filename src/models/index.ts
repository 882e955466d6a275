import sequelize from '../config/database';
import User from './User';
import Client from './Client';
import Product from './Product';
import StockMutation from './StockMutation';
import Order from './Order';
import Settlement from './Settlement';
import LoyaltyEntry from './LoyaltyEntry';
import ClubEvent from './ClubEvent';

// Registry
Client.hasMany(Order, { foreignKey: 'client_id', onDelete: 'RESTRICT' });
Order.belongsTo(Client, { foreignKey: 'client_id', onDelete: 'RESTRICT' });

Product.hasMany(Order, { foreignKey: 'product_id', onDelete: 'RESTRICT' });
Order.belongsTo(Product, { foreignKey: 'product_id', onDelete: 'RESTRICT' });

// Stock
Product.hasMany(StockMutation, { foreignKey: 'product_id', onDelete: 'CASCADE' });
StockMutation.belongsTo(Product, { foreignKey: 'product_id', onDelete: 'CASCADE' });

// Settlements
Settlement.hasMany(Order, { foreignKey: 'settlement_id', as: 'Orders' });
Order.belongsTo(Settlement, { foreignKey: 'settlement_id' });

Client.hasMany(Settlement, { foreignKey: 'client_id', onDelete: 'RESTRICT' });
Settlement.belongsTo(Client, { foreignKey: 'client_id', onDelete: 'RESTRICT' });

User.hasMany(Settlement, { foreignKey: 'settled_by', as: 'SettledInvoices' });
Settlement.belongsTo(User, { foreignKey: 'settled_by', as: 'Cashier' });

// Loyalty
Client.hasMany(LoyaltyEntry, { foreignKey: 'client_id', onDelete: 'RESTRICT' });
LoyaltyEntry.belongsTo(Client, { foreignKey: 'client_id', onDelete: 'RESTRICT' });

Settlement.hasOne(LoyaltyEntry, { foreignKey: 'settlement_id' });
LoyaltyEntry.belongsTo(Settlement, { foreignKey: 'settlement_id' });

export {
    sequelize,
    User,
    Client,
    Product,
    StockMutation,
    Order,
    Settlement,
    LoyaltyEntry,
    ClubEvent
};
