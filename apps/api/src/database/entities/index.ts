import { Customer } from './customer.entity';
import { MenuItem } from './menu-item.entity';
import { Order } from './order.entity';
import { OrderItem } from './order-item.entity';

export { Customer, GUEST_NAME } from './customer.entity';
export { MenuItem } from './menu-item.entity';
export { Order } from './order.entity';
export { OrderItem } from './order-item.entity';

export const ENTITIES = [Customer, MenuItem, Order, OrderItem];
