// apps/api/src/orders/orders.service.ts
import { Injectable, NotFoundException } from '@nestjs/common';
import { AppLogger } from '../common/app-logger';
import { CustomersService } from '../customers/customers.service';
import { Order } from '../database/entities';
import { DatabaseService } from '../database/database.service';
import { OrderAssembler } from './order-assembler';
import { OrderStatus } from './order-status';
import { OrderDto, toOrderDto } from './dto/order.dto';
import type { PlaceOrderInput } from './types';

const RECENT_DEFAULT_LIMIT = 20;
const RECENT_MAX_LIMIT = 100;

function orderNotFound(id: number): NotFoundException {
  return new NotFoundException({
    code: 'ORDER_NOT_FOUND',
    message: `Order ${id} not found`,
  });
}

@Injectable()
export class OrdersService {
  private readonly logger = new AppLogger(OrdersService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly customers: CustomersService,
    private readonly assembler: OrderAssembler,
  ) {}

  /**
   * Ensures the customer and assembles the order in one transaction, so a
   * rejected line leaves neither a new customer nor a partial order behind.
   */
  async placeOrder(input: PlaceOrderInput): Promise<OrderDto> {
    const order = await this.db.transaction(async (tx) => {
      const customer = await this.customers.ensureCustomer(tx, {
        name: input.name,
        phone: input.phone,
        address: input.address,
      });
      return this.assembler.assemble(tx, customer, input.items);
    });

    this.logger.log(
      `order placed id=${order.id} customer=${order.customerId} lines=${order.items?.length ?? 0} total=${order.totalAmount}`,
    );
    return toOrderDto(order);
  }

  async findById(id: number): Promise<OrderDto | null> {
    const order = await this.db.manager.getRepository(Order).findOne({
      where: { id },
      relations: { items: true },
    });
    return order ? toOrderDto(order) : null;
  }

  async getById(id: number): Promise<OrderDto> {
    const order = await this.findById(id);
    if (!order) throw orderNotFound(id);
    return order;
  }

  /**
   * Overwrites the status. Any member of the status set is accepted from
   * any current status; there is no transition graph.
   */
  async updateStatus(id: number, status: OrderStatus): Promise<OrderDto> {
    const repo = this.db.manager.getRepository(Order);
    const order = await repo.findOneBy({ id });
    if (!order) throw orderNotFound(id);

    const previous = order.status;
    order.status = status;
    await repo.save(order);

    this.logger.log(`order status id=${id} ${previous} -> ${status}`);
    return this.getById(id);
  }

  async recent(limit = RECENT_DEFAULT_LIMIT): Promise<OrderDto[]> {
    const take = Math.min(Math.max(Math.trunc(limit), 1), RECENT_MAX_LIMIT);
    const orders = await this.db.manager.getRepository(Order).find({
      relations: { items: true },
      order: { createdAt: 'DESC', id: 'DESC' },
      take,
    });
    return orders.map(toOrderDto);
  }
}
