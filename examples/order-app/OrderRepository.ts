/**
 * @fileoverview In-memory order store
 *
 * Stands in for the document store of a real deployment. Orders are
 * copied on the way in and out so callers never share state with the
 * store.
 */

import { v4 as uuidv4 } from 'uuid';
import { Order } from './Order';

export interface IOrderRepository {
  nextId(): string;
  save(order: Order): Promise<Order>;
  findById(id: string): Promise<Order | undefined>;
  findAll(): Promise<Order[]>;
  findByCustomerId(customerId: string): Promise<Order[]>;
}

function copy(order: Order): Order {
  return new Order({ ...order, items: order.items.map((item) => ({ ...item })) });
}

export class InMemoryOrderRepository implements IOrderRepository {
  private readonly orders = new Map<string, Order>();

  constructor(private readonly generateId: () => string = () => uuidv4()) {}

  nextId(): string {
    return this.generateId();
  }

  async save(order: Order): Promise<Order> {
    this.orders.set(order.id, copy(order));
    return copy(order);
  }

  async findById(id: string): Promise<Order | undefined> {
    const order = this.orders.get(id);
    return order ? copy(order) : undefined;
  }

  async findAll(): Promise<Order[]> {
    return [...this.orders.values()].map(copy);
  }

  async findByCustomerId(customerId: string): Promise<Order[]> {
    return [...this.orders.values()]
      .filter((order) => order.customerId === customerId)
      .map(copy);
  }
}
