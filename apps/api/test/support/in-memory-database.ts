// apps/api/test/support/in-memory-database.ts
import {
  EntityManager,
  EntityTarget,
  ObjectLiteral,
  QueryFailedError,
  Repository,
} from 'typeorm';
import { DatabaseService } from '../../src/database/database.service';
import {
  Customer,
  MenuItem,
  Order,
  OrderItem,
} from '../../src/database/entities';

type Row = Record<string, unknown>;
type FindOptions = {
  where?: Row;
  order?: Row;
  take?: number;
  relations?: unknown;
};

type TableOptions = {
  unique?: readonly string[];
  createdAt?: boolean;
  updatedAt?: boolean;
};

type TableSnapshot = { rows: Row[]; nextId: number; nextChildId: number };

function compareValues(a: unknown, b: unknown): number {
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  return String(left).localeCompare(String(right));
}

// structuredClone hands back Dates from Node's realm, which fail
// `instanceof Date` inside Jest's sandbox; rebuild them here instead.
function cloneValue<V>(value: V): V;
function cloneValue(value: unknown): unknown {
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) return value.map((entry) => cloneValue(entry));
  if (typeof value === 'object' && value !== null) {
    const copy: Row = {};
    for (const [key, entry] of Object.entries(value)) copy[key] = cloneValue(entry);
    return copy;
  }
  return value;
}

function isChildList(value: unknown): value is Row[] {
  return (
    Array.isArray(value) &&
    value.every((entry) => typeof entry === 'object' && entry !== null)
  );
}

/**
 * Array-backed stand-in for a TypeORM repository. Covers the calls the
 * services make: create, save, find, findOne and findOneBy. Child lists
 * (order items) are stored inline, so relations are always "loaded".
 */
export class InMemoryTable<T extends ObjectLiteral> {
  private rows: Row[] = [];
  private nextId = 1;
  private nextChildId = 1;

  constructor(
    private readonly target: new () => T,
    private readonly options: TableOptions = {},
  ) {}

  create(data: Partial<T>): T {
    return Object.assign(new this.target(), data);
  }

  async save(entity: T): Promise<T> {
    const incoming: Row = {};
    for (const [key, value] of Object.entries(entity)) {
      if (value !== undefined) incoming[key] = value;
    }

    const now = new Date();
    const isNew = typeof incoming.id !== 'number';
    if (isNew) {
      incoming.id = this.nextId;
      if (this.options.createdAt) incoming.createdAt = now;
    }
    if (this.options.updatedAt) incoming.updatedAt = now;

    for (const value of Object.values(incoming)) {
      if (!isChildList(value)) continue;
      for (const child of value) {
        if (typeof child.id !== 'number') child.id = this.nextChildId++;
      }
    }

    this.assertUnique(incoming);

    const index = this.rows.findIndex((row) => row.id === incoming.id);
    const merged: Row =
      index >= 0 ? { ...this.rows[index], ...incoming } : incoming;
    if (index >= 0) {
      this.rows[index] = cloneValue(merged);
    } else {
      this.nextId += 1;
      this.rows.push(cloneValue(merged));
    }

    return Object.assign(entity, cloneValue(merged));
  }

  async find(options: FindOptions = {}): Promise<T[]> {
    let rows = this.rows.filter((row) => this.matches(row, options.where));

    const order = options.order;
    if (order) {
      const keys = Object.entries(order).filter(
        (entry): entry is [string, 'ASC' | 'DESC'] =>
          entry[1] === 'ASC' || entry[1] === 'DESC',
      );
      rows = [...rows].sort((a, b) => {
        for (const [key, direction] of keys) {
          const diff = compareValues(a[key], b[key]);
          if (diff !== 0) return direction === 'DESC' ? -diff : diff;
        }
        return 0;
      });
    }
    if (typeof options.take === 'number') rows = rows.slice(0, options.take);

    return rows.map((row) => this.toEntity(row));
  }

  async findOne(options: FindOptions): Promise<T | null> {
    const [first] = await this.find({ ...options, take: 1 });
    return first ?? null;
  }

  async findOneBy(where: Row): Promise<T | null> {
    return this.findOne({ where });
  }

  all(): T[] {
    return this.rows.map((row) => this.toEntity(row));
  }

  snapshot(): TableSnapshot {
    return {
      rows: cloneValue(this.rows),
      nextId: this.nextId,
      nextChildId: this.nextChildId,
    };
  }

  restore(snapshot: TableSnapshot): void {
    this.rows = cloneValue(snapshot.rows);
    this.nextId = snapshot.nextId;
    this.nextChildId = snapshot.nextChildId;
  }

  clear(): void {
    this.restore({ rows: [], nextId: 1, nextChildId: 1 });
  }

  private matches(row: Row, where?: Row): boolean {
    if (!where) return true;
    return Object.entries(where).every(([key, expected]) => {
      const actual = row[key];
      if (expected instanceof Date && actual instanceof Date) {
        return expected.getTime() === actual.getTime();
      }
      return actual === expected;
    });
  }

  private assertUnique(incoming: Row): void {
    for (const column of this.options.unique ?? []) {
      const clash = this.rows.find(
        (row) => row.id !== incoming.id && row[column] === incoming[column],
      );
      if (clash) {
        const driverError = Object.assign(
          new Error(`duplicate key value violates unique constraint on ${column}`),
          { code: '23505' },
        );
        throw new QueryFailedError('INSERT', [], driverError);
      }
    }
  }

  private toEntity(row: Row): T {
    return Object.assign(new this.target(), cloneValue(row));
  }
}

/**
 * In-process replacement for DatabaseService. `transaction` restores every
 * table to its state before the unit of work when the work throws.
 */
export class InMemoryDatabase {
  readonly customers = new InMemoryTable(Customer, {
    unique: ['phone'],
    createdAt: true,
  });
  readonly menuItems = new InMemoryTable(MenuItem, { unique: ['name'] });
  readonly orders = new InMemoryTable(Order, {
    createdAt: true,
    updatedAt: true,
  });
  readonly orderItems = new InMemoryTable(OrderItem);

  readonly manager: EntityManager;

  private readonly tables = new Map<unknown, InMemoryTable<ObjectLiteral>>([
    [Customer, this.customers],
    [MenuItem, this.menuItems],
    [Order, this.orders],
    [OrderItem, this.orderItems],
  ]);

  constructor() {
    const getRepository = <T extends ObjectLiteral>(
      target: EntityTarget<T>,
    ): Repository<T> => {
      const table = this.tables.get(target);
      if (!table) throw new Error('No in-memory table for entity');
      return table as unknown as Repository<T>;
    };
    this.manager = { getRepository } as unknown as EntityManager;
  }

  async transaction<T>(work: (tx: EntityManager) => Promise<T>): Promise<T> {
    const snapshots = [...this.tables.values()].map(
      (table) => [table, table.snapshot()] as const,
    );
    try {
      return await work(this.manager);
    } catch (err) {
      for (const [table, snapshot] of snapshots) table.restore(snapshot);
      throw err;
    }
  }

  reachable = true;

  async ping(): Promise<void> {
    if (!this.reachable) throw new Error('connection refused');
  }

  reset(): void {
    for (const table of this.tables.values()) table.clear();
  }

  async addMenuItem(
    data: Pick<MenuItem, 'name' | 'price'> & Partial<MenuItem>,
  ): Promise<MenuItem> {
    return this.menuItems.save(
      this.menuItems.create({
        description: null,
        isAvailable: true,
        category: null,
        ...data,
      }),
    );
  }

  asService(): DatabaseService {
    return this as unknown as DatabaseService;
  }
}
