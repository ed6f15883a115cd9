import { FindOperator } from 'typeorm';
import { Seat } from '@modules/catalog/entities/seat.entity';
import { Showing } from '@modules/catalog/entities/showing.entity';
import { SeatReservation } from '@modules/reservations/entities/seat-reservation.entity';
import { Booking } from '@modules/bookings/entities/booking.entity';
import { BookedSeat } from '@modules/bookings/entities/booked-seat.entity';
import { BookingHistory } from '@modules/bookings/entities/booking-history.entity';

type Row = Record<string, unknown>;
type EntityClass<T extends object = object> = new () => T;
type SortDirection = 'ASC' | 'DESC';

interface RelationSpec {
  target: string;
  kind: 'one' | 'many';
  key: string;
}

interface FindOptions {
  where?: object;
  relations?: object;
  order?: Record<string, SortDirection>;
  lock?: unknown;
}

interface UndoEntry {
  table: string;
  kind: 'insert' | 'update' | 'delete';
  row: Row;
}

const ENTITIES: EntityClass[] = [Seat, Showing, SeatReservation, Booking, BookedSeat, BookingHistory];

const RELATIONS: Record<string, Record<string, RelationSpec>> = {
  SeatReservation: {
    showing: { target: 'Showing', kind: 'one', key: 'showingId' },
    seat: { target: 'Seat', kind: 'one', key: 'seatId' },
  },
  Booking: {
    showing: { target: 'Showing', kind: 'one', key: 'showingId' },
    seats: { target: 'BookedSeat', kind: 'many', key: 'bookingId' },
    history: { target: 'BookingHistory', kind: 'many', key: 'bookingId' },
  },
  BookedSeat: {
    booking: { target: 'Booking', kind: 'one', key: 'bookingId' },
    seat: { target: 'Seat', kind: 'one', key: 'seatId' },
  },
  BookingHistory: {
    booking: { target: 'Booking', kind: 'one', key: 'bookingId' },
  },
};

const UNIQUE_KEYS: Record<string, string[][]> = {
  Seat: [['screenNumber', 'row', 'seatNumber']],
  SeatReservation: [['showingId', 'seatId']],
  Booking: [['bookingReference']],
  BookedSeat: [['bookingId', 'seatId']],
};

export function uniqueViolation(constraint: string): Error {
  return Object.assign(new Error(`duplicate key value violates unique constraint "${constraint}"`), {
    code: '23505',
  });
}

function toRow(entity: object): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(entity)) {
    row[key] = value;
  }
  return row;
}

function isPlainObject(value: unknown): value is object {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof FindOperator) &&
    !(value instanceof Date) &&
    !Array.isArray(value)
  );
}

function comparable(value: unknown): number | string {
  if (value instanceof Date) {
    return value.getTime();
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  throw new Error(`Cannot compare ${String(value)}`);
}

function compare(a: unknown, b: unknown): number {
  const left = comparable(a);
  const right = comparable(b);
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function same(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

function matchValue(actual: unknown, expected: unknown): boolean {
  if (!(expected instanceof FindOperator)) {
    return same(actual, expected);
  }

  const operand: unknown = expected.value;
  switch (expected.type) {
    case 'in':
      return Array.isArray(operand) && operand.some((candidate) => same(actual, candidate));
    case 'moreThan':
      return compare(actual, operand) > 0;
    case 'moreThanOrEqual':
      return compare(actual, operand) >= 0;
    case 'lessThan':
      return compare(actual, operand) < 0;
    case 'lessThanOrEqual':
      return compare(actual, operand) <= 0;
    case 'equal':
      return same(actual, operand);
    default:
      throw new Error(`Unsupported operator ${expected.type}`);
  }
}

const toCamelCase = (column: string): string =>
  column.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());

/**
 * In-process stand-in for the PostgreSQL tables of the seating schema.
 * Enforces the unique keys the services rely on and undoes a transaction's
 * writes on rollback, so tests exercise the same code paths a real
 * database would.
 */
export class InMemorySeatingStore {
  private readonly tables = new Map<string, Row[]>();
  private readonly classes = new Map<string, EntityClass>();
  private readonly locks = new Map<string, { owner: object; waiters: Array<() => void> }>();
  private sequence = 0;

  readonly manager: FakeEntityManager;
  readonly isolationLevels: string[] = [];
  readonly dataSource: {
    manager: FakeEntityManager;
    createQueryRunner: jest.Mock;
  };

  constructor() {
    for (const entity of ENTITIES) {
      this.classes.set(entity.name, entity);
      this.tables.set(entity.name, []);
    }

    this.manager = new FakeEntityManager(this);
    this.dataSource = {
      manager: this.manager,
      createQueryRunner: jest.fn(() => this.createQueryRunner()),
    };
  }

  createQueryRunner() {
    const journal: UndoEntry[] = [];
    return {
      manager: new FakeEntityManager(this, journal),
      connect: jest.fn().mockResolvedValue(undefined),
      startTransaction: jest.fn((isolationLevel?: string) => {
        this.isolationLevels.push(isolationLevel ?? 'READ COMMITTED');
        return Promise.resolve();
      }),
      commitTransaction: jest.fn(() => {
        journal.length = 0;
        this.releaseLocks(journal);
        return Promise.resolve();
      }),
      rollbackTransaction: jest.fn(() => {
        this.undo(journal);
        this.releaseLocks(journal);
        return Promise.resolve();
      }),
      release: jest.fn(() => {
        this.releaseLocks(journal);
        return Promise.resolve();
      }),
    };
  }

  repository<T extends object>(target: EntityClass<T>): FakeRepository<T> {
    return new FakeRepository(this.manager, target);
  }

  /** Seeds a row outside any transaction. */
  insert<T extends object>(target: EntityClass<T>, data: Partial<T>): T {
    const row = toRow(data);
    if (typeof row.id !== 'string') {
      row.id = this.nextId(target.name);
    }
    this.write(target.name, row);
    return Object.assign(new target(), row);
  }

  /** Row lock held until the owning transaction ends, like SELECT ... FOR UPDATE. */
  async acquireLock(key: string, owner: object): Promise<void> {
    for (;;) {
      const held = this.locks.get(key);
      if (!held) {
        this.locks.set(key, { owner, waiters: [] });
        return;
      }
      if (held.owner === owner) {
        return;
      }
      await new Promise<void>((resolve) => held.waiters.push(resolve));
    }
  }

  releaseLocks(owner: object): void {
    for (const [key, held] of [...this.locks]) {
      if (held.owner === owner) {
        this.locks.delete(key);
        held.waiters.forEach((wake) => wake());
      }
    }
  }

  rows<T extends object>(target: EntityClass<T>): T[] {
    return this.table(target.name).map((row) => Object.assign(new target(), row));
  }

  nextId(name: string): string {
    this.sequence += 1;
    return `${name.toLowerCase()}-${this.sequence}`;
  }

  classFor(name: string): EntityClass {
    const entity = this.classes.get(name);
    if (!entity) {
      throw new Error(`Unknown entity ${name}`);
    }
    return entity;
  }

  table(name: string): Row[] {
    const rows = this.tables.get(name);
    if (!rows) {
      throw new Error(`Unknown table ${name}`);
    }
    return rows;
  }

  write(name: string, row: Row, journal?: UndoEntry[]): void {
    const rows = this.table(name);
    this.assertUnique(name, row);

    const index = rows.findIndex((existing) => existing.id === row.id);
    if (index >= 0) {
      journal?.push({ table: name, kind: 'update', row: rows[index] });
      rows[index] = row;
    } else {
      journal?.push({ table: name, kind: 'insert', row });
      rows.push(row);
    }
  }

  remove(name: string, predicate: (row: Row) => boolean, journal?: UndoEntry[]): number {
    const rows = this.table(name);
    const removed = rows.filter(predicate);
    this.tables.set(
      name,
      rows.filter((row) => !removed.includes(row)),
    );
    for (const row of removed) {
      journal?.push({ table: name, kind: 'delete', row });
    }
    return removed.length;
  }

  matches(name: string, row: Row, where: object): boolean {
    for (const [key, expected] of Object.entries(where)) {
      if (expected === undefined) {
        continue;
      }

      const relation = RELATIONS[name]?.[key];
      if (relation && isPlainObject(expected)) {
        const related = this.table(relation.target).find((candidate) => candidate.id === row[relation.key]);
        if (!related || !this.matches(relation.target, related, expected)) {
          return false;
        }
        continue;
      }

      if (!matchValue(row[key], expected)) {
        return false;
      }
    }
    return true;
  }

  hydrate<T extends object>(target: EntityClass<T>, row: Row, relations?: object): T {
    const copy: Row = { ...row };
    if (relations) {
      this.attach(target.name, copy, relations);
    }
    return Object.assign(new target(), copy);
  }

  ownColumns(name: string, entity: object): Row {
    const relationKeys = Object.keys(RELATIONS[name] ?? {});
    const row: Row = {};
    for (const [key, value] of Object.entries(toRow(entity))) {
      if (value !== undefined && !relationKeys.includes(key)) {
        row[key] = value;
      }
    }
    return row;
  }

  private attach(name: string, row: Row, relations: object): void {
    for (const [key, nested] of Object.entries(relations)) {
      if (!nested) {
        continue;
      }

      const relation = RELATIONS[name]?.[key];
      if (!relation) {
        throw new Error(`Unknown relation ${name}.${key}`);
      }

      const target = this.classFor(relation.target);
      const nestedRelations = isPlainObject(nested) ? nested : undefined;

      if (relation.kind === 'one') {
        const related = this.table(relation.target).find((candidate) => candidate.id === row[relation.key]);
        row[key] = related ? this.hydrate(target, related, nestedRelations) : null;
      } else {
        row[key] = this.table(relation.target)
          .filter((candidate) => candidate[relation.key] === row.id)
          .map((candidate) => this.hydrate(target, candidate, nestedRelations));
      }
    }
  }

  private assertUnique(name: string, row: Row): void {
    for (const columns of UNIQUE_KEYS[name] ?? []) {
      const clash = this.table(name).some(
        (existing) =>
          existing.id !== row.id && columns.every((column) => same(existing[column], row[column])),
      );
      if (clash) {
        throw uniqueViolation(`UQ_${name}_${columns.join('_')}`);
      }
    }
  }

  private undo(journal: UndoEntry[]): void {
    for (const entry of [...journal].reverse()) {
      const rows = this.table(entry.table);
      if (entry.kind === 'insert') {
        this.tables.set(
          entry.table,
          rows.filter((row) => row !== entry.row),
        );
      } else if (entry.kind === 'update') {
        this.tables.set(
          entry.table,
          rows.map((row) => (row.id === entry.row.id ? entry.row : row)),
        );
      } else {
        rows.push(entry.row);
      }
    }
    journal.length = 0;
  }
}

export class FakeEntityManager {
  constructor(
    private readonly store: InMemorySeatingStore,
    private readonly journal?: UndoEntry[],
  ) {}

  create<T extends object>(target: EntityClass<T>, data: object): T {
    return Object.assign(new target(), data);
  }

  async find<T extends object>(target: EntityClass<T>, options: FindOptions = {}): Promise<T[]> {
    await Promise.resolve();
    const select = (): Row[] =>
      this.store
        .table(target.name)
        .filter((row) => this.store.matches(target.name, row, options.where ?? {}));

    let rows = select();
    if (options.lock && this.journal) {
      for (const row of rows) {
        await this.store.acquireLock(`${target.name}:${String(row.id)}`, this.journal);
      }
      // re-read once the locks are held, as PostgreSQL re-checks locked rows
      rows = select();
    }

    if (options.order) {
      const order = Object.entries(options.order);
      rows = [...rows].sort((a, b) => {
        for (const [key, direction] of order) {
          const result = compare(a[key], b[key]);
          if (result !== 0) {
            return direction === 'DESC' ? -result : result;
          }
        }
        return 0;
      });
    }

    return rows.map((row) => this.store.hydrate(target, row, options.relations));
  }

  async findOne<T extends object>(target: EntityClass<T>, options: FindOptions): Promise<T | null> {
    const [first] = await this.find(target, options);
    return first ?? null;
  }

  async count<T extends object>(target: EntityClass<T>, options: FindOptions = {}): Promise<number> {
    return (await this.find(target, options)).length;
  }

  async save<T extends object>(entity: T): Promise<T>;
  async save<T extends object>(entities: T[]): Promise<T[]>;
  async save<T extends object>(entityOrEntities: T | T[]): Promise<T | T[]> {
    await Promise.resolve();
    if (Array.isArray(entityOrEntities)) {
      return entityOrEntities.map((entity) => this.saveEntity(entity));
    }
    return this.saveEntity(entityOrEntities);
  }

  async update<T extends object>(
    target: EntityClass<T>,
    criteria: object,
    partial: object,
  ): Promise<{ affected: number }> {
    await Promise.resolve();
    const matched = this.store
      .table(target.name)
      .filter((row) => this.store.matches(target.name, row, criteria));

    for (const row of matched) {
      this.store.write(target.name, { ...row, ...this.store.ownColumns(target.name, partial) }, this.journal);
    }
    return { affected: matched.length };
  }

  async delete<T extends object>(
    target: EntityClass<T>,
    criteria: string | string[] | object,
  ): Promise<{ affected: number; raw: unknown[] }> {
    await Promise.resolve();
    const predicate = (row: Row): boolean => {
      if (typeof criteria === 'string') {
        return row.id === criteria;
      }
      if (Array.isArray(criteria)) {
        return criteria.includes(String(row.id));
      }
      return this.store.matches(target.name, row, criteria);
    };

    const affected = this.store.remove(target.name, predicate, this.journal);
    return { affected, raw: [] };
  }

  createQueryBuilder<T extends object>(target: EntityClass<T>, alias: string): FakeQueryBuilder<T> {
    return new FakeQueryBuilder(this, target, alias);
  }

  rowsOf(name: string): Row[] {
    return this.store.table(name);
  }

  hydrate<T extends object>(target: EntityClass<T>, row: Row): T {
    return this.store.hydrate(target, row);
  }

  private saveEntity<T extends object>(entity: T): T {
    const name = entity.constructor.name;
    const row = this.store.ownColumns(name, entity);

    if (typeof row.id !== 'string') {
      row.id = this.store.nextId(name);
      Object.assign(entity, { id: row.id });
    }
    this.store.write(name, row, this.journal);

    // cascade: ['insert'] on Booking.seats
    const children: unknown = Reflect.get(entity, 'seats');
    if (name === 'Booking' && Array.isArray(children)) {
      for (const child of children) {
        if (typeof child === 'object' && child !== null) {
          Object.assign(child, { bookingId: row.id });
          this.saveEntity(child);
        }
      }
    }

    return entity;
  }
}

export class FakeQueryBuilder<T extends object> {
  private readonly predicates: Array<(row: Row) => boolean> = [];
  private sort: { key: string; direction: SortDirection } | null = null;
  private max: number | null = null;

  constructor(
    private readonly manager: FakeEntityManager,
    private readonly target: EntityClass<T>,
    private readonly alias: string,
  ) {}

  where(condition: string, parameters: Row = {}): this {
    this.predicates.push(this.parse(condition, parameters));
    return this;
  }

  andWhere(condition: string, parameters: Row = {}): this {
    return this.where(condition, parameters);
  }

  orderBy(sort: string, direction: SortDirection = 'ASC'): this {
    this.sort = { key: toCamelCase(sort.replace(`${this.alias}.`, '')), direction };
    return this;
  }

  setLock(): this {
    return this;
  }

  setOnLocked(): this {
    return this;
  }

  limit(max: number): this {
    this.max = max;
    return this;
  }

  async getMany(): Promise<T[]> {
    await Promise.resolve();
    let rows = this.manager
      .rowsOf(this.target.name)
      .filter((row) => this.predicates.every((predicate) => predicate(row)));

    const { sort } = this;
    if (sort) {
      rows = [...rows].sort((a, b) => {
        const result = compare(a[sort.key], b[sort.key]);
        return sort.direction === 'DESC' ? -result : result;
      });
    }
    if (this.max !== null) {
      rows = rows.slice(0, this.max);
    }

    return rows.map((row) => this.manager.hydrate(this.target, row));
  }

  private parse(condition: string, parameters: Row): (row: Row) => boolean {
    const match = /^(\w+)\.(\w+)\s*(<=|>=|=|<|>)\s*:(\w+)$/.exec(condition.trim());
    if (!match || match[1] !== this.alias) {
      throw new Error(`Unsupported condition: ${condition}`);
    }

    const [, , column, operator, parameter] = match;
    const key = toCamelCase(column);
    const expected = parameters[parameter];

    return (row) => {
      if (operator === '=') {
        return same(row[key], expected);
      }
      const result = compare(row[key], expected);
      switch (operator) {
        case '<':
          return result < 0;
        case '<=':
          return result <= 0;
        case '>':
          return result > 0;
        default:
          return result >= 0;
      }
    };
  }
}

export class FakeRepository<T extends object> {
  constructor(
    readonly manager: FakeEntityManager,
    private readonly target: EntityClass<T>,
  ) {}

  create(data: object): T {
    return this.manager.create(this.target, data);
  }

  find(options: FindOptions = {}): Promise<T[]> {
    return this.manager.find(this.target, options);
  }

  findOne(options: FindOptions): Promise<T | null> {
    return this.manager.findOne(this.target, options);
  }

  count(options: FindOptions = {}): Promise<number> {
    return this.manager.count(this.target, options);
  }

  save(entity: T): Promise<T>;
  save(entities: T[]): Promise<T[]>;
  save(entityOrEntities: T | T[]): Promise<T | T[]> {
    return Array.isArray(entityOrEntities)
      ? this.manager.save(entityOrEntities)
      : this.manager.save(entityOrEntities);
  }

  delete(criteria: string | string[] | object): Promise<{ affected: number; raw: unknown[] }> {
    return this.manager.delete(this.target, criteria);
  }
}
