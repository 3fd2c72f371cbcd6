import fs from 'fs';
import path from 'path';
import { QueryResult, QueryResultRow } from 'pg';
import logger from '../config/logger';
import {
  BusService,
  BusServiceFilter,
  CreateBusServiceInput,
  FareTable,
  PAYMENT_METHODS,
  PaymentMethod,
  SeatDecrementResult,
  ServiceStatus,
} from '../types/service';
import { AppError } from '../utils/AppError';
import { BusServiceRepository } from './busService.repository';

const SCHEMA_FILE = path.join(process.cwd(), 'sql', '001_bus_services.sql');

/**
 * The part of pg's Pool this repository needs
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface BusServiceRow extends QueryResultRow {
  id: string;
  owner_chat_id: string;
  route: string;
  service_name: string;
  driver_name: string;
  vehicle_class: string | null;
  fare_table: unknown;
  total_seats: number;
  remaining_seats: number;
  status: string;
  contact: string;
  payment_methods: string[] | null;
  created_at: Date;
}

function toPrice(value: unknown): number | undefined {
  const price = typeof value === 'string' ? Number(value) : value;
  return typeof price === 'number' && Number.isFinite(price) ? price : undefined;
}

function toFareTable(value: unknown): FareTable {
  if (typeof value !== 'object' || value === null) {
    throw new AppError('Stored fare table is not an object', 500);
  }

  const adult = 'adult' in value ? toPrice(value.adult) : undefined;
  if (adult === undefined) {
    throw new AppError('Stored fare table has no adult price', 500);
  }

  const table: FareTable = { adult };
  const teacher = 'teacher' in value ? toPrice(value.teacher) : undefined;
  const child = 'child' in value ? toPrice(value.child) : undefined;
  if (teacher !== undefined) {
    table.teacher = teacher;
  }
  if (child !== undefined) {
    table.child = child;
  }
  return table;
}

function isPaymentMethod(value: string): value is PaymentMethod {
  return PAYMENT_METHODS.some((method) => method === value);
}

export function toBusService(row: BusServiceRow): BusService {
  return {
    id: String(row.id),
    ownerChatId: row.owner_chat_id,
    route: row.route,
    serviceName: row.service_name,
    driverName: row.driver_name,
    vehicleClass: row.vehicle_class,
    fareTable: toFareTable(row.fare_table),
    totalSeats: row.total_seats,
    remainingSeats: row.remaining_seats,
    status: row.status === 'active' ? 'active' : 'unavailable',
    contact: row.contact,
    paymentMethods: (row.payment_methods ?? []).filter(isPaymentMethod),
    createdAt: row.created_at,
  };
}

// BIGSERIAL ids; anything else cannot exist and would make Postgres raise a cast error
function isStoredId(id: string): boolean {
  return /^\d{1,18}$/.test(id);
}

/**
 * Postgres-backed bus service storage.
 * Seat deduction is one conditional UPDATE, so concurrent bookings cannot oversell.
 */
export class PgBusServiceRepository implements BusServiceRepository {
  constructor(private readonly db: Queryable) {}

  private async run<R extends QueryResultRow>(
    operation: string,
    text: string,
    values: unknown[] = []
  ): Promise<QueryResult<R>> {
    try {
      return await this.db.query<R>(text, values);
    } catch (error) {
      logger.error(`Postgres ${operation} failed:`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw AppError.persistence(operation, error);
    }
  }

  /**
   * Creates the bus_services table if it does not exist
   */
  async ensureSchema(schemaFile: string = SCHEMA_FILE): Promise<void> {
    const ddl = fs.readFileSync(schemaFile, 'utf8');
    await this.run('ensureSchema', ddl);
    logger.info('bus_services schema ensured');
  }

  async insert(input: CreateBusServiceInput): Promise<BusService> {
    const result = await this.run<BusServiceRow>(
      'insert',
      `INSERT INTO bus_services
         (owner_chat_id, route, service_name, driver_name, vehicle_class, fare_table,
          total_seats, remaining_seats, status, contact, payment_methods)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $7, 'active', $8, $9)
       RETURNING *`,
      [
        input.ownerChatId,
        input.route,
        input.serviceName,
        input.driverName,
        input.vehicleClass,
        JSON.stringify(input.fareTable),
        input.totalSeats,
        input.contact,
        input.paymentMethods,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new AppError('Insert into bus_services returned no row', 503);
    }
    return toBusService(row);
  }

  async findAll(filter: BusServiceFilter = {}): Promise<BusService[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.route !== undefined) {
      values.push(filter.route);
      conditions.push(`route = $${values.length}`);
    }
    if (filter.status !== undefined) {
      values.push(filter.status);
      conditions.push(`status = $${values.length}`);
    }
    if (filter.ownerChatId !== undefined) {
      values.push(filter.ownerChatId);
      conditions.push(`owner_chat_id = $${values.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.run<BusServiceRow>(
      'findAll',
      `SELECT * FROM bus_services ${where} ORDER BY created_at ASC, id ASC`,
      values
    );
    return result.rows.map(toBusService);
  }

  async findById(id: string): Promise<BusService | null> {
    if (!isStoredId(id)) {
      return null;
    }
    const result = await this.run<BusServiceRow>('findById', 'SELECT * FROM bus_services WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? toBusService(row) : null;
  }

  async updateStatus(id: string, status: ServiceStatus): Promise<BusService | null> {
    if (!isStoredId(id)) {
      return null;
    }
    const result = await this.run<BusServiceRow>(
      'updateStatus',
      'UPDATE bus_services SET status = $2 WHERE id = $1 RETURNING *',
      [id, status]
    );
    const row = result.rows[0];
    return row ? toBusService(row) : null;
  }

  async toggleStatus(id: string): Promise<BusService | null> {
    if (!isStoredId(id)) {
      return null;
    }
    const result = await this.run<BusServiceRow>(
      'toggleStatus',
      `UPDATE bus_services
          SET status = CASE WHEN status = 'active' THEN 'unavailable' ELSE 'active' END
        WHERE id = $1
        RETURNING *`,
      [id]
    );
    const row = result.rows[0];
    return row ? toBusService(row) : null;
  }

  async decrementSeats(id: string, seats: number): Promise<SeatDecrementResult> {
    if (!isStoredId(id)) {
      return { ok: false, reason: 'notFound' };
    }

    const result = await this.run<BusServiceRow>(
      'decrementSeats',
      `UPDATE bus_services
          SET remaining_seats = remaining_seats - $2
        WHERE id = $1 AND status = 'active' AND remaining_seats >= $2
        RETURNING *`,
      [id, seats]
    );

    const row = result.rows[0];
    if (row) {
      return { ok: true, service: toBusService(row) };
    }

    // Nothing updated: tell a missing or paused service apart from a full one
    const existing = await this.run<{ status: string }>(
      'decrementSeats',
      'SELECT status FROM bus_services WHERE id = $1',
      [id]
    );
    const current = existing.rows[0];
    if (!current) {
      return { ok: false, reason: 'notFound' };
    }
    return { ok: false, reason: current.status === 'active' ? 'insufficientSeats' : 'unavailable' };
  }
}
