// apps/api/src/database/database.service.ts
import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager, QueryFailedError } from 'typeorm';

const PG_UNIQUE_VIOLATION = '23505';

/**
 * Handle on the persistence layer handed to services by injection. Each
 * `transaction` call checks a connection out of the pg pool, runs the unit
 * of work on it and gives it back on commit or rollback.
 */
@Injectable()
export class DatabaseService {
  constructor(private readonly dataSource: DataSource) {}

  get manager(): EntityManager {
    return this.dataSource.manager;
  }

  transaction<T>(work: (tx: EntityManager) => Promise<T>): Promise<T> {
    return this.dataSource.transaction(work);
  }

  /** Round-trips a trivial query; rejects when the pool cannot reach the server. */
  async ping(): Promise<void> {
    await this.dataSource.query('SELECT 1');
  }
}

export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof QueryFailedError)) return false;
  const driverError: unknown = err.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}
