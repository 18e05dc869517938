// apps/api/src/database/typeorm-options.ts
import type { DataSourceOptions } from 'typeorm';
import type { Env } from '../config/env';
import { ENTITIES } from './entities';

export function buildDataSourceOptions(
  env: Pick<Env, 'DATABASE_URL' | 'DB_SYNCHRONIZE' | 'DB_LOGGING'>,
): DataSourceOptions {
  return {
    type: 'postgres',
    url: env.DATABASE_URL,
    entities: ENTITIES,
    synchronize: env.DB_SYNCHRONIZE,
    logging: env.DB_LOGGING,
  };
}
