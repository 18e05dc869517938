// apps/api/src/scripts/seed-menu.ts
// Usage: npm run seed [-- path/to/menu.json]
import 'reflect-metadata';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { DataSource, EntityManager } from 'typeorm';
import { z } from 'zod';
import { AppLogger } from '../common/app-logger';
import { normalizeMoney } from '../common/utils/money';
import { validateEnv } from '../config/env';
import { MenuItem } from '../database/entities';
import { buildDataSourceOptions } from '../database/typeorm-options';

const DEFAULT_MENU_FILE = 'apps/api/data/seed-menu.json';

const seedItemSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().nullable().optional(),
  price: z.union([z.string(), z.number()]),
  category: z.string().nullable().optional(),
  isAvailable: z.boolean().optional(),
});

export const seedMenuSchema = z.array(seedItemSchema);
export type SeedMenuItem = z.infer<typeof seedItemSchema>;

const logger = new AppLogger('SeedMenu');

/**
 * Inserts items whose name is not on the menu yet; existing rows stay as
 * they are. Run it inside a transaction so a bad row leaves nothing behind.
 */
export async function seedMenu(
  tx: EntityManager,
  items: SeedMenuItem[],
): Promise<number> {
  const repo = tx.getRepository(MenuItem);
  let inserted = 0;
  for (const item of items) {
    if (await repo.findOneBy({ name: item.name })) continue;
    await repo.save(
      repo.create({
        name: item.name,
        description: item.description ?? null,
        price: normalizeMoney(item.price),
        category: item.category ?? null,
        isAvailable: item.isAvailable ?? true,
      }),
    );
    inserted += 1;
  }
  return inserted;
}

async function main(): Promise<void> {
  const file = path.resolve(process.cwd(), process.argv[2] ?? DEFAULT_MENU_FILE);
  const items = seedMenuSchema.parse(JSON.parse(await readFile(file, 'utf8')));

  const dataSource = new DataSource(buildDataSourceOptions(validateEnv(process.env)));
  await dataSource.initialize();
  try {
    const inserted = await dataSource.transaction((tx) => seedMenu(tx, items));
    logger.log(`Seed done. Inserted ${inserted} of ${items.length} item(s) from ${file}.`);
  } finally {
    await dataSource.destroy();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Seed failed', err instanceof Error ? err.stack : String(err));
    process.exitCode = 1;
  });
}
