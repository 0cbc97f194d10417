import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { CatalogEntry } from '@core/interfaces/library.types.js';
import type { LibraryStore } from '@core/repositories/library.repo.js';

import { logger } from '@utils/logger.js';

import { pool } from './pg.pool.js';

const CatalogSchema = z.array(
  z.object({
    title: z.string().min(1),
    author: z.string().min(1),
    location: z.string().min(1),
    shelf: z.string().nullish(),
    floor: z.string().nullish(),
  }),
);

const SCHEMA_URL = new URL('./schema.sql', import.meta.url);
const CATALOG_URL = new URL('../../data/catalog.json', import.meta.url);

export async function migrate(): Promise<void> {
  const sql = await readFile(SCHEMA_URL, 'utf8');
  await pool.query(sql);
  logger.info('[db] schema ready');
}

export async function loadCatalog(url: URL = CATALOG_URL): Promise<CatalogEntry[]> {
  const raw: unknown = JSON.parse(await readFile(url, 'utf8'));
  return CatalogSchema.parse(raw);
}

/** Inserts the catalog once; a non-empty books table is left untouched. */
export async function seedCatalog(store: LibraryStore, entries: CatalogEntry[]): Promise<number> {
  return store.transaction(async (repo) => {
    if ((await repo.countBooks()) > 0) return 0;
    for (const entry of entries) {
      await repo.insertBook(entry);
    }
    logger.info({ count: entries.length }, '[db] catalog seeded');
    return entries.length;
  });
}
