import { describe, expect, it } from 'vitest';

import { loadCatalog, seedCatalog } from '@infra/database/bootstrap.js';

import { CatalogService, normalizeTitle } from '@services/library/catalog.service.js';

import { MemoryLibraryStore } from '@test/utils/memory-library.store.js';

describe('catalog bootstrap', () => {
  it('reads the bundled catalog', async () => {
    const entries = await loadCatalog();

    expect(entries).toHaveLength(8);
    expect(entries[0]).toEqual({
      title: 'книга а',
      author: 'автор А',
      location: 'Stone Towers',
      shelf: 'A-1',
      floor: '3',
    });
  });

  it('seeds an empty store once', async () => {
    const store = new MemoryLibraryStore();
    const entries = await loadCatalog();

    expect(await seedCatalog(store, entries)).toBe(8);
    expect(await seedCatalog(store, entries)).toBe(0);
    expect(await store.countBooks()).toBe(8);
  });
});

describe('CatalogService', () => {
  it('normalises whitespace in titles', () => {
    expect(normalizeTitle('  Книга \t  А ')).toBe('Книга А');
  });

  it('matches titles case-insensitively within one office', async () => {
    const store = new MemoryLibraryStore();
    await seedCatalog(store, await loadCatalog());
    const catalog = new CatalogService(store);

    expect((await catalog.findResource('КНИГА Е', 'Manhatten'))?.author).toBe('автор E');
    expect(await catalog.findResource('книга е', 'Stone Towers')).toBeNull();
    expect(await catalog.findResource('   ', 'Manhatten')).toBeNull();
  });

  it('lists available books of an office in title order', async () => {
    const store = new MemoryLibraryStore();
    await seedCatalog(store, await loadCatalog());
    const catalog = new CatalogService(store);
    const x = await catalog.findResource('книга x', 'Известия');
    if (!x) throw new Error('catalog lacks книга x');
    await store.transaction((repo) => repo.setBookStatus(x.id, 'booked'));

    expect((await catalog.listAvailable('Известия')).map((b) => b.title)).toEqual(['книга y', 'книга z']);
  });
});
