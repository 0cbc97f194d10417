import type { Book } from '@core/interfaces/library.types.js';
import type { LibraryRepository } from '@core/repositories/library.repo.js';

/** Collapses inner whitespace and trims, so "  Книга   А " looks up as "Книга А". */
export function normalizeTitle(raw: string): string {
  return raw.trim().replace(/\s+/g, ' ');
}

export class CatalogService {
  constructor(private readonly repo: LibraryRepository) {}

  async findResource(title: string, location: string): Promise<Book | null> {
    const wanted = normalizeTitle(title);
    if (!wanted) return null;
    return this.repo.findBook(wanted, location);
  }

  async findResourceById(bookId: number): Promise<Book | null> {
    return this.repo.findBookById(bookId);
  }

  async listAvailable(location: string): Promise<Book[]> {
    const books = await this.repo.listBooks(location, 'available');
    return books.sort((a, b) => a.title.localeCompare(b.title, 'ru'));
  }
}
