import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import seedProducts from './seed-products.json';

export type Product = {
  id: number;
  name: string;
  category: string;
  price: number;
};

export type NewProduct = Omit<Product, 'id'>;

type CatalogOptions = {
  // rows inserted when the table is empty; defaults to seed-products.json
  seed?: NewProduct[];
};

/** Product catalog stored in SQLite. Pass ':memory:' for a throwaway database. */
export class Catalog {
  private db: Database.Database;

  constructor(filename: string, opts: CatalogOptions = {}) {
    if (filename !== ':memory:') {
      mkdirSync(dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);
    if (filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS products (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        category TEXT NOT NULL,
        price REAL NOT NULL
      )
    `);
    this.seedIfEmpty(opts.seed ?? seedProducts);
  }

  list(): Product[] {
    return this.db.prepare<[], Product>('SELECT id, name, category, price FROM products ORDER BY id').all();
  }

  /** Case-insensitive substring match on the name; SQLite's LIKE only folds ASCII. */
  find(name: string): Product[] {
    const needle = name.trim().toLocaleLowerCase();
    if (!needle) return [];
    return this.list().filter((p) => p.name.toLocaleLowerCase().includes(needle));
  }

  add(product: NewProduct): Product {
    const info = this.db
      .prepare<[string, string, number]>('INSERT INTO products (name, category, price) VALUES (?, ?, ?)')
      .run(product.name, product.category, product.price);
    return { id: Number(info.lastInsertRowid), ...product };
  }

  close() {
    this.db.close();
  }

  private seedIfEmpty(seed: NewProduct[]) {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM products').get();
    if ((row?.n ?? 0) > 0) return;
    const insert = this.db.transaction((items: NewProduct[]) => {
      for (const item of items) this.add(item);
    });
    insert(seed);
  }
}
