import type { Database } from 'better-sqlite3';
import { parseRow, parseRows } from '../db/row-guards.js';

export abstract class BaseRepository<T extends { id: number }> {
  constructor(
    protected readonly db: Database,
    protected readonly tableName: string
  ) {}

  protected abstract parseEntity(row: Record<string, unknown>): T | null;

  findById(id: number): T | null {
    const row = this.db.prepare(`SELECT * FROM ${this.tableName} WHERE id = ?`).get(id);
    return parseRow(row, (data) => this.parseEntity(data));
  }

  delete(id: number): boolean {
    const result = this.db.prepare(`DELETE FROM ${this.tableName} WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  protected queryOne(sql: string, ...params: unknown[]): T | null {
    const row = this.db.prepare(sql).get(...params);
    return parseRow(row, (data) => this.parseEntity(data));
  }

  protected queryMany(sql: string, ...params: unknown[]): T[] {
    const rows = this.db.prepare(sql).all(...params);
    return parseRows(rows, (data) => this.parseEntity(data));
  }

  protected timestamp(): string {
    return new Date().toISOString();
  }
}
