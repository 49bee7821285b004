import { Knex } from 'knex';
import { getDb } from '../database/connection';
import { CountRow } from '../database/rows';
import { DuplicateKeyError, isUniqueViolation } from '../errors';

export interface UniqueKey {
  entity: string;
  field: string;
}

// A transaction is itself a Knex instance
export type Executor = Knex;

export class BaseService<TRow extends { id: number }> {
  protected tableName: string;

  constructor(tableName: string) {
    this.tableName = tableName;
  }

  protected get db(): Knex {
    return getDb();
  }

  protected async findRow(id: number, executor: Executor = this.db): Promise<TRow | undefined> {
    const row: TRow | undefined = await executor(this.tableName).where({ id }).first();
    return row;
  }

  protected async listRows(
    sortBy = 'created_at',
    sortOrder: 'asc' | 'desc' = 'desc',
  ): Promise<TRow[]> {
    const rows: TRow[] = await this.db(this.tableName).orderBy(sortBy, sortOrder).orderBy('id', sortOrder);
    return rows;
  }

  protected async countRows(where: Record<string, unknown> = {}, table = this.tableName): Promise<number> {
    const row: CountRow | undefined = await this.db(table)
      .where(where)
      .select(this.db.raw('COUNT(*) as count'))
      .first();
    return Number(row?.count ?? 0);
  }

  /**
   * Inserts one row and returns it. A unique violation on `unique.field`
   * surfaces as DUPLICATE_KEY.
   */
  protected async insertRow(
    data: Record<string, unknown>,
    unique?: UniqueKey,
    executor: Executor = this.db,
  ): Promise<TRow> {
    try {
      const [record]: TRow[] = await executor(this.tableName).insert(data).returning('*');
      return record;
    } catch (error) {
      if (unique && isUniqueViolation(error)) {
        throw new DuplicateKeyError(unique.entity, unique.field, String(data[unique.field]));
      }
      throw error;
    }
  }

  protected async updateRow(
    id: number,
    data: Record<string, unknown>,
    unique?: UniqueKey,
    executor: Executor = this.db,
  ): Promise<TRow | undefined> {
    const updateData: Record<string, unknown> = { ...data, updated_at: executor.fn.now() };
    delete updateData.id;
    delete updateData.created_at;

    try {
      const [updated]: TRow[] = await executor(this.tableName).where({ id }).update(updateData).returning('*');
      return updated;
    } catch (error) {
      if (unique && isUniqueViolation(error)) {
        throw new DuplicateKeyError(unique.entity, unique.field, String(data[unique.field]));
      }
      throw error;
    }
  }

  protected async deleteRow(id: number, executor: Executor = this.db): Promise<boolean> {
    const count = await executor(this.tableName).where({ id }).del();
    return count > 0;
  }
}
