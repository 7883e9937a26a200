import { Pool, QueryResult as PgQueryResult } from 'pg';
import {
  IDBStore,
  QueryResult,
} from '../../../shared/interfaces/db-store.interface';

export type PgPool = Pick<Pool, 'query' | 'end'>;

/** Runs each statement on whichever pooled connection is free. */
export class PostgresService implements IDBStore {
  constructor(private readonly pool: PgPool) {}

  async query<T = unknown>(
    sql: string,
    params?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<T>> {
    const result: PgQueryResult = await this.pool.query(
      sql,
      params ? [...params] : undefined,
    );
    return { rows: result.rows, rowCount: result.rowCount ?? undefined };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
