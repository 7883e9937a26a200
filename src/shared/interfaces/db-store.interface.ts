export type QueryResult<Row> = { rows: Row[]; rowCount?: number };

/**
 * Minimal SQL surface the job store runs against. Every job-store operation
 * is a single conditional statement, so nothing here spans statements.
 */
export interface IDBStore {
  query<Row = unknown>(
    sql: string,
    params?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<Row>>;
}
