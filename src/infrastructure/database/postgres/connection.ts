import pg from "pg";

/** OID of BIGINT; every timestamp column is epoch milliseconds in a BIGINT */
const INT8_OID = 20;

pg.types.setTypeParser(INT8_OID, (value: string) => Number(value));

export type PgPool = pg.Pool;

export const createPgPool = (connectionString: string): pg.Pool =>
  new pg.Pool({ connectionString, max: 10 });

/** Run `fn` inside BEGIN/COMMIT on one pooled client; rolls back on throw. */
export const withTransaction = async <T>(
  pool: pg.Pool,
  fn: (client: pg.PoolClient) => Promise<T>,
): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (e: unknown) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
};
