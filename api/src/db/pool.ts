import * as sql from 'mssql';
import type { ConnectionPool } from 'mssql';
import { DatabaseConnectionFailed, errorMessage } from '../utils/errors';

/** Describes a connection string for logs without its password. */
export function describeConnection(connectionString: string): string {
  const keep = ['server', 'data source', 'database', 'initial catalog', 'user', 'user id', 'uid', 'authentication'];
  return connectionString
    .split(';')
    .map(s => s.trim())
    .filter(s => keep.includes(s.slice(0, s.indexOf('=')).trim().toLowerCase()))
    .join(';');
}

/**
 * Opens a dedicated connection for one unit of work and always closes it.
 * Nothing is shared between calls.
 */
export async function withConnection<T>(connectionString: string, work: (pool: ConnectionPool) => Promise<T>): Promise<T> {
  const pool = new sql.ConnectionPool(connectionString);
  try {
    await pool.connect();
  } catch (e) {
    throw new DatabaseConnectionFailed(`Could not connect to ${describeConnection(connectionString) || 'database'}: ${errorMessage(e)}`, { cause: e });
  }
  try {
    return await work(pool);
  } finally {
    try {
      await pool.close();
    } catch (e) {
      console.warn('[db] close failed:', errorMessage(e));
    }
  }
}

export { sql };
