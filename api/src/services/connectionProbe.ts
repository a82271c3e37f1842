import { withConnection } from '../db/pool';
import { QueryFailed, errorMessage } from '../utils/errors';

export const PRINCIPAL_QUERY = 'SELECT SYSTEM_USER AS principal';

export interface ProbeResult {
  connectionString: string;
  result: string;
}

export type ConnectionProbe = (connectionString: string) => Promise<ProbeResult>;

// Returns the connection string as-is alongside the principal; demo behaviour.
export const probeConnection: ConnectionProbe = async connectionString => {
  const principal = await withConnection(connectionString, async pool => {
    try {
      const r = await pool.request().query<{ principal: string }>(PRINCIPAL_QUERY);
      const row = r.recordset[0];
      if (!row) throw new Error('query returned no rows');
      return String(row.principal);
    } catch (e) {
      throw new QueryFailed(`${PRINCIPAL_QUERY} failed: ${errorMessage(e)}`, { cause: e });
    }
  });
  return { connectionString, result: principal };
};
