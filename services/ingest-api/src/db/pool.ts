import { Pool } from 'pg';
import { config } from '../config.js';
import { logger } from '../logger.js';

// Shared by the batch writers and the query layer; writers borrow one client per batch.
export const pg = new Pool({ connectionString: config.databaseUrl, max: config.dbPoolMax });
pg.on('error', (err) => logger.error({ err }, 'idle pg client error'));

export async function dbHealth() {
  const r = await pg.query<{ ok: number }>('SELECT 1 AS ok');
  return r.rows[0]?.ok === 1;
}
