import { Pool } from 'pg';
import { DatabaseConfig } from '../config';
import { Logger } from '../utils/logger';

export function createPool(config: DatabaseConfig): Pool {
  const pool = new Pool({
    host: config.dbHost,
    port: config.dbPort,
    database: config.dbName,
    user: config.dbUser,
    password: config.dbPassword,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    Logger.debug('New database connection established');
  });

  pool.on('error', (err) => {
    Logger.error('Unexpected database error', err);
  });

  return pool;
}

export async function testConnection(pool: Pool): Promise<void> {
  try {
    const result = await pool.query<{ current_time: Date }>('SELECT NOW() as current_time');
    Logger.info('Database connection test successful', {
      currentTime: result.rows[0]?.current_time,
    });
  } catch (error) {
    Logger.error('Database connection test failed', error instanceof Error ? error : { error: String(error) });
    throw error;
  }
}

export async function closeConnection(pool: Pool): Promise<void> {
  await pool.end();
  Logger.info('Database connection pool closed');
}
