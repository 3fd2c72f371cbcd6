import { Pool } from 'pg';
import logger from './logger';

/**
 * Creates the Postgres pool backing the bus service registry
 */
export function createDatabasePool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
  });

  pool.on('error', (error) => {
    logger.error('Idle Postgres client error:', { error: error.message });
  });

  return pool;
}

/**
 * Checks that the database answers a trivial query.
 * Returns false instead of throwing so startup can log and continue.
 */
export async function testConnection(pool: Pool): Promise<boolean> {
  try {
    await pool.query('SELECT 1');
    logger.info('✅ Database query test passed');
    return true;
  } catch (error) {
    logger.error('❌ Database connection failed:', {
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined,
    });
    return false;
  }
}
