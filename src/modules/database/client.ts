import { Pool, type PoolConfig, type QueryResultRow } from 'pg';
import { config } from '../../config.js';

let pool: Pool | null = null;

// DATABASE_URL wins over the individual DB_* settings
const poolConfig = (): PoolConfig => ({
  ...(config.DATABASE_URL
    ? { connectionString: config.DATABASE_URL }
    : {
        host: config.DB_HOST,
        port: config.DB_PORT,
        database: config.DB_NAME,
        user: config.DB_USER,
        password: config.DB_PASSWORD
      }),
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000
});

const cardsPool = (): Pool => {
  if (!pool) {
    pool = new Pool(poolConfig());
    pool.on('error', (error) => {
      console.error('❌ Idle PostgreSQL client error:', error);
    });
    console.log(`✅ PostgreSQL pool created for ${config.DATABASE_URL ? 'DATABASE_URL' : config.DB_NAME}`);
  }
  return pool;
};

/**
 * Run a parameterised query on the shared pool and return its rows
 */
export async function executeQuery<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<T[]> {
  try {
    const result = await cardsPool().query<T>(text, params);
    return result.rows;
  } catch (error) {
    console.error('❌ Database query failed:', text.trim().split('\n')[0], error);
    throw error;
  }
}

export async function closeDatabasePool(): Promise<void> {
  if (!pool) {
    return;
  }
  const closing = pool;
  pool = null;
  await closing.end();
  console.log('🔌 PostgreSQL pool closed');
}

/**
 * Startup check that the business_cards table is reachable
 */
export async function testDatabaseConnection(): Promise<boolean> {
  try {
    const rows = await executeQuery<{ cards: string }>('SELECT COUNT(*) AS cards FROM business_cards');
    console.log(`📊 Database reachable, ${rows[0]?.cards ?? 0} business cards stored`);
    return true;
  } catch (error) {
    console.error('❌ Database connection test failed:', error);
    return false;
  }
}
