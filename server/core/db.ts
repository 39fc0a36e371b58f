import { Pool } from 'pg';
import type { AppConfig } from './config';
import { getErrorCode, getErrorDetail, getErrorMessage } from '../utils/errorUtils';

import { logger } from './logger';

export function createPool(config: AppConfig): Pool {
  const isProduction = config.env === 'production';
  const pool = new Pool({
    connectionString: config.database.url,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
    max: config.database.poolMax,
    ssl: isProduction ? { rejectUnauthorized: false } : undefined,
  });

  pool.on('error', (err) => {
    logger.error('[Database] Pool error:', { extra: { detail: getErrorMessage(err) } });
  });

  pool.on('connect', () => {
    logger.info('[Database] New client connected');
  });

  return pool;
}

export function isConstraintError(error: unknown): { type: 'unique' | 'foreign_key' | null, detail?: string } {
  const code = getErrorCode(error);
  const detail = getErrorDetail(error);
  if (code === '23505') return { type: 'unique', detail };
  if (code === '23503') return { type: 'foreign_key', detail };
  return { type: null };
}
