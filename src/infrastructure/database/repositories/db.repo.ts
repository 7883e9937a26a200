import { Pool } from 'pg';
import { logger } from '../../../config/logger';

type SSLConfig = false | { rejectUnauthorized: boolean; ca?: string };

/**
 * Builds SSL configuration for the PostgreSQL connection.
 * - `PG_SSL=false` disables SSL
 * - Production always validates certificates
 * - Development/test may relax validation with `DEV_SSL_ALLOW=true`
 */
export function buildSSLConfig(env: NodeJS.ProcessEnv = process.env): SSLConfig {
  const { NODE_ENV, PG_SSL, PG_SSL_CA, DEV_SSL_ALLOW } = env;

  if (PG_SSL === 'false') {
    return false;
  }

  const relaxed =
    DEV_SSL_ALLOW === 'true' || env.PG_SSL_REJECT_UNAUTHORIZED === 'false';

  if (NODE_ENV === 'production' && relaxed) {
    throw new Error(
      'SECURITY ERROR: Cannot use relaxed SSL settings in production environment',
    );
  }

  const allowRelaxed =
    relaxed && (NODE_ENV === 'development' || NODE_ENV === 'test');
  if (allowRelaxed) {
    logger.warn('Using relaxed PostgreSQL SSL settings outside production');
  }

  return {
    rejectUnauthorized: !allowRelaxed,
    ...(PG_SSL_CA ? { ca: PG_SSL_CA } : {}),
  };
}

export function createDbPool(connectionString: string | undefined): Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }

  return new Pool({
    connectionString,
    ssl: buildSSLConfig(),
  });
}
