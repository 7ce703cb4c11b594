import 'dotenv/config';
import { readFileSync } from 'fs';
import { join } from 'path';
import { loadConfig } from '../config';
import { closePool, getPool } from '../db/client';
import { logger } from '../utils/logger';

/**
 * Database migration script
 * Runs the schema.sql file to set up tables, triggers and views
 */
async function migrate(): Promise<void> {
  try {
    logger.info('Starting database migration...');

    const config = loadConfig();
    const schemaPath = join(__dirname, '../db/schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');

    const pool = getPool({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl });
    await pool.query(schema);
    await closePool();

    logger.info('Database migration completed successfully');
    process.exit(0);
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exit(1);
  }
}

void migrate();
