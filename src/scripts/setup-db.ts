import { Logger } from '@nestjs/common';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { Pool } from 'pg';

const logger = new Logger('DbSetup');

async function waitForDatabase(pool: Pool, maxAttempts = 20, delayMs = 500): Promise<void> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await pool.query('SELECT 1');
      return;
    } catch (err) {
      lastError = err;
      logger.log(`Database not ready (attempt ${attempt}/${maxAttempts})`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
  throw new Error(
    `Could not connect to the database after ${maxAttempts} attempts: ${
      lastError instanceof Error ? lastError.message : String(lastError)
    }`,
  );
}

async function setup() {
  const connectionString = (process.env.DATABASE_URL ?? '').trim();
  if (!connectionString) throw new Error('DATABASE_URL is required.');

  const pool = new Pool({ connectionString, max: 1 });
  try {
    await waitForDatabase(pool);
    // Compiled to dist/scripts; the schema lives at the repo root.
    const schemaSql = fs.readFileSync(path.join(__dirname, '../../db/schema.sql'), 'utf8');
    await pool.query(schemaSql);
    logger.log('Schema applied.');
  } finally {
    await pool.end();
  }
}

setup().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
