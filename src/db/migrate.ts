// src/db/migrate.ts
// Aplica db/schema.sql sobre DATABASE_URL. Uso: npm run build && npm run db:migrate
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Logger } from '@nestjs/common';
import { Client } from 'pg';
import configuration from '../config/configuration';

const logger = new Logger('Migrate');

async function migrate() {
  const { database } = configuration();
  const sql = readFileSync(resolve(__dirname, '../../db/schema.sql'), 'utf8');
  const client = new Client({ connectionString: database.url });
  await client.connect();
  try {
    await client.query(sql);
    logger.log('Esquema aplicado');
  } finally {
    await client.end();
  }
}

migrate().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
