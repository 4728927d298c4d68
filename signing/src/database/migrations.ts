import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { Logger } from '../utils/logger';

export function resolveSchemaPath(): string {
  const candidates = [
    path.resolve(__dirname, 'schema.sql'),
    path.resolve(__dirname, '../../src/database/schema.sql'),
    path.resolve(process.cwd(), 'src/database/schema.sql'),
    path.resolve(process.cwd(), 'signing/src/database/schema.sql'),
  ];

  const schemaPath = candidates.find((candidate) => fs.existsSync(candidate));

  if (!schemaPath) {
    throw new Error('Unable to locate signing schema.sql');
  }

  return schemaPath;
}

export async function runMigrations(pool: Pool): Promise<void> {
  const schemaPath = resolveSchemaPath();
  const sql = fs.readFileSync(schemaPath, 'utf8');
  await pool.query(sql);
  Logger.info('Signing schema applied', { schemaPath });
}
