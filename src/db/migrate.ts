import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Pool } from 'pg';
import { getPool, closePool, withTransaction } from './client.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const SQL_DIR = join(__dirname, '../../sql');

/** Apply every not-yet-applied `sql/*.sql` file, each in its own transaction. */
export async function runMigrations(pool: Pool = getPool(), sqlDir = SQL_DIR): Promise<string[]> {
  await pool.query(`CREATE SCHEMA IF NOT EXISTS portfolio`);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS portfolio._migrations (
      filename TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const { rows: applied } = await pool.query<{ filename: string }>(
    'SELECT filename FROM portfolio._migrations ORDER BY filename'
  );
  const appliedSet = new Set(applied.map(r => r.filename));

  const files = (await readdir(sqlDir)).filter(f => f.endsWith('.sql')).sort();
  const newlyApplied: string[] = [];

  for (const file of files) {
    if (appliedSet.has(file)) continue;

    const sql = await readFile(join(sqlDir, file), 'utf-8');
    try {
      await withTransaction(pool, async client => {
        await client.query(sql);
        await client.query('INSERT INTO portfolio._migrations (filename) VALUES ($1)', [file]);
      });
    } catch (err) {
      throw new Error(`Migration failed for ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
    newlyApplied.push(file);
    console.log(`[migrate] Applied: ${file}`);
  }

  console.log('[migrate] All migrations up to date');
  return newlyApplied;
}

// Allow running directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runMigrations()
    .then(() => closePool())
    .then(() => process.exit(0))
    .catch(err => { console.error(err); process.exit(1); });
}
