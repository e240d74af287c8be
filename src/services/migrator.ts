import fs from 'fs';
import path from 'path';
import type Database from 'better-sqlite3';
import { Logger } from '../helpers/logger';

const log = new Logger('migrator');

// Resolves from both src/ and dist/
export const MIGRATIONS_DIR = path.join(__dirname, '..', '..', 'migrations');

const MIGRATION_FILE = /^(\d+)_[\w-]+\.sql$/;

export interface Migration {
  version: number;
  file: string;
  sql: string;
}

/**
 * Numbered `NNN_name.sql` files of a directory, in version order. Other
 * files are ignored; two files claiming one version are an error.
 */
export function loadMigrations(migrationsDir: string = MIGRATIONS_DIR): Migration[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  const migrations = fs.readdirSync(migrationsDir).flatMap(file => {
    const match = file.match(MIGRATION_FILE);
    if (!match) return [];
    return [{ version: parseInt(match[1], 10), file, sql: fs.readFileSync(path.join(migrationsDir, file), 'utf-8') }];
  });
  migrations.sort((a, b) => a.version - b.version);

  for (let i = 1; i < migrations.length; i++) {
    if (migrations[i].version === migrations[i - 1].version) {
      throw new Error(`Duplicate migration version ${migrations[i].version}: ${migrations[i - 1].file}, ${migrations[i].file}`);
    }
  }
  return migrations;
}

/**
 * Bring the cache schema up to date. Each pending migration runs in its own
 * transaction together with its `schema_migrations` row. Returns the
 * versions applied by this call.
 */
export function runMigrations(db: Database.Database, migrationsDir: string = MIGRATIONS_DIR): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);

  const applied = new Set(
    db.prepare<[], { version: number }>('SELECT version FROM schema_migrations').all().map(row => row.version),
  );
  const pending = loadMigrations(migrationsDir).filter(m => !applied.has(m.version));

  if (pending.length === 0) {
    log.debug('Cache schema is current', { applied: applied.size });
    return [];
  }

  const record = db.prepare<[number, string, string]>(
    'INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)',
  );
  for (const migration of pending) {
    db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.version, migration.file, new Date().toISOString());
    })();
    log.info('Applied migration', { version: migration.version, file: migration.file });
  }

  return pending.map(m => m.version);
}
