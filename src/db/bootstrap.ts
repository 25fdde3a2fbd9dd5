import { db, type Database } from './index.js';
import { schema, schemaPostgres, indexes, patchableColumns, type ColumnSpec } from './schema.js';

// Table names only ever come from patchableColumns, never from callers
async function listColumns(database: Database, table: string): Promise<Set<string>> {
  if (database.isPostgres()) {
    const rows = await database.all<{ column_name: string }>(
      `SELECT column_name FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = ?`,
      [table]
    );
    return new Set(rows.map(r => r.column_name));
  }

  const rows = await database.all<{ name: string }>(`PRAGMA table_info(${table})`);
  return new Set(rows.map(r => r.name));
}

function columnDefinition(database: Database, column: ColumnSpec): string {
  const type = database.isPostgres() ? column.pgType ?? column.type : column.type;
  return `${column.name} ${type}`;
}

/**
 * Add every expected column missing from `table`. Existing columns are
 * never altered or dropped. Returns the names of the columns added.
 */
export async function ensureColumns(database: Database, table: string, columns: ColumnSpec[]): Promise<string[]> {
  const present = await listColumns(database, table);
  const added: string[] = [];

  for (const column of columns) {
    if (present.has(column.name)) continue;
    await database.exec(`ALTER TABLE ${table} ADD COLUMN ${columnDefinition(database, column)}`);
    console.log(`[MIGRATE] ✓ ${table}.${column.name} added`);
    added.push(`${table}.${column.name}`);
  }

  return added;
}

/**
 * Create missing tables, patch missing columns onto older ones, then
 * create indexes. Safe to run on every startup.
 */
export async function bootstrapSchema(database: Database = db): Promise<string[]> {
  await database.exec(database.isPostgres() ? schemaPostgres : schema);

  const added: string[] = [];
  for (const [table, columns] of Object.entries(patchableColumns)) {
    added.push(...await ensureColumns(database, table, columns));
  }

  await database.exec(indexes);
  return added;
}
