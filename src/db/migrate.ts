import { db, initDatabase, toNumber } from './index.js';
import { bootstrapSchema } from './bootstrap.js';
import { patchableColumns } from './schema.js';

async function migrate() {
  console.log('🌱 Running database migrations...');

  await initDatabase();

  console.log(`[MIGRATE] Bootstrapping schema (${db.isPostgres() ? 'PostgreSQL' : 'SQLite'})...`);
  const added = await bootstrapSchema(db);

  console.log('✅ Database migrations complete!');
  console.log(added.length > 0
    ? `   ${added.length} column(s) patched onto existing tables`
    : '   Schema already up to date');

  console.log('\n📋 Verifying tables:');
  for (const table of Object.keys(patchableColumns)) {
    const row = await db.get<{ total: unknown }>(`SELECT COUNT(*) AS total FROM ${table}`);
    console.log(`   ✓ ${table} (${toNumber(row?.total)} rows)`);
  }

  await db.close();
}

migrate().catch(error => {
  console.error('❌ Migration failed:', error);
  process.exit(1);
});
