/**
 * Apply database migrations to Supabase
 * Usage: npx tsx scripts/apply-migrations.ts
 *
 * Requires an `exec_sql(sql text)` function on the database; without it,
 * run the files in supabase/migrations from the SQL editor instead.
 */

import 'dotenv/config';
import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import type { SupabaseClient } from '@supabase/supabase-js';

import { createSupabaseAdmin } from '../src/lib/supabase.js';

const MIGRATIONS_DIR = join(process.cwd(), 'supabase/migrations');

/**
 * Split a migration into statements, keeping $$-quoted function bodies whole
 */
function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inDollarQuote = false;

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();
    if (!inDollarQuote && (trimmed === '' || trimmed.startsWith('--'))) {
      continue;
    }

    current += `${line}\n`;
    const dollarCount = line.split('$$').length - 1;
    if (dollarCount % 2 === 1) {
      inDollarQuote = !inDollarQuote;
    }

    if (!inDollarQuote && trimmed.endsWith(';')) {
      statements.push(current.trim());
      current = '';
    }
  }

  if (current.trim() !== '') {
    statements.push(current.trim());
  }
  return statements;
}

async function applyMigration(
  supabase: SupabaseClient,
  filename: string
): Promise<boolean> {
  const sql = readFileSync(join(MIGRATIONS_DIR, filename), 'utf-8');
  console.log(`Applying migration: ${filename}`);

  for (const statement of splitStatements(sql)) {
    const { error } = await supabase.rpc('exec_sql', { sql: statement });
    if (error) {
      console.error(`Error executing SQL: ${error.message}`);
      console.log('Statement:', statement.substring(0, 100) + '...');
      return false;
    }
  }

  console.log(`Migration ${filename} completed`);
  return true;
}

async function main(): Promise<void> {
  const url = process.env.SUPABASE_URL;
  const serviceKey = process.env.SUPABASE_SERVICE_KEY;

  if (!url || !serviceKey) {
    console.error('Missing SUPABASE_URL or SUPABASE_SERVICE_KEY');
    process.exit(1);
  }

  const supabase = createSupabaseAdmin({ url, serviceKey });
  const files = readdirSync(MIGRATIONS_DIR)
    .filter((name) => name.endsWith('.sql'))
    .sort();

  for (const file of files) {
    if (!(await applyMigration(supabase, file))) {
      process.exit(1);
    }
  }
  console.log('All migrations applied successfully');
}

main().catch((error: unknown) => {
  console.error('Migration failed:', error);
  process.exit(1);
});
