import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createPool, Queryable } from '../../libs/db/index.js';
import { ConfigGuard } from '../../libs/bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS, loadDbConfig } from '../../libs/bootstrap/config/db-config.js';
import { ErrorSanitizer } from '../../libs/errors/sanitizer.js';
import { logger } from '../../libs/logging/logger.js';

/**
 * Hubgate Schema Migrator
 * Applies schema/migrations/NNNN_*.sql in name order, each in its own
 * transaction, recording applied files in schema_migrations.
 */

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../schema/migrations/', import.meta.url));

const MIGRATION_FILE = /^\d{4}_[a-z0-9_]+\.sql$/;

const AppliedRowsSchema = z.array(z.object({ name: z.string() }));

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
    const entries = await fs.readdir(dir);
    return entries.filter(entry => MIGRATION_FILE.test(entry)).sort();
}

/**
 * Must run on a single connection: BEGIN/COMMIT bracket each file.
 * Returns the files applied by this run.
 */
export async function applyMigrations(client: Queryable, dir: string = MIGRATIONS_DIR): Promise<string[]> {
    await client.query(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
            name TEXT PRIMARY KEY,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )`);

    const existing = await client.query('SELECT name FROM schema_migrations');
    const applied = new Set(AppliedRowsSchema.parse(existing.rows).map(row => row.name));

    const appliedNow: string[] = [];
    for (const file of await listMigrations(dir)) {
        if (applied.has(file)) {
            continue;
        }

        const sql = await fs.readFile(path.join(dir, file), 'utf8');
        await client.query('BEGIN');
        try {
            await client.query(sql);
            await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
            await client.query('COMMIT');
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                logger.error({ error: rollbackError }, '[DB] Failed to rollback migration');
            }
            throw ErrorSanitizer.sanitize(error, `Migrations:${file}`);
        }

        logger.info({ migration: file }, 'Migration applied');
        appliedNow.push(file);
    }

    return appliedNow;
}

async function main(): Promise<void> {
    ConfigGuard.enforce(DB_CONFIG_GUARDS);

    const pool = createPool(loadDbConfig());
    const client = await pool.connect();
    try {
        const applied = await applyMigrations({
            query: (text: string, params?: unknown[]) => client.query(text, params)
        });
        logger.info({ applied: applied.length }, '--- Schema up to date ---');
    } finally {
        client.release();
        await pool.end();
    }
}

// Standalone implementation
if (process.argv[1] === fileURLToPath(import.meta.url)) {
    main().catch((error: unknown) => {
        logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Migration failed');
        process.exitCode = 1;
    });
}
