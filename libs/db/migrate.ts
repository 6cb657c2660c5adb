import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { logger } from '../logging/logger.js';
import { Queryable } from './index.js';

/**
 * Applies every *.sql file of the directory in name order.
 * Migrations are written to be idempotent (IF NOT EXISTS).
 */
export async function applyMigrations(db: Queryable, directory: string): Promise<string[]> {
    const resolved = path.resolve(directory);
    const files = (await readdir(resolved))
        .filter(name => name.endsWith('.sql'))
        .sort();

    for (const file of files) {
        const sql = await readFile(path.join(resolved, file), 'utf8');
        await db.query(sql);
        logger.info({ migration: file }, '[DB] Migration applied');
    }

    return files;
}
