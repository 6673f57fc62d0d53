import 'dotenv/config';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { closePool, getPool, transaction } from './index';
import { createChildLogger } from '../utils/logger';

const logger = createChildLogger('migrate');

const MIGRATIONS_DIR = join(__dirname, 'migrations');

function listMigrations(): string[] {
    return readdirSync(MIGRATIONS_DIR)
        .filter((f) => f.endsWith('.sql'))
        .sort(); // lexicographic sort ensures 001 < 002 < 003...
}

async function migrate() {
    const pool = getPool();
    const files = listMigrations();

    logger.info(`Found ${files.length} migration files`);

    await pool.query(`
        CREATE TABLE IF NOT EXISTS migrations_history (
            id SERIAL PRIMARY KEY,
            filename VARCHAR(255) UNIQUE NOT NULL,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        );
    `);

    for (const file of files) {
        const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf-8');

        const { rows } = await pool.query('SELECT id FROM migrations_history WHERE filename = $1', [file]);
        if (rows.length > 0) {
            logger.info(`${file} — already applied, skipping`);
            continue;
        }

        try {
            // The migration and its history row commit together
            await transaction(async (client) => {
                await client.query(sql);
                await client.query('INSERT INTO migrations_history (filename) VALUES ($1)', [file]);
            });
            logger.info(`${file} — applied`);
        } catch (err) {
            logger.error({ err, file }, `${file} — failed, transaction rolled back`);
            throw err;
        }
    }

    logger.info('All migrations complete');
}

migrate()
    .then(() => closePool())
    .catch((err: unknown) => {
        logger.error({ err }, 'Migration error');
        process.exit(1);
    });
