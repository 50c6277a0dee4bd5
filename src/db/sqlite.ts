import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { PersistenceError, toPersistenceError } from '../errors.js';
import type { PreferencesRepository } from './db.js';
import { SCHEMA_SQL } from './schema.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DATA_DIR = path.join(__dirname, '..', '..', 'data');
const DB_PATH = path.join(DATA_DIR, 'favorites.db');

/**
 * SQLite implementation of PreferencesRepository.
 * Uses better-sqlite3 for synchronous, fast, zero-config persistence; every
 * write is a single upsert, so a list is either fully replaced or untouched.
 */
export class SQLitePreferences implements PreferencesRepository {
    private db: Database.Database;

    constructor(dbPath: string = DB_PATH) {
        if (dbPath !== ':memory:') {
            // Ensure data directory exists
            const dir = path.dirname(dbPath);
            if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        }

        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
    }

    init(): void {
        this.db.exec(SCHEMA_SQL);
        console.log(`SQLite preferences initialized at ${this.db.name}`);
    }

    async getStringList(key: string): Promise<string[] | null> {
        let row: unknown;
        try {
            row = this.db.prepare('SELECT value FROM preferences WHERE key = ?').get(key);
        } catch (err) {
            throw toPersistenceError('read', err);
        }
        if (row === undefined) return null;
        return parseStringList(key, row);
    }

    async setStringList(key: string, values: readonly string[]): Promise<void> {
        try {
            this.db.prepare(`
      INSERT INTO preferences (key, value, updated_at)
      VALUES (?, ?, datetime('now'))
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        updated_at = excluded.updated_at
    `).run(key, JSON.stringify(values));
        } catch (err) {
            throw toPersistenceError('write', err);
        }
    }

    close(): void {
        this.db.close();
    }
}

function parseStringList(key: string, row: unknown): string[] {
    if (typeof row !== 'object' || row === null || !('value' in row) || typeof row.value !== 'string') {
        throw new PersistenceError('read', `Preference "${key}" has no value column`);
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(row.value);
    } catch (err) {
        throw new PersistenceError('read', `Preference "${key}" is not valid JSON`, { cause: err });
    }
    if (!isStringList(parsed)) {
        throw new PersistenceError('read', `Preference "${key}" is not a list of strings`);
    }
    return parsed;
}

function isStringList(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v: unknown) => typeof v === 'string');
}
