// preferences.ts — persisted key/value settings consulted by the build
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';

const log = createLogger('preferences');

export interface PreferenceStore {
    getBoolean(key: string, defaultValue: boolean): boolean;
    setBoolean(key: string, value: boolean): void;
}

export class MemoryPreferenceStore implements PreferenceStore {
    private readonly values = new Map<string, boolean>();

    constructor(initial: Record<string, boolean> = {}) {
        for (const [k, v] of Object.entries(initial)) this.values.set(k, v);
    }

    getBoolean(key: string, defaultValue: boolean): boolean {
        return this.values.get(key) ?? defaultValue;
    }

    setBoolean(key: string, value: boolean): void {
        this.values.set(key, value);
    }
}

interface PreferenceRow {
    value: string;
}

export class SqlitePreferenceStore implements PreferenceStore {
    private readonly db: Database.Database;

    /** `:memory:` keeps everything in process. */
    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            fs.mkdirSync(path.dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS preferences (
                key TEXT PRIMARY KEY,
                value TEXT NOT NULL,
                updated_at TEXT NOT NULL
            )
        `);
    }

    getBoolean(key: string, defaultValue: boolean): boolean {
        const row = this.db
            .prepare<[string], PreferenceRow>('SELECT value FROM preferences WHERE key = ?')
            .get(key);
        if (row === undefined) return defaultValue;
        if (row.value === 'true') return true;
        if (row.value === 'false') return false;
        log.warn(`Preference ${key} is not a boolean, using default`, { value: row.value });
        return defaultValue;
    }

    setBoolean(key: string, value: boolean): void {
        this.db
            .prepare(`
                INSERT INTO preferences (key, value, updated_at) VALUES (?, ?, ?)
                ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
            `)
            .run(key, String(value), new Date().toISOString());
    }

    close(): void {
        this.db.close();
    }
}

/**
 * Opens the SQLite store on first use and releases it on close(), so a
 * build that never consults a preference never touches the database.
 */
export class LazySqlitePreferenceStore implements PreferenceStore {
    private store: SqlitePreferenceStore | undefined;

    constructor(private readonly dbPath: string) {}

    get isOpen(): boolean {
        return this.store !== undefined;
    }

    private open(): SqlitePreferenceStore {
        if (this.store === undefined) this.store = new SqlitePreferenceStore(this.dbPath);
        return this.store;
    }

    getBoolean(key: string, defaultValue: boolean): boolean {
        return this.open().getBoolean(key, defaultValue);
    }

    setBoolean(key: string, value: boolean): void {
        this.open().setBoolean(key, value);
    }

    close(): void {
        const store = this.store;
        this.store = undefined;
        store?.close();
    }
}
