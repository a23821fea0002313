import PATH from 'path';
import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import { dataRoot$ } from '../state';
import { EMPTY, catchError, from, map, shareReplay, switchMap } from 'rxjs';
import { logToFile } from '../log';

sqlite3.verbose();

/** Flat string store shared by every local cache namespace. */
export interface KeyValueStore {
    getString(key: string): Promise<string | null>;
    setString(key: string, value: string): Promise<void>;
    remove(key: string): Promise<void>;
    keysWithPrefix(prefix: string): Promise<string[]>;
}

export const openKeyValueDb = async (filename: string) => {
    const db = await open({
        filename,
        driver: filename === ':memory:' ? sqlite3.Database : sqlite3.cached.Database,
    });
    await db.exec(`
        CREATE TABLE IF NOT EXISTS kv_store (
            key  TEXT PRIMARY KEY,
            value TEXT,
            updateTime BIGINT
        );
    `);
    return db;
};

export class SqliteKeyValueStore implements KeyValueStore {
    constructor(private readonly db: Database) {}

    async getString(key: string) {
        const row = await this.db.get<{ value: string }>(
            'SELECT value FROM kv_store WHERE key = @key',
            { '@key': key },
        );
        return row ? base64ToString(row.value) : null;
    }

    async setString(key: string, value: string) {
        await this.db.run(
            `INSERT INTO kv_store (key, value, updateTime) VALUES (@key, @value, @updateTime)
             ON CONFLICT(key) DO UPDATE SET value = excluded.value, updateTime = excluded.updateTime`,
            { '@key': key, '@value': stringToBase64(value), '@updateTime': Date.now() },
        );
    }

    async remove(key: string) {
        await this.db.run('DELETE FROM kv_store WHERE key = @key', { '@key': key });
    }

    async keysWithPrefix(prefix: string) {
        const rows = await this.db.all<{ key: string }[]>(
            'SELECT key FROM kv_store WHERE substr(key, 1, @length) = @prefix',
            { '@length': prefix.length, '@prefix': prefix },
        );
        return rows.map(({ key }) => key);
    }
}

export const kvStore$ = dataRoot$.pipe(
    switchMap((dataRoot) => {
        const dbPath = PATH.join(dataRoot, 'cache.db');
        logToFile('kv db:', dbPath);
        return from(openKeyValueDb(dbPath));
    }),
    map((db): KeyValueStore => new SqliteKeyValueStore(db)),
    catchError((e) => {
        logToFile('load kv db failed: ', e);
        return EMPTY;
    }),
    shareReplay(1),
);

export const base64ToString = (base64: string) => {
    return Buffer.from(base64, 'base64').toString();
};

export const stringToBase64 = (str: string) => {
    return Buffer.from(str).toString('base64');
};
