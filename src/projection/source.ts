import Database from 'better-sqlite3';
import type { TdsLogger } from '../tds/types.js';

/** Column value as read with `safeIntegers`: every INTEGER is a bigint. */
export type SqlValue = bigint | number | string | Uint8Array | null;

export type SqlRow = Readonly<Record<string, SqlValue>>;

/**
 * Row provider for the projection layer. `readTable` returns null when the
 * table does not exist, so older cache layouts are read as far as they go.
 */
export interface CacheSource {
    readTable(name: string): SqlRow[] | null;
    close(): void;
}

function toSqlValue(value: unknown): SqlValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'bigint' || typeof value === 'number' || typeof value === 'string') return value;
    if (value instanceof Uint8Array) return value;
    return String(value);
}

function toSqlRow(row: unknown): SqlRow {
    const out: Record<string, SqlValue> = {};
    if (typeof row !== 'object' || row === null) return out;
    for (const [key, value] of Object.entries(row)) {
        out[key] = toSqlValue(value);
    }
    return out;
}

/**
 * better-sqlite3 backed source. Opened read-only; integers come back as
 * bigint so 64-bit dialog and message ids stay exact.
 */
export class SqliteCacheSource implements CacheSource {
    private readonly db: Database.Database;
    private readonly logger: TdsLogger | null;

    constructor(db: Database.Database, logger: TdsLogger | null = null) {
        this.db = db;
        this.logger = logger;
    }

    static open(file: string, logger: TdsLogger | null = null): SqliteCacheSource {
        const db = new Database(file, { readonly: true, fileMustExist: true });
        return new SqliteCacheSource(db, logger);
    }

    hasTable(name: string): boolean {
        const row = this.db
            .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
            .get(name);
        return row !== undefined;
    }

    readTable(name: string): SqlRow[] | null {
        if (!this.hasTable(name)) {
            this.logger?.error?.(`Table [${name}] not found in the database`);
            return null;
        }
        // Table names come from the fixed projection list, never from input.
        const rows = this.db.prepare(`SELECT * FROM "${name}"`).safeIntegers(true).all();
        return rows.map(toSqlRow);
    }

    close(): void {
        this.db.close();
    }
}
