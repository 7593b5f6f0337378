/**
 * Typed reads from decoded records and SQL rows, plus the CSV cell
 * formatting shared by every timeline row.
 */
import { toIsoDate } from '../tds/format.js';
import { isDecodedRecord, isFlagSet, isTimestamp, type DecodedRecord, type FieldValue } from '../tds-types.js';
import type { SqlRow } from './source.js';

export type Cell = string | number | bigint;

// --- RECORD FIELDS ---

export function fieldOf(record: DecodedRecord | null, key: string): FieldValue | undefined {
    return record ? record[key] : undefined;
}

export function recordField(record: DecodedRecord | null, key: string): DecodedRecord | null {
    const value = fieldOf(record, key);
    return isDecodedRecord(value) ? value : null;
}

/** Text field, or empty when absent or kept as raw bytes. */
export function stringField(record: DecodedRecord | null, key: string): string {
    const value = fieldOf(record, key);
    return typeof value === 'string' ? value : '';
}

export function numberField(record: DecodedRecord | null, key: string): number | null {
    const value = fieldOf(record, key);
    return typeof value === 'number' ? value : null;
}

export function bigintField(record: DecodedRecord | null, key: string): bigint | null {
    const value = fieldOf(record, key);
    return typeof value === 'bigint' ? value : null;
}

/** Epoch seconds of a timestamp field; null when absent or zero. */
export function epochField(record: DecodedRecord | null, key: string): number | null {
    const value = fieldOf(record, key);
    return isTimestamp(value) && value.epoch ? value.epoch : null;
}

/** Bit of the record's `flags` word, false when the record has none. */
export function flagBit(record: DecodedRecord | null, bit: string, word: string = 'flags'): boolean {
    const value = fieldOf(record, word);
    return isFlagSet(value) ? value.bits[bit] === true : false;
}

export function hasFlags(record: DecodedRecord | null, word: string = 'flags'): boolean {
    return isFlagSet(fieldOf(record, word));
}

// --- SQL COLUMNS ---

/** Integer column; 0n for NULL or a missing column. */
export function intColumn(row: SqlRow, column: string): bigint {
    const value = row[column];
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.trunc(value));
    if (typeof value === 'string' && /^-?\d+$/.test(value)) return BigInt(value);
    return 0n;
}

export function numColumn(row: SqlRow, column: string): number {
    return Number(intColumn(row, column));
}

export function textColumn(row: SqlRow, column: string): string {
    const value = row[column];
    if (value === null || value === undefined) return '';
    if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');
    return String(value);
}

export function blobColumn(row: SqlRow, column: string): Uint8Array | null {
    const value = row[column];
    return value instanceof Uint8Array ? value : null;
}

/** Optional column: null when the column is absent from the table. */
export function optionalColumn(row: SqlRow, column: string): bigint | null {
    return column in row && row[column] !== null ? intColumn(row, column) : null;
}

// --- CSV ---

/**
 * Quoted CSV cell: outer quotes stripped, inner double quotes turned into
 * single quotes. Empty input stays an empty cell.
 */
export function escapeCsv(value: string): string {
    if (!value) return '';
    const stripped = stripQuotes(value);
    return `"${stripped.replaceAll('"', "'")}"`;
}

export function stripQuotes(value: string): string {
    return value.replace(/^["']+/, '').replace(/["']+$/, '');
}

/** `YYYY-MM-DDTHH:MM:SS` in UTC, empty for a missing or zero epoch. */
export function toDate(epoch: number | bigint | null | undefined): string {
    if (!epoch) return '';
    return toIsoDate(Number(epoch)).replace(/Z$/, '');
}

export function dictToString(dict: Readonly<Record<string, Cell>>): string {
    return Object.entries(dict).map(([key, value]) => `${key}:${value}`).join(' ');
}

export function bitLength(value: bigint): number {
    const abs = value < 0n ? -value : value;
    return abs === 0n ? 0 : abs.toString(2).length;
}
