import { hex, hexBytes } from './format.js';
import {
    isDecodedRecord,
    isFieldArray,
    isFieldError,
    isFlagSet,
    isTimestamp,
    type DecodedRecord,
    type FieldError,
    type FieldValue,
} from '../tds-types.js';

const INDENT = '  ';
const MAX_INLINE_BYTES = 32;

function renderBytes(bytes: Uint8Array): string {
    if (bytes.length === 0) return '<0 bytes>';
    const shown = hexBytes(bytes.subarray(0, MAX_INLINE_BYTES));
    const more = bytes.length > MAX_INLINE_BYTES ? '...' : '';
    return `<${bytes.length} bytes: ${shown}${more}>`;
}

function renderFieldError(err: FieldError): string {
    const parts: string[] = [err.error];
    if (err.signature !== undefined) parts.push(hex(err.signature));
    if (err.name !== undefined) parts.push(err.name);
    return `<${parts.join(' ')} at offset ${err.offset}>`;
}

function recordHead(record: DecodedRecord): string {
    return `${record.sname} (${hex(record.signature)})`;
}

/**
 * One-line form of a field value. Nested records collapse to their name,
 * arrays to their inline items.
 */
export function formatInline(value: FieldValue): string {
    if (typeof value === 'string') return JSON.stringify(value);
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
    if (value instanceof Uint8Array) return renderBytes(value);
    if (isFieldArray(value)) return `[${value.map((item) => formatInline(item)).join(', ')}]`;
    if (isTimestamp(value)) return `${value.epoch} (${value.iso})`;
    if (isFlagSet(value)) {
        const set = Object.entries(value.bits).filter(([, on]) => on).map(([name]) => name);
        return `${hex(value.value)} [${set.join(' ')}]`;
    }
    if (isFieldError(value)) return renderFieldError(value);
    if (isDecodedRecord(value)) return recordHead(value);
    return String(value);
}

function renderInto(lines: string[], label: string, value: FieldValue, indent: string): void {
    if (isDecodedRecord(value)) {
        lines.push(`${indent}${label}${recordHead(value)}`);
        for (const [key, field] of Object.entries(value)) {
            if (key === 'sname' || key === 'signature' || field === undefined) continue;
            renderInto(lines, `${key}: `, field, indent + INDENT);
        }
        return;
    }
    if (isFieldArray(value) && value.length > 0) {
        lines.push(`${indent}${label}[${value.length}]`);
        for (const item of value) {
            renderInto(lines, '- ', item, indent + INDENT);
        }
        return;
    }
    lines.push(`${indent}${label}${formatInline(value)}`);
}

/**
 * Indented text tree of a decoded record, one field per line:
 *
 *     peer_user (0x9db1bc6d)
 *       user_id: 42
 */
export function renderRecord(record: DecodedRecord): string {
    const lines: string[] = [];
    renderInto(lines, '', record, '');
    return lines.join('\n');
}
