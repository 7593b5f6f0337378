import {
    LONG_LENGTH_MARKER, LONG_PREFIX_SIZE, SHORT_PREFIX_SIZE, SIGNATURE_SIZE,
    paddingFor, toIsoDate
} from './format.js';
import { IncompleteDataError } from './errors.js';
import type { TString, Timestamp } from '../tds-types.js';

const UTF8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Strict UTF-8 decode; `null` when the bytes are not valid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
    try {
        return UTF8.decode(bytes);
    } catch (e) {
        if (e instanceof TypeError) return null;
        throw e;
    }
}

/**
 * Little-endian cursor over one input buffer.
 *
 * Every read checks the remaining length first and throws
 * IncompleteDataError instead of reading past the end. Byte slices handed
 * out are copies, so nothing returned keeps the caller's buffer alive.
 */
export class TdsReader {
    private readonly data: Uint8Array;
    private readonly view: DataView;
    private pos: number = 0;

    constructor(data: Uint8Array) {
        this.data = data;
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    }

    get offset(): number {
        return this.pos;
    }

    get length(): number {
        return this.data.length;
    }

    get remaining(): number {
        return this.data.length - this.pos;
    }

    private require(size: number, what: string): void {
        if (this.pos + size > this.data.length) {
            throw new IncompleteDataError(
                `Unexpected end of data (${what}): need ${size} bytes at offset ${this.pos}, ${this.remaining} left`
            );
        }
    }

    peekUint32(): number {
        this.require(SIGNATURE_SIZE, 'signature');
        return this.view.getUint32(this.pos, true);
    }

    getUint8(): number {
        this.require(1, 'uint8');
        return this.data[this.pos++];
    }

    getUint16(): number {
        this.require(2, 'uint16');
        const val = this.view.getUint16(this.pos, true);
        this.pos += 2;
        return val;
    }

    getUint32(): number {
        this.require(4, 'uint32');
        const val = this.view.getUint32(this.pos, true);
        this.pos += 4;
        return val;
    }

    getInt32(): number {
        this.require(4, 'int32');
        const val = this.view.getInt32(this.pos, true);
        this.pos += 4;
        return val;
    }

    getInt64(): bigint {
        this.require(8, 'int64');
        const val = this.view.getBigInt64(this.pos, true);
        this.pos += 8;
        return val;
    }

    getUint64(): bigint {
        this.require(8, 'uint64');
        const val = this.view.getBigUint64(this.pos, true);
        this.pos += 8;
        return val;
    }

    getDouble(): number {
        this.require(8, 'double');
        const val = this.view.getFloat64(this.pos, true);
        this.pos += 8;
        return val;
    }

    getBytes(size: number): Uint8Array {
        this.require(size, 'bytes');
        const out = this.data.slice(this.pos, this.pos + size);
        this.pos += size;
        return out;
    }

    skip(size: number): void {
        this.require(size, 'skip');
        this.pos += size;
    }

    /**
     * Length-prefixed byte string.
     *
     * Short form: 1 length byte, padded so that prefix + payload is word
     * aligned. Long form: 0xFE followed by a 24-bit length, payload padded
     * on its own length.
     */
    getTBytes(): Uint8Array {
        this.require(1, 'tbytes length');
        let length: number;
        if (this.data[this.pos] >= LONG_LENGTH_MARKER) {
            this.require(LONG_PREFIX_SIZE, 'tbytes long length');
            length = this.view.getUint32(this.pos, true) >>> 8;
            this.pos += LONG_PREFIX_SIZE;
        } else {
            length = this.data[this.pos];
            this.pos += SHORT_PREFIX_SIZE;
        }
        const payload = this.getBytes(length);
        const padding = paddingFor(length);
        if (padding > 0) this.skip(padding);
        return payload;
    }

    /** tbytes payload as UTF-8; the raw bytes when decoding fails. */
    getTString(): TString {
        const bytes = this.getTBytes();
        return decodeUtf8(bytes) ?? bytes;
    }

    getTimestamp(): Timestamp {
        const epoch = this.getUint32();
        return { epoch, iso: toIsoDate(epoch) };
    }

    /** Consumes everything left in the buffer. */
    rest(): Uint8Array {
        return this.getBytes(this.remaining);
    }
}
