import { BOOL_FALSE, BOOL_TRUE, VECTOR_MARKER, paddingFor } from '../../src/tds/format.js';

/**
 * Builds little-endian TDS buffers for tests.
 */
export class TdsWriter {
    private readonly chunks: number[] = [];

    sig(signature: number): this {
        return this.uint32(signature);
    }

    uint8(value: number): this {
        this.chunks.push(value & 0xff);
        return this;
    }

    uint32(value: number): this {
        const v = value >>> 0;
        this.chunks.push(v & 0xff, (v >>> 8) & 0xff, (v >>> 16) & 0xff, (v >>> 24) & 0xff);
        return this;
    }

    int32(value: number): this {
        return this.uint32(value | 0);
    }

    int64(value: bigint): this {
        const v = BigInt.asUintN(64, value);
        for (let i = 0n; i < 8n; i++) {
            this.chunks.push(Number((v >> (8n * i)) & 0xffn));
        }
        return this;
    }

    double(value: number): this {
        const view = new DataView(new ArrayBuffer(8));
        view.setFloat64(0, value, true);
        return this.raw(new Uint8Array(view.buffer));
    }

    raw(bytes: Iterable<number>): this {
        for (const b of bytes) this.chunks.push(b & 0xff);
        return this;
    }

    /** Length prefix, payload and zero padding. */
    tbytes(payload: Uint8Array): this {
        if (payload.length >= 254) {
            this.uint32(((payload.length << 8) | 0xfe) >>> 0);
        } else {
            this.uint8(payload.length);
        }
        this.raw(payload);
        for (let i = 0; i < paddingFor(payload.length); i++) this.chunks.push(0);
        return this;
    }

    tstring(text: string): this {
        return this.tbytes(new TextEncoder().encode(text));
    }

    bool(value: boolean): this {
        return this.uint32(value ? BOOL_TRUE : BOOL_FALSE);
    }

    /** Vector header; the caller writes the elements. */
    vector(count: number): this {
        return this.uint32(VECTOR_MARKER).uint32(count);
    }

    get length(): number {
        return this.chunks.length;
    }

    build(): Uint8Array {
        return Uint8Array.from(this.chunks);
    }
}

export function tds(): TdsWriter {
    return new TdsWriter();
}
