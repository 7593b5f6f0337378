import { BOOL_FALSE, BOOL_TRUE, MIN_ELEMENT_SIZE, SIGNATURE_SIZE, VECTOR_MARKER, hex } from './format.js';
import { FormatError, IncompleteDataError, LimitExceededError } from './errors.js';
import { logOf, type Codec, type DecodeContext, type Decoder } from './context.js';
import { resolveCandidate } from './registry.js';
import type { TdsReader } from './reader.js';
import type {
    FieldError, FieldValue, NestedValue, TBool, TString, Timestamp
} from '../tds-types.js';

// --- PRIMITIVES ---

export const uint8: Codec<number> = (r) => r.getUint8();
export const uint16: Codec<number> = (r) => r.getUint16();
export const uint32: Codec<number> = (r) => r.getUint32();
export const int32: Codec<number> = (r) => r.getInt32();
export const int64: Codec<bigint> = (r) => r.getInt64();
export const double: Codec<number> = (r) => r.getDouble();
export const tbytes: Codec<Uint8Array> = (r) => r.getTBytes();
export const timestamp: Codec<Timestamp> = (r) => r.getTimestamp();

export const tstring: Codec<TString> = (r, ctx) => {
    const offset = r.offset;
    const value = r.getTString();
    if (typeof value !== 'string') {
        logOf(ctx)?.warn?.(`Invalid UTF-8 in string at offset ${offset} (${value.length} bytes), keeping raw bytes`);
    }
    return value;
};

export const tbool: Codec<TBool> = (r, ctx) => {
    const offset = r.offset;
    const value = r.getUint32();
    if (value === BOOL_TRUE) return true;
    if (value === BOOL_FALSE) return false;
    logOf(ctx)?.warn?.(`Invalid boolean signature ${hex(value)} at offset ${offset}`);
    return { error: 'bool', offset, signature: value };
};

// --- NESTED DISPATCH ---

function fieldError(r: TdsReader, error: FieldError): FieldError {
    // The tag is consumed so the cursor moves past the unrecognized value.
    r.skip(SIGNATURE_SIZE);
    return error;
}

/**
 * Peeks the next signature and decodes it through the registry.
 *
 * Unknown, documented-only and unresolved ambiguous signatures become a
 * FieldError; everything else recurses into the matching shape decoder.
 */
export function decodeNested(r: TdsReader, ctx: DecodeContext, expect?: string): NestedValue {
    const offset = r.offset;
    const signature = r.peekUint32();
    const entry = ctx.registry.lookup(signature);
    const log = logOf(ctx);

    if (!entry) {
        log?.warn?.(`Unknown nested signature ${hex(signature)} at offset ${offset}`);
        return fieldError(r, { error: 'unknown_signature', offset, signature });
    }

    if (entry.kind === 'documented') {
        log?.warn?.(`Nested signature ${hex(signature)} (${entry.name}) at offset ${offset} has no decoder`);
        return fieldError(r, { error: 'unsupported_signature', offset, signature, name: entry.name });
    }
    let decode: Decoder;
    if (entry.kind === 'ambiguous') {
        const candidate = resolveCandidate(entry, ctx.options.prefer, expect);
        if (!candidate) {
            log?.warn?.(`Ambiguous nested signature ${hex(signature)} (${entry.name}) at offset ${offset}`);
            return fieldError(r, { error: 'ambiguous', offset, signature, name: entry.name });
        }
        decode = candidate.decode;
    } else {
        decode = entry.decode;
    }

    if (ctx.depth >= ctx.options.maxDepth) {
        throw new LimitExceededError(`Nesting depth ${ctx.depth + 1} exceeds limit of ${ctx.options.maxDepth}`);
    }
    ctx.depth++;
    try {
        return decode(r, ctx);
    } finally {
        ctx.depth--;
    }
}

/** Tag-dispatched union field. */
export const obj: Codec<NestedValue> = (r, ctx) => decodeNested(r, ctx);

/** Tag-dispatched field whose shared signature resolves to `expect`. */
export function objAs(expect: string): Codec<NestedValue> {
    return (r, ctx) => decodeNested(r, ctx, expect);
}

// --- VECTORS ---

export function vector<T extends FieldValue>(element: Codec<T>): Codec<T[]> {
    return (r, ctx) => {
        const offset = r.offset;
        const marker = r.getUint32();
        if (marker !== VECTOR_MARKER) {
            throw new FormatError(`Expected vector marker ${hex(VECTOR_MARKER)} at offset ${offset}, found ${hex(marker)}`);
        }
        const count = r.getUint32();
        if (count > ctx.options.maxVectorLength) {
            throw new LimitExceededError(`Vector length ${count} exceeds limit of ${ctx.options.maxVectorLength}`);
        }
        if (count * MIN_ELEMENT_SIZE > r.remaining) {
            throw new IncompleteDataError(`Vector of ${count} elements at offset ${offset} exceeds remaining ${r.remaining} bytes`);
        }
        const out: T[] = [];
        for (let i = 0; i < count; i++) {
            out.push(element(r, ctx));
        }
        return out;
    };
}

// --- FLAGS ---

export interface FlagsSpec {
    kind: 'flags';
    /** Boolean bits carried only by the flags word (`flags.N?true`). */
    bits: Readonly<Record<string, number>>;
}

export interface GatedSpec {
    kind: 'gated';
    word: string;
    bit: number;
    codec: Codec<FieldValue>;
}

export function flags(bits: Readonly<Record<string, number>> = {}): FlagsSpec {
    return { kind: 'flags', bits };
}

/** Optional field, present on the wire iff `word` has `bit` set. */
export function flag(bit: number, codec: Codec<FieldValue>, word: string = 'flags'): GatedSpec {
    return { kind: 'gated', word, bit, codec };
}

export function isBitSet(value: number, bit: number): boolean {
    return ((value >>> bit) & 1) === 1;
}
