import {
    BOOL_FALSE,
    BOOL_TRUE,
    DEFAULT_MAX_DEPTH,
    DEFAULT_MAX_VECTOR_LENGTH,
    SIGNATURE_SIZE,
    hex,
    hexBytes,
} from './format.js';
import {
    AmbiguousSignatureError,
    IncompleteDataError,
    SignatureMismatchError,
    TdsError,
    UnknownSignatureError,
    UnsupportedSignatureError,
} from './errors.js';
import { REGISTRY } from './default-registry.js';
import { resolveCandidate, type SignatureRegistry } from './registry.js';
import { TdsReader } from './reader.js';
import { TAIL_FIELD } from './shape.js';
import type { DecodeContext, Decoder } from './context.js';
import type { DecoderOptions, ResolvedDecoderOptions } from './types.js';
import type { DecodedRecord } from '../tds-types.js';

/** A bare boolean signature at the top of a blob decodes to the boolean itself. */
export type DecodedValue = DecodedRecord | boolean;

export type DecodeSuccess = {
    ok: true;
    value: DecodedValue;
    /** Bytes read by the decoder, including a captured tail. */
    consumed: number;
    /** Bytes left after the record, or null when the buffer was fully used. */
    unconsumed: Uint8Array | null;
};

export type DecodeFailure = {
    ok: false;
    /** False for catalogued signatures that simply have no decoder. */
    fatal: boolean;
    error: TdsError;
};

export type DecodeResult = DecodeSuccess | DecodeFailure;

const DEFAULTS: ResolvedDecoderOptions = {
    logger: null,
    maxDepth: DEFAULT_MAX_DEPTH,
    maxVectorLength: DEFAULT_MAX_VECTOR_LENGTH,
    prefer: [],
};

/** The decoded record of a successful result; null for failures and booleans. */
export function recordOf(result: DecodeResult | null): DecodedRecord | null {
    return result && result.ok && typeof result.value !== 'boolean' ? result.value : null;
}

function topLevelValue(record: DecodedRecord): DecodedValue {
    if (record.signature === BOOL_TRUE) return true;
    if (record.signature === BOOL_FALSE) return false;
    return record;
}

export function resolveOptions(options: DecoderOptions = {}): ResolvedDecoderOptions {
    return {
        logger: options.logger ?? DEFAULTS.logger,
        maxDepth: options.maxDepth ?? DEFAULTS.maxDepth,
        maxVectorLength: options.maxVectorLength ?? DEFAULTS.maxVectorLength,
        prefer: options.prefer ?? DEFAULTS.prefer,
    };
}

function fail(error: TdsError, fatal: boolean, ctx: DecodeContext): DecodeFailure {
    const log = ctx.options.logger;
    if (fatal) {
        log?.error?.(`${error.name}: ${error.message}`);
    } else {
        log?.warn?.(`${error.name}: ${error.message}`);
    }
    return { ok: false, fatal, error };
}

/**
 * Decodes one top-level record from a blob column.
 *
 * Never throws for malformed input: every TDS failure comes back as
 * `{ ok: false }`. A decoder running past a tag it does not own
 * (SignatureMismatchError) is a catalogue bug and is rethrown.
 */
export function decodeBlob(
    bytes: Uint8Array,
    options: DecoderOptions = {},
    registry: SignatureRegistry = REGISTRY,
): DecodeResult {
    const ctx: DecodeContext = { registry, options: resolveOptions(options), depth: 0 };
    const log = ctx.options.logger;

    if (bytes.length < SIGNATURE_SIZE) {
        return fail(new IncompleteDataError(`Blob of ${bytes.length} bytes is too short for a signature`), true, ctx);
    }

    const reader = new TdsReader(bytes);
    const signature = reader.peekUint32();
    const entry = registry.lookup(signature);

    if (!entry) {
        return fail(new UnknownSignatureError(signature, 0), true, ctx);
    }
    if (entry.kind === 'documented') {
        return fail(new UnsupportedSignatureError(signature, entry.name), false, ctx);
    }

    let decode: Decoder;
    if (entry.kind === 'ambiguous') {
        const candidate = resolveCandidate(entry, ctx.options.prefer);
        if (!candidate) {
            return fail(new AmbiguousSignatureError(signature, [...entry.candidates.keys()]), false, ctx);
        }
        decode = candidate.decode;
    } else {
        decode = entry.decode;
    }

    let record: DecodedRecord;
    ctx.depth = 1;
    try {
        record = decode(reader, ctx);
    } catch (err) {
        if (err instanceof TdsError && !(err instanceof SignatureMismatchError)) {
            return fail(err, true, ctx);
        }
        throw err;
    } finally {
        ctx.depth = 0;
    }

    const tail = record[TAIL_FIELD];
    if (tail instanceof Uint8Array && tail.length > 0) {
        log?.info?.(`${record.sname} (${hex(signature)}) keeps ${tail.length} trailing bytes in ${TAIL_FIELD}`);
    }

    const consumed = reader.offset;
    if (consumed !== bytes.length) {
        const rest = bytes.slice(consumed);
        log?.error?.(
            `${record.sname} (${hex(signature)}) consumed ${consumed} of ${bytes.length} bytes, unconsumed: ${hexBytes(rest)}`
        );
        return { ok: true, value: topLevelValue(record), consumed, unconsumed: rest };
    }
    return { ok: true, value: topLevelValue(record), consumed, unconsumed: null };
}
