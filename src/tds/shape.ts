import { SignatureMismatchError, RegistryError } from './errors.js';
import { isBitSet, type FlagsSpec, type GatedSpec } from './codecs.js';
import type { Codec, DecodeContext, Decoder } from './context.js';
import type { TdsReader } from './reader.js';
import type { RecordFlag } from './types.js';
import type { DecodedRecord, FieldValue } from '../tds-types.js';

export type FieldSpec = Codec<FieldValue> | FlagsSpec | GatedSpec;

/** Field declarations in wire order. */
export type FieldMap = Readonly<Record<string, FieldSpec>>;

export interface ShapeOptions {
    /** Keep trailing bytes in `unparsed` when this shape is the top-level record. */
    tail?: boolean;
    /** Computes fields that are not on the wire from the decoded ones. */
    derive?: (record: DecodedRecord) => Readonly<Record<string, FieldValue>> | null;
    /** Another shape legitimately uses the same signature; see SignatureRegistry. */
    sharedSignature?: boolean;
}

export interface Shape {
    readonly signature: number;
    readonly name: string;
    readonly flag: RecordFlag | null;
    readonly sharedSignature: boolean;
    /** Field names in wire order. */
    readonly fields: readonly string[];
    readonly decode: Decoder;
}

export const TAIL_FIELD = 'unparsed';

/**
 * Bit name → bit index per flags word: the declared boolean bits plus a
 * `has_<field>` entry for every field gated by that word.
 */
function collectBitNames(name: string, entries: [string, FieldSpec][]): Map<string, Map<string, number>> {
    const words = new Map<string, Map<string, number>>();
    for (const [key, def] of entries) {
        if (typeof def === 'function') continue;
        if (def.kind === 'flags') {
            if (words.has(key)) throw new RegistryError(`${name}: flags word ${key} declared twice`);
            words.set(key, new Map(Object.entries(def.bits)));
            continue;
        }
        const bits = words.get(def.word);
        if (!bits) {
            throw new RegistryError(`${name}: field ${key} is gated by ${def.word}, which is not declared before it`);
        }
        if (def.bit < 0 || def.bit > 31) {
            throw new RegistryError(`${name}: field ${key} uses bit ${def.bit} outside the 32-bit word`);
        }
        bits.set(`has_${key}`, def.bit);
    }
    return words;
}

function decodeFlagBits(value: number, names: Map<string, number>): Record<string, boolean> {
    const bits: Record<string, boolean> = {};
    for (const [bitName, bit] of names) {
        bits[bitName] = isBitSet(value, bit);
    }
    return bits;
}

/**
 * Declares one record shape: its signature, canonical name and the fields
 * that follow the signature on the wire.
 *
 * The returned decoder asserts the signature, decodes fields strictly in
 * declaration order (a gated field is read only when its bit is set in the
 * flags word already decoded), then applies `derive` and the tail capture.
 */
export function shape(signature: number, name: string, fields: FieldMap, options: ShapeOptions = {}): Shape {
    const expected = signature >>> 0;
    const entries = Object.entries(fields);
    const bitNames = collectBitNames(name, entries);
    const derive = options.derive ?? null;
    const tail = options.tail ?? false;

    const decode: Decoder = (r: TdsReader, ctx: DecodeContext) => {
        const actual = r.getUint32();
        if (actual !== expected) {
            throw new SignatureMismatchError(name, expected, actual);
        }

        const record: DecodedRecord = { sname: name, signature: expected };
        const words = new Map<string, number>();

        for (const [key, def] of entries) {
            if (typeof def === 'function') {
                record[key] = def(r, ctx);
            } else if (def.kind === 'flags') {
                const value = r.getUint32();
                words.set(key, value);
                record[key] = { value, bits: decodeFlagBits(value, bitNames.get(key) ?? new Map()) };
            } else if (isBitSet(words.get(def.word) ?? 0, def.bit)) {
                record[key] = def.codec(r, ctx);
            }
        }

        if (derive) {
            const derived = derive(record);
            if (derived) Object.assign(record, derived);
        }
        if (tail && ctx.depth === 1) {
            record[TAIL_FIELD] = r.rest();
        }
        return record;
    };

    const definition: Shape = {
        signature: expected,
        name,
        flag: tail ? 'tail' : null,
        sharedSignature: options.sharedSignature ?? false,
        fields: Object.freeze(entries.map(([key]) => key)),
        decode,
    };
    return Object.freeze(definition);
}
