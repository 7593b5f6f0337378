/**
 * TDS cache decoder public API
 *
 * @module tds-cache-decoder
 */

import { decodeBlob, type DecodedValue, type DecodeResult } from './tds/decode.js';
import { REGISTRY } from './tds/default-registry.js';
import type { RegistryEntry } from './tds/registry.js';
import { formatInline, renderRecord } from './tds/render.js';
import type { DecoderOptions } from './tds/types.js';

export type {
    DecodedRecord,
    FieldError,
    FieldErrorKind,
    FieldScalar,
    FieldValue,
    FlagSet,
    NestedValue,
    TBool,
    TString,
    Timestamp,
} from './tds-types.js';
export { isDecodedRecord, isFieldArray, isFieldError, isFlagSet, isTimestamp } from './tds-types.js';
export type { DecoderOptions, ResolvedDecoderOptions, TdsLogger as Logger, RecordFlag } from './tds/types.js';
export {
    AmbiguousSignatureError,
    FormatError,
    IncompleteDataError,
    LimitExceededError,
    RegistryError,
    SignatureMismatchError,
    TdsError,
    UnknownSignatureError,
    UnsupportedSignatureError,
} from './tds/errors.js';
export { TdsReader } from './tds/reader.js';
export { SignatureRegistry, resolveCandidate } from './tds/registry.js';
export type { AmbiguousEntry, DocumentedEntry, DocumentedSignature, RegistryEntry, ShapeEntry } from './tds/registry.js';
export { REGISTRY } from './tds/default-registry.js';
export {
    decodeNested,
    double,
    flag,
    flags,
    int32,
    int64,
    obj,
    objAs,
    tbool,
    tbytes,
    timestamp,
    tstring,
    uint8,
    uint16,
    uint32,
    vector,
} from './tds/codecs.js';
export type { Codec, DecodeContext, Decoder } from './tds/context.js';
export { shape, TAIL_FIELD } from './tds/shape.js';
export type { FieldMap, FieldSpec, Shape, ShapeOptions } from './tds/shape.js';
export { ALL_SHAPES } from './tds/shapes/index.js';
export { decodeBlob, recordOf } from './tds/decode.js';
export type { DecodedValue, DecodeFailure, DecodeResult, DecodeSuccess } from './tds/decode.js';
export { formatInline, renderRecord } from './tds/render.js';
export * from './projection/index.js';

// The TDS Namespace Object
export const TDS = {
    /**
     * Decodes one blob column into a record tree.
     */
    decode: (bytes: Uint8Array, options?: DecoderOptions): DecodeResult => decodeBlob(bytes, options),

    /**
     * The frozen signature registry.
     */
    registry: REGISTRY,

    /**
     * Registry entry for a signature, undefined when the tag is unknown.
     */
    lookup: (signature: number): RegistryEntry | undefined => REGISTRY.lookup(signature),

    /**
     * Indented text rendering of a decoded value.
     */
    render: (value: DecodedValue): string => (typeof value === 'boolean' ? formatInline(value) : renderRecord(value)),
};

export default TDS;
