/**
 * Value types produced by the TDS decoder.
 *
 * A decoded record is a plain object: `sname` and `signature` identify the
 * shape, every other key is a field in wire order. Optional fields whose
 * flag bit is clear are not present as keys at all.
 */

/** Epoch seconds as read from the wire plus its UTC rendering. */
export interface Timestamp {
    epoch: number;
    /** `YYYY-MM-DDTHH:MM:SSZ` */
    iso: string;
}

/** Decoded 32-bit flags word. */
export interface FlagSet {
    value: number;
    /** Declared boolean bits and one `has_<field>` entry per gated field. */
    bits: Readonly<Record<string, boolean>>;
}

export type FieldErrorKind =
    | 'unknown_signature'
    | 'unsupported_signature'
    | 'ambiguous'
    | 'bool';

/**
 * Recoverable field-level failure. Stands in for the value that could not
 * be decoded; sibling fields are still decoded.
 */
export interface FieldError {
    error: FieldErrorKind;
    /** Offset of the failing field within the top-level buffer. */
    offset: number;
    signature?: number;
    name?: string;
}

export type FieldScalar = number | bigint | string | boolean | Uint8Array;

export type FieldValue =
    | FieldScalar
    | Timestamp
    | FlagSet
    | FieldError
    | DecodedRecord
    | readonly FieldValue[];

export interface DecodedRecord {
    sname: string;
    signature: number;
    [field: string]: FieldValue | undefined;
}

/** Result of a nested tag-dispatched field. */
export type NestedValue = DecodedRecord | FieldError;

/** Text field: bytes are substituted when the payload is not valid UTF-8. */
export type TString = string | Uint8Array;

export type TBool = boolean | FieldError;

export function isDecodedRecord(value: FieldValue | undefined): value is DecodedRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && !(value instanceof Uint8Array) && 'sname' in value;
}

export function isFieldError(value: FieldValue | undefined): value is FieldError {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && !(value instanceof Uint8Array) && 'error' in value && !('sname' in value);
}

export function isTimestamp(value: FieldValue | undefined): value is Timestamp {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && !(value instanceof Uint8Array) && 'epoch' in value && 'iso' in value;
}

export function isFlagSet(value: FieldValue | undefined): value is FlagSet {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && !(value instanceof Uint8Array) && 'bits' in value && 'value' in value;
}

export function isFieldArray(value: FieldValue | undefined): value is readonly FieldValue[] {
    return Array.isArray(value);
}
