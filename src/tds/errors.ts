import { hex } from './format.js';

export class TdsError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'TdsError';
    }
}

/** Buffer ended inside a fixed-width primitive or a declared length. */
export class IncompleteDataError extends TdsError {
    constructor(message: string) {
        super(message);
        this.name = 'IncompleteDataError';
    }
}

/** Structurally invalid input, e.g. a vector without its marker. */
export class FormatError extends TdsError {
    constructor(message: string) {
        super(message);
        this.name = 'FormatError';
    }
}

export class LimitExceededError extends TdsError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}

export class UnknownSignatureError extends TdsError {
    constructor(public readonly signature: number, offset: number = 0) {
        super(`Unknown signature ${hex(signature)} at offset ${offset}`);
        this.name = 'UnknownSignatureError';
    }
}

/** The signature is catalogued but no decoder exists for it. */
export class UnsupportedSignatureError extends TdsError {
    constructor(public readonly signature: number, public readonly shapeName: string) {
        super(`Signature ${hex(signature)} (${shapeName}) is documented but not decodable`);
        this.name = 'UnsupportedSignatureError';
    }
}

export class AmbiguousSignatureError extends TdsError {
    constructor(public readonly signature: number, public readonly candidates: readonly string[]) {
        super(`Signature ${hex(signature)} is shared by ${candidates.join(', ')}; no expected shape given`);
        this.name = 'AmbiguousSignatureError';
    }
}

/**
 * A decoder was invoked on a buffer that does not start with its own tag.
 * Indicates a registry/decoder mismatch, never bad input.
 */
export class SignatureMismatchError extends TdsError {
    constructor(public readonly shapeName: string, public readonly expected: number, public readonly actual: number) {
        super(`Decoder ${shapeName} expects ${hex(expected)}, found ${hex(actual)}`);
        this.name = 'SignatureMismatchError';
    }
}

export class RegistryError extends TdsError {
    constructor(message: string) {
        super(message);
        this.name = 'RegistryError';
    }
}
