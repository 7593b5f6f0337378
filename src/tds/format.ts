export const VECTOR_MARKER = 0x1cb5c415;

export const BOOL_TRUE = 0x997275b5;
export const BOOL_FALSE = 0xbc799737;

export const SIGNATURE_SIZE = 4;

// Length-prefixed values: a first byte below LONG_LENGTH_MARKER is the length
// itself, otherwise the length sits in the upper 24 bits of a u32.
export const LONG_LENGTH_MARKER = 254;
export const SHORT_PREFIX_SIZE = 1;
export const LONG_PREFIX_SIZE = 4;

/** Every vector element occupies at least one word on the wire. */
export const MIN_ELEMENT_SIZE = 4;

export const DEFAULT_MAX_DEPTH = 64;
export const DEFAULT_MAX_VECTOR_LENGTH = 1_000_000;

/** Zero padding after a length-prefixed payload of `length` bytes. */
export function paddingFor(length: number): number {
    if (length >= LONG_LENGTH_MARKER) {
        return (4 - (length % 4)) % 4;
    }
    return (4 - ((SHORT_PREFIX_SIZE + length) % 4)) % 4;
}

export function hex(signature: number): string {
    return '0x' + (signature >>> 0).toString(16).padStart(8, '0');
}

export function hexBytes(data: Uint8Array): string {
    return Array.from(data, (b) => b.toString(16).padStart(2, '0')).join('');
}

/** UTC ISO-8601 without milliseconds. */
export function toIsoDate(epoch: number): string {
    return new Date(epoch * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}
