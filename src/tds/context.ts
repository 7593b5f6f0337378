import type { SignatureRegistry } from './registry.js';
import type { TdsReader } from './reader.js';
import type { ResolvedDecoderOptions, TdsLogger } from './types.js';
import type { DecodedRecord, FieldValue } from '../tds-types.js';

/**
 * Per-call decode state. Created fresh for every top-level decode, so
 * concurrent decodes never share anything but the frozen registry.
 */
export interface DecodeContext {
    readonly registry: SignatureRegistry;
    readonly options: ResolvedDecoderOptions;
    /** 1 while decoding the top-level record, +1 per nested dispatch. */
    depth: number;
}

export type Codec<T extends FieldValue> = (reader: TdsReader, ctx: DecodeContext) => T;

export type Decoder = Codec<DecodedRecord>;

export function logOf(ctx: DecodeContext): TdsLogger | null {
    return ctx.options.logger;
}
