export type TdsLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type DecoderOptions = {
    /** Optional logger hook; decoding is silent without one. */
    logger?: TdsLogger | null;
    /** Maximum nesting of tag-dispatched records (default 64). */
    maxDepth?: number;
    /** Maximum element count accepted for a single vector (default 1,000,000). */
    maxVectorLength?: number;
    /**
     * Shape names to pick when a signature is shared by several shapes.
     * Takes precedence over the shape expected by the calling field.
     */
    prefer?: readonly string[];
};

export type ResolvedDecoderOptions = Required<DecoderOptions>;

/**
 * Post-processing flag carried by registry entries.
 * - `tail`: the shape captures undecoded trailing bytes in `unparsed`.
 */
export type RecordFlag = 'tail';
