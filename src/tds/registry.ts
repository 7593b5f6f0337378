import { RegistryError } from './errors.js';
import { hex } from './format.js';
import type { Decoder } from './context.js';
import type { Shape } from './shape.js';
import type { RecordFlag } from './types.js';

/** Catalogued signature without a decoder (`decode: null`). */
export interface DocumentedSignature {
    signature: number;
    name: string;
}

export interface ShapeEntry {
    readonly kind: 'shape';
    readonly signature: number;
    readonly name: string;
    readonly decode: Decoder;
    readonly flag: RecordFlag | null;
    readonly shape: Shape;
}

export interface DocumentedEntry {
    readonly kind: 'documented';
    readonly signature: number;
    readonly name: string;
    readonly decode: null;
    readonly flag: null;
}

/**
 * One signature legitimately used by several shapes. The tag alone never
 * picks one; the calling field or the decode options must name it.
 */
export interface AmbiguousEntry {
    readonly kind: 'ambiguous';
    readonly signature: number;
    /** Candidate names joined with ` | `. */
    readonly name: string;
    readonly decode: null;
    readonly flag: null;
    readonly candidates: ReadonlyMap<string, Shape>;
}

export type RegistryEntry = ShapeEntry | DocumentedEntry | AmbiguousEntry;

/**
 * Picks the candidate of an ambiguous entry: the first `prefer` name that
 * is a candidate, else `expect` when it is one.
 */
export function resolveCandidate(entry: AmbiguousEntry, prefer: readonly string[], expect?: string): Shape | undefined {
    for (const name of prefer) {
        const preferred = entry.candidates.get(name);
        if (preferred) return preferred;
    }
    return expect === undefined ? undefined : entry.candidates.get(expect);
}

/**
 * Read-only map from signature to registry entry.
 *
 * Built once from the shape catalogue and the documented-only list, then
 * frozen. `lookup` is a single Map access and always hands back the same
 * entry object for a signature.
 */
export class SignatureRegistry {
    private readonly entries: ReadonlyMap<number, RegistryEntry>;
    private readonly byName: ReadonlyMap<string, readonly RegistryEntry[]>;

    private constructor(entries: Map<number, RegistryEntry>) {
        this.entries = entries;
        const byName = new Map<string, RegistryEntry[]>();
        for (const entry of entries.values()) {
            const names = entry.kind === 'ambiguous' ? [...entry.candidates.keys()] : [entry.name];
            for (const name of names) {
                const list = byName.get(name) ?? [];
                list.push(entry);
                byName.set(name, list);
            }
        }
        this.byName = byName;
        Object.freeze(this);
    }

    static build(shapes: readonly Shape[], documented: readonly DocumentedSignature[] = []): SignatureRegistry {
        const grouped = new Map<number, Shape[]>();
        for (const s of shapes) {
            const group = grouped.get(s.signature) ?? [];
            group.push(s);
            grouped.set(s.signature, group);
        }

        const entries = new Map<number, RegistryEntry>();
        for (const [signature, group] of grouped) {
            if (group.length === 1) {
                const [only] = group;
                entries.set(signature, Object.freeze({
                    kind: 'shape', signature, name: only.name, decode: only.decode, flag: only.flag, shape: only,
                } satisfies ShapeEntry));
                continue;
            }
            const names = group.map((s) => s.name);
            if (!group.every((s) => s.sharedSignature)) {
                throw new RegistryError(`Signature ${hex(signature)} declared by ${names.join(', ')} without sharedSignature`);
            }
            if (new Set(names).size !== names.length) {
                throw new RegistryError(`Signature ${hex(signature)} declares the name ${names.join(', ')} twice`);
            }
            entries.set(signature, Object.freeze({
                kind: 'ambiguous',
                signature,
                name: names.join(' | '),
                decode: null,
                flag: null,
                candidates: new Map(group.map((s) => [s.name, s] as const)),
            } satisfies AmbiguousEntry));
        }

        for (const doc of documented) {
            const signature = doc.signature >>> 0;
            const existing = entries.get(signature);
            if (existing) {
                throw new RegistryError(`Documented signature ${hex(signature)} (${doc.name}) collides with ${existing.name}`);
            }
            entries.set(signature, Object.freeze({
                kind: 'documented', signature, name: doc.name, decode: null, flag: null,
            } satisfies DocumentedEntry));
        }

        return new SignatureRegistry(entries);
    }

    lookup(signature: number): RegistryEntry | undefined {
        return this.entries.get(signature >>> 0);
    }

    has(signature: number): boolean {
        return this.entries.has(signature >>> 0);
    }

    /** Every entry carrying `name`, including ambiguous entries listing it. */
    findByName(name: string): readonly RegistryEntry[] {
        return this.byName.get(name) ?? [];
    }

    get size(): number {
        return this.entries.size;
    }

    signatures(): number[] {
        return [...this.entries.keys()];
    }

    values(): IterableIterator<RegistryEntry> {
        return this.entries.values();
    }
}
