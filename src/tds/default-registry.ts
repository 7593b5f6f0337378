import documented from './documented-signatures.json' with { type: 'json' };
import { RegistryError } from './errors.js';
import { SignatureRegistry, type DocumentedSignature } from './registry.js';
import { ALL_SHAPES } from './shapes/index.js';

/** Validates the JSON catalogue and turns its hex tags into numbers. */
export function parseDocumented(entries: readonly { signature: string; name: string }[]): DocumentedSignature[] {
    return entries.map(({ signature, name }) => {
        const value = Number.parseInt(signature, 16);
        if (!/^0x[0-9a-f]{8}$/i.test(signature) || Number.isNaN(value)) {
            throw new RegistryError(`Documented signature for ${name} is not an 8-digit hex tag: ${signature}`);
        }
        return { signature: value, name };
    });
}

/** Every shape plus the documented-only catalogue. */
export const REGISTRY: SignatureRegistry = SignatureRegistry.build(ALL_SHAPES, parseDocumented(documented));
