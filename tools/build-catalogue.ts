/**
 * CLI: Signature Catalogue Builder
 *
 * Usage:  tsx tools/build-catalogue.ts <TLRPC.java> [--out path]
 *
 * Scans the client's TLRPC class file for `constructor = <value>;` lines and
 * adds every tag no shape decodes to the documented-only catalogue.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isMainModule } from '../src/entry.js';
import { parseDocumented } from '../src/tds/default-registry.js';
import { hex } from '../src/tds/format.js';
import type { DocumentedSignature } from '../src/tds/registry.js';
import { ALL_SHAPES } from '../src/tds/shapes/index.js';

export const DEFAULT_CATALOGUE = fileURLToPath(new URL('../src/tds/documented-signatures.json', import.meta.url));

export interface FoundConstructor extends DocumentedSignature {
    /** The literal as written in the class file. */
    literal: string;
    line: number;
}

/** `TL_messageMediaDocument_layer68` -> `message_media_document_layer68` */
export function constructorName(className: string): string {
    return className.replace('TL_', '').replace(/([A-Z])/g, '_$1').toLowerCase();
}

/**
 * Every constructor tag with the class declared on the line before it.
 * Decimal and `0x` literals are accepted; tags are returned unsigned.
 */
export function extractConstructors(source: string): FoundConstructor[] {
    const found: FoundConstructor[] = [];
    const lines = source.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const match = /constructor = ([^;]+);/.exec(lines[i]);
        if (!match) continue;
        const literal = match[1].trim();
        const value = /^-?0x[0-9a-f]+$/i.test(literal) ? Number.parseInt(literal, 16) : Number(literal);
        if (!Number.isInteger(value)) {
            throw new Error(`Line ${i + 1}: constructor value ${literal} is not an integer`);
        }
        const cls = i > 0 ? /class ([^ ]+) /.exec(lines[i - 1]) : null;
        if (!cls) {
            throw new Error(`Line ${i + 1}: constructor does not follow a class declaration`);
        }
        found.push({ signature: value >>> 0, name: constructorName(cls[1]), literal, line: i + 1 });
    }
    return found;
}

/**
 * Existing entries first, then each found tag that is neither decoded nor
 * already catalogued, in source order.
 */
export function mergeCatalogue(
    existing: readonly DocumentedSignature[],
    found: readonly DocumentedSignature[],
    decoded: ReadonlySet<number>,
): DocumentedSignature[] {
    const merged = existing.map(({ signature, name }) => ({ signature, name }));
    const known = new Set(merged.map((e) => e.signature));
    for (const { signature, name } of found) {
        if (decoded.has(signature) || known.has(signature)) continue;
        known.add(signature);
        merged.push({ signature, name });
    }
    return merged;
}

export function formatCatalogue(entries: readonly DocumentedSignature[]): string {
    const lines = entries.map(({ signature, name }) =>
        `    { "signature": ${JSON.stringify(hex(signature))}, "name": ${JSON.stringify(name)} }`);
    return `[\n${lines.join(',\n')}\n]\n`;
}

export function readCatalogue(text: string): DocumentedSignature[] {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
        throw new Error('Catalogue is not a JSON array');
    }
    const entries: { signature: string; name: string }[] = [];
    for (const item of parsed) {
        if (typeof item !== 'object' || item === null
            || !('signature' in item) || typeof item.signature !== 'string'
            || !('name' in item) || typeof item.name !== 'string') {
            throw new Error(`Catalogue entry ${JSON.stringify(item)} needs a string signature and name`);
        }
        entries.push({ signature: item.signature, name: item.name });
    }
    return parseDocumented(entries);
}

// --- Main ---
function main(argv: readonly string[]): void {
    const outIdx = argv.indexOf('--out');
    const out = outIdx !== -1 && argv[outIdx + 1] ? argv[outIdx + 1] : DEFAULT_CATALOGUE;
    const input = argv.find((arg, i) => !arg.startsWith('--') && (outIdx === -1 || i !== outIdx + 1));
    if (!input) {
        throw new Error('usage: tsx tools/build-catalogue.ts <TLRPC.java> [--out path]');
    }

    const found = extractConstructors(fs.readFileSync(input, 'utf8'));
    const existing = fs.existsSync(out) ? readCatalogue(fs.readFileSync(out, 'utf8')) : [];
    const decoded = new Set(ALL_SHAPES.map((s) => s.signature));
    const merged = mergeCatalogue(existing, found, decoded);
    fs.writeFileSync(out, formatCatalogue(merged), 'utf8');

    console.log(`Constructors found: ${found.length}`);
    console.log(`Already decoded:    ${found.filter((f) => decoded.has(f.signature)).length}`);
    console.log(`Catalogue entries:  ${existing.length} -> ${merged.length}`);
    console.log(`Written to ${out}`);
}

if (isMainModule(import.meta.url)) {
    try {
        main(process.argv.slice(2));
    } catch (err: unknown) {
        console.error(err instanceof Error ? err.stack ?? err.message : String(err));
        process.exit(1);
    }
}
