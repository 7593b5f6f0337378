import { renderDecoded } from '../src/projection/dump.js';
import { UnsupportedSignatureError } from '../src/tds/errors.js';
import { formatInline, renderRecord } from '../src/tds/render.js';
import type { DecodedRecord } from '../src/tds-types.js';

const PEER: DecodedRecord = { sname: 'peer_user', signature: 0x9db1bc6d, user_id: 42 };

describe('formatInline', () => {
    it('formats scalars', () => {
        expect(formatInline('a "b"')).toBe('"a \\"b\\""');
        expect(formatInline(5)).toBe('5');
        expect(formatInline(-5n)).toBe('-5');
        expect(formatInline(false)).toBe('false');
    });

    it('truncates long byte strings', () => {
        expect(formatInline(new Uint8Array(0))).toBe('<0 bytes>');
        expect(formatInline(new Uint8Array(40).fill(0xab))).toBe(`<40 bytes: ${'ab'.repeat(32)}...>`);
    });

    it('formats structured values', () => {
        expect(formatInline({ epoch: 60, iso: '1970-01-01T00:01:00Z' })).toBe('60 (1970-01-01T00:01:00Z)');
        expect(formatInline({ value: 5, bits: { a: true, b: false, c: true } })).toBe('0x00000005 [a c]');
        expect(formatInline({ error: 'ambiguous', offset: 0, signature: 0xc8d7493e, name: 'x | y' }))
            .toBe('<ambiguous 0xc8d7493e x | y at offset 0>');
        expect(formatInline(PEER)).toBe('peer_user (0x9db1bc6d)');
        expect(formatInline([1, PEER])).toBe('[1, peer_user (0x9db1bc6d)]');
    });
});

describe('renderRecord', () => {
    it('renders an indented tree', () => {
        const record: DecodedRecord = {
            sname: 'message_service',
            signature: 0x9e19a1f6,
            flags: { value: 256, bits: { out: false, has_from_id: true } },
            id: 5,
            date: { epoch: 0, iso: '1970-01-01T00:00:00Z' },
            action: { sname: 'message_action_chat_create', signature: 0xa6638b9a, title: 'Team', users: [42, 43] },
            raw: Uint8Array.from([1, 2]),
            empty: [],
            err: { error: 'unknown_signature', offset: 24, signature: 0xdeadbeef },
        };
        expect(renderRecord(record)).toBe([
            'message_service (0x9e19a1f6)',
            '  flags: 0x00000100 [has_from_id]',
            '  id: 5',
            '  date: 0 (1970-01-01T00:00:00Z)',
            '  action: message_action_chat_create (0xa6638b9a)',
            '    title: "Team"',
            '    users: [2]',
            '      - 42',
            '      - 43',
            '  raw: <2 bytes: 0102>',
            '  empty: []',
            '  err: <unknown_signature 0xdeadbeef at offset 24>',
        ].join('\n'));
    });
});

describe('renderDecoded', () => {
    it('marks missing, failed and partial blobs', () => {
        expect(renderDecoded(null)).toBe('<no data>');
        expect(renderDecoded({ ok: false, fatal: false, error: new UnsupportedSignatureError(0x1b7c9db3, 'chat_full') }))
            .toBe('<decode failed: UnsupportedSignatureError: Signature 0x1b7c9db3 (chat_full) is documented but not decodable>');
        expect(renderDecoded({ ok: true, value: PEER, consumed: 8, unconsumed: Uint8Array.from([1, 2]) }))
            .toBe('peer_user (0x9db1bc6d)\n  user_id: 42\n<partial: 2 unconsumed bytes>');
        expect(renderDecoded({ ok: true, value: false, consumed: 4, unconsumed: null })).toBe('false');
    });
});
