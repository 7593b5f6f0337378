import {
    ChatEntry,
    DialogEntry,
    EncryptedChatEntry,
    MessageEntry,
    UserEntry,
    type EncryptedChatColumns,
} from '../src/projection/entities.js';
import {
    TIMELINE_COLUMNS,
    buildTimeline,
    chatRows,
    decodeFailure,
    decodeMarkers,
    dialogRows,
    encChatRows,
    messageMedia,
    messageRows,
    newRow,
    renderTimeline,
    sortTimeline,
    toRowString,
    userRows,
    type TimelineTables,
} from '../src/projection/timeline.js';
import { decodeBlob, type DecodeResult } from '../src/tds/decode.js';
import { UnknownSignatureError } from '../src/tds/errors.js';
import type { DecodedRecord } from '../src/tds-types.js';

function ok(record: DecodedRecord): DecodeResult {
    return { ok: true, value: record, consumed: 0, unconsumed: null };
}

function stamp(epoch: number) {
    return { epoch, iso: new Date(epoch * 1000).toISOString().replace('.000Z', 'Z') };
}

const CHANNEL = new ChatEntry(1001n, 'news', ok({
    sname: 'channel',
    signature: 0x4df30834,
    flags: { value: 0, bits: { broadcast: true, megagroup: false, left: true, has_username: true } },
    title: 'News',
    username: 'news',
    date: stamp(1_500_000_000),
}));

const OWNER = new UserEntry(42n, 'ann', 1_600_000_100, ok({
    sname: 'user',
    signature: 0x938458c1,
    flags: { value: 0, bits: { self: true, contact: false, mutual_contact: false, bot: false, has_status: false } },
    id: 42,
    first_name: 'Ann',
}));

const BROKEN_USER = new UserEntry(50n, '', 0, { ok: false, fatal: true, error: new UnknownSignatureError(0xdeadbeef) });

const MESSAGE = new MessageEntry({
    mid: 77n, uid: 43n, readState: 0, sendState: 0, date: 1_600_000_000,
    out: 1, ttl: 0, media: 0, imp: 0, mention: 0,
}, ok({
    sname: 'message',
    signature: 0x452c0e65,
    from_id: 42,
    to_id: { sname: 'peer_user', signature: 0x9db1bc6d, user_id: 43 },
    fwd_from: { sname: 'message_fwd_header', signature: 0xec338270, from_id: 99, date: stamp(1_500_000_000) },
    date: stamp(1_600_000_000),
    message: 'hello',
    media: { sname: 'message_media_geo', signature: 0x56e0d474 },
    views: 12,
}), null);

function tables(overrides: Partial<TimelineTables> = {}): TimelineTables {
    return {
        chats: new Map(),
        dialogs: new Map(),
        encChats: new Map(),
        users: new Map(),
        messages: new Map(),
        ...overrides,
    };
}

describe('timeline rows', () => {
    it('serializes a row with escaped content and extra', () => {
        const row = newRow('chats', 5);
        row.content = 'x';
        row.extra = { a: 1 };
        expect(toRowString(row)).toBe(['', 'chats', '5', '', '', '', '', '', '', '', '"x"', '', '"a:1"'].join(','));
    });

    it('renders the header line', () => {
        expect(renderTimeline([])).toBe(`${TIMELINE_COLUMNS.join(',')}\n`);
        expect(TIMELINE_COLUMNS.join(',')).toBe('timestamp,source,id,type,from,from_id,to,to_id,dialog,dialog_type,content,media,extra');
    });

    it('sorts by timestamp, stable, with undated rows last', () => {
        const make = (timestamp: string, id: number) => ({ ...newRow('t', id), timestamp });
        const sorted = sortTimeline([make('b', 1), make('', 2), make('a', 3), make('a', 4), make('', 5)]);
        expect(sorted.map((row) => row.id)).toEqual([3, 4, 1, 2, 5]);
    });

    it('describes failed blobs', () => {
        expect(decodeFailure(null)).toBe('no blob data');
        expect(decodeFailure(ok({ sname: 'x', signature: 1 }))).toBeNull();
        expect(decodeFailure({ ok: false, fatal: true, error: new UnknownSignatureError(0xdeadbeef) }))
            .toBe('UnknownSignatureError: Unknown signature 0xdeadbeef at offset 0');
    });
});

describe('partial decodes', () => {
    it('marks unconsumed bytes in extra', () => {
        const blob = decodeBlob(Uint8Array.from([0xba, 0x50, 0x02, 0x20, 1, 0, 0, 0, 1, 2, 3, 4]));
        const user = new UserEntry(1n, '', 0, blob);
        const [row] = userRows(tables({ users: new Map([[1n, user]]) }));
        expect(toRowString(row)).toBe(',users,1,,1,1,,,,,,,"partial:4"');
    });

    it('counts fields replaced by a FieldError, nested ones included', () => {
        expect(decodeMarkers(ok({
            sname: 'message',
            signature: 0x452c0e65,
            media: { error: 'unknown_signature', offset: 40, signature: 0xdeadbeef },
            entities: [
                { error: 'bool', offset: 52, signature: 7 },
                { sname: 'message_entity_bold', signature: 0xbd610bc9, offset: 0, length: 2 },
            ],
        }))).toEqual({ field_errors: 2 });
    });

    it('adds nothing for complete records, booleans and failures', () => {
        expect(decodeMarkers(ok({ sname: 'user_empty', signature: 0x200250ba, id: 1 }))).toEqual({});
        expect(decodeMarkers({ ok: true, value: true, consumed: 4, unconsumed: null })).toEqual({});
        expect(decodeMarkers({ ok: false, fatal: true, error: new UnknownSignatureError(0xdeadbeef) })).toEqual({});
        expect(decodeMarkers(null)).toEqual({});
    });

    it('appends the marker after the message extras', () => {
        const message = new MessageEntry({
            mid: 77n, uid: 43n, readState: 0, sendState: 0, date: 1_600_000_000,
            out: 0, ttl: 0, media: 0, imp: 0, mention: 0,
        }, ok({
            sname: 'message',
            signature: 0x452c0e65,
            from_id: 42,
            to_id: { sname: 'peer_user', signature: 0x9db1bc6d, user_id: 43 },
            date: stamp(1_600_000_000),
            message: 'hello',
            media: { error: 'unknown_signature', offset: 40, signature: 0xdeadbeef },
        }), null);
        const [row] = messageRows(tables({ users: new Map([[42n, OWNER]]), messages: new Map([[77n, message]]) }));
        expect(row.type).toBe('message');
        expect(row.media).toBe('');
        expect(row.extra).toEqual({ dialog: 43n, sequence: 77n, field_errors: 1 });
    });
});

describe('row sources', () => {
    it('emits a chat creation row', () => {
        const [row] = chatRows(tables({ chats: new Map([[1001n, CHANNEL]]) }));
        expect(toRowString(row)).toBe([
            '2017-07-14T02:40:00', 'chats', '1001', 'chat_creation_date', '', '', '', '',
            'news', '1-N pub left', '"channel title:News username:news left:true broadcast:true"', '', '',
        ].join(','));
    });

    it('emits a dialog update row resolved to its chat', () => {
        const dialog = new DialogEntry({
            did: -1001n, date: 1_600_000_000n, unread_count: 2n, inbox_max: 5n, outbox_max: 6n, pts: 7n, last_mid: 9n,
        });
        const [row] = dialogRows(tables({ chats: new Map([[1001n, CHANNEL]]), dialogs: new Map([[-1001n, dialog]]) }));
        expect(row).toMatchObject({
            timestamp: '2020-09-13T12:26:40',
            type: 'chat_last_update',
            dialog: 'news',
            dialogType: '1-N pub left',
            content: 'dialog unread_count:2 inbox_max:5 outbox_max:6 pts:7 last_mid:9',
        });
    });

    it('emits creation and key date rows for a secret chat', () => {
        const columns: EncryptedChatColumns = {
            uid: 5n, user: 44n, name: 'secret', g: null, authkey: null, ttl: 0, layer: 73,
            seqIn: 0, seqOut: 0, useCount: 0, exchangeId: 0n, keyDate: 1_600_000_000, fprint: 0n,
            fauthkey: null, khash: null, inSeqNo: 0, adminId: 42n, mtprotoSeq: 0,
        };
        const encChat = new EncryptedChatEntry(columns, ok({
            sname: 'encrypted_chat', signature: 0xfa56ce36, date: stamp(1_599_999_000), admin_id: 42, participant_id: 44,
        }));
        const rows = encChatRows(tables({ encChats: new Map([[5n, encChat]]), users: new Map([[42n, OWNER]]) }));
        expect(rows.map((row) => [row.timestamp, row.type])).toEqual([
            ['2020-09-13T12:10:00', 'chat_creation_date'],
            ['2020-09-13T12:26:40', 'key_date'],
        ]);
        expect(rows[0]).toMatchObject({
            from: 'Ann (owner)', fromId: 42n, to: '', toId: 44n, dialog: 'secret', dialogType: 'encrypted 1-1',
            content: 'encrypted_chat name:secret ttl:0 seq_in:0 seq_out:0',
        });
    });

    it('emits a status row per user and an error row for a broken blob', () => {
        const rows = userRows(tables({ users: new Map([[42n, OWNER], [50n, BROKEN_USER]]) }));
        expect(rows[0]).toMatchObject({
            timestamp: '2020-09-13T12:28:20',
            type: 'user_status_update',
            from: 'Ann (owner)',
            fromId: 42n,
            content: 'firstname:Ann',
        });
        expect(rows[1]).toMatchObject({
            timestamp: '',
            source: 'users',
            id: 50n,
            type: 'decode_error',
            content: 'UnknownSignatureError: Unknown signature 0xdeadbeef at offset 0',
        });
    });

    it('emits a message row with forward, views and media', () => {
        const [row] = messageRows(tables({ users: new Map([[42n, OWNER]]), messages: new Map([[77n, MESSAGE]]) }));
        expect(toRowString(row)).toBe([
            '2020-09-13T12:26:40', 'messages', '77', 'message', 'Ann (owner)', '42', '', '43', '', '1-1',
            '"hello [FORWARDED OF MSG BY 99 2017-07-14T02:40:00]"',
            '"message_media_geo"',
            '"dialog:43 sequence:77 views:12"',
        ].join(','));
    });

    it('logs messages sent to an unmanaged peer', () => {
        const error = vi.fn();
        const message = new MessageEntry({
            mid: 5n, uid: -7n, readState: 0, sendState: 0, date: 0, out: 0, ttl: 0, media: 0, imp: 0, mention: 0,
        }, ok({
            sname: 'message_service',
            signature: 0x9e19a1f6,
            to_id: { sname: 'peer_chat', signature: 0xbad0e5bb, chat_id: 7 },
            action: { sname: 'message_action_chat_edit_title', signature: 0xb5a1ce5a, title: 'New' },
        }), null);
        const [row] = messageRows(tables({ messages: new Map([[5n, message]]) }), { error });
        expect(error).toHaveBeenCalledWith('message 5, unmanaged to_id!');
        expect(row.content).toBe('message_action_chat_edit_title');
        expect(row.extra).toEqual({ dialog: 7n, sequence: 5n, title: 'New' });
        expect(row.toId).toBe('');
    });

    it('orders every source into one timeline', () => {
        const rows = buildTimeline(tables({
            chats: new Map([[1001n, CHANNEL]]),
            users: new Map([[42n, OWNER], [50n, BROKEN_USER]]),
            messages: new Map([[77n, MESSAGE]]),
        }));
        expect(rows.map((row) => `${row.source}:${row.type}`)).toEqual([
            'chats:chat_creation_date',
            'messages:message',
            'users:user_status_update',
            'users:decode_error',
        ]);
    });
});

describe('messageMedia', () => {
    const message = (media: DecodedRecord): DecodedRecord => ({ sname: 'message', signature: 0x452c0e65, media });

    it('summarizes a document', () => {
        expect(messageMedia(message({
            sname: 'message_media_document',
            signature: 0x9cb070d7,
            document: {
                sname: 'document',
                signature: 0x9ba29cc1,
                id: 555n,
                date: stamp(1_600_000_000),
                mime_type: 'application/pdf',
                size: 2048,
                attributes: [{ sname: 'document_attribute_filename', signature: 0x15590068, file_name: 'a.pdf' }],
            },
        }))).toBe('document id:555 date:2020-09-13T12:26:40 mime:application/pdf size:2048 file_name:a.pdf');
    });

    it('summarizes a photo with its located sizes', () => {
        expect(messageMedia(message({
            sname: 'message_media_photo',
            signature: 0x695150d7,
            photo: {
                sname: 'photo',
                signature: 0xd07504a5,
                id: 11n,
                date: stamp(1_600_000_000),
                sizes: [
                    {
                        sname: 'photo_size',
                        signature: 0x77bfb61b,
                        location: { sname: 'file_location_to_be_deprecated', signature: 0xbc7fc6cd, volume_id: 100n, local_id: 7 },
                        w: 90,
                        h: 60,
                        size: 1234,
                    },
                    { sname: 'photo_stripped_size', signature: 0xe0b0bc2e, bytes: Uint8Array.from([1, 2]) },
                ],
            },
        }))).toBe('photo id:11 date:2020-09-13T12:26:40 90x60(1234 bytes):100_7.jpg');
    });

    it('summarizes a web page', () => {
        expect(messageMedia(message({
            sname: 'message_media_web_page',
            signature: 0xa32dd600,
            webpage: { sname: 'web_page', signature: 0xfa64e172, id: 1n, url: 'https://example.org', title: 'Example' },
        }))).toBe('webpage id:1 url:https://example.org title:Example');
    });

    it('falls back to the media name', () => {
        expect(messageMedia(message({ sname: 'message_media_unsupported', signature: 0x9f84f49e }))).toBe('message_media_unsupported');
        expect(messageMedia({ sname: 'message', signature: 0x452c0e65 })).toBeNull();
    });
});
