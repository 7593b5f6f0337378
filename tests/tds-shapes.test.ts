/**
 * Shape catalogue tests: one realistic record per family, built byte by
 * byte and decoded through the default registry.
 */
import { decodeBlob, recordOf } from '../src/tds/decode.js';
import { TAIL_FIELD } from '../src/tds/shape.js';
import { ALL_SHAPES, deriveFromId } from '../src/tds/shapes/index.js';
import type { DecodedRecord } from '../src/tds-types.js';
import { TdsWriter, tds } from './helpers/tds-writer.js';

const EPOCH = 1_600_000_000;
const ISO = '2020-09-13T12:26:40Z';

function decodeAll(bytes: Uint8Array): DecodedRecord {
    const result = decodeBlob(bytes);
    if (!result.ok) throw new Error(`decode failed: ${result.error.message}`);
    expect(result.consumed).toBe(bytes.length);
    expect(result.unconsumed).toBeNull();
    const record = recordOf(result);
    if (!record) throw new Error('decoded to a boolean');
    return record;
}

function fileLocation(w: TdsWriter, volume: bigint, local: number): TdsWriter {
    return w.sig(0xbc7fc6cd).int64(volume).int32(local);
}

describe('shape catalogue', () => {
    it('uses each signature once, apart from the shared participant tag', () => {
        const counts = new Map<number, number>();
        for (const s of ALL_SHAPES) counts.set(s.signature, (counts.get(s.signature) ?? 0) + 1);
        const shared = [...counts].filter(([, n]) => n > 1).map(([sig]) => sig);
        expect(shared).toEqual([0xc8d7493e]);
    });

    it('uses each name once', () => {
        const names = ALL_SHAPES.map((s) => s.name);
        expect(new Set(names).size).toBe(names.length);
    });

    describe('users', () => {
        it('decodes a user with photo and status', () => {
            const w = tds().sig(0x938458c1).uint32(1 | 2 | 8 | 32 | 64 | 1024)
                .int32(42).int64(7n).tstring('Ann').tstring('ann_s')
                .sig(0xecd75d8c).int64(9n);
            fileLocation(w, 100n, 5);
            fileLocation(w, 100n, 6);
            w.int32(2).sig(0x008c703f).uint32(EPOCH);

            const user = decodeAll(w.build());
            expect(user).toMatchObject({
                sname: 'user',
                id: 42,
                access_hash: 7n,
                first_name: 'Ann',
                username: 'ann_s',
                photo: {
                    sname: 'user_profile_photo',
                    photo_id: 9n,
                    photo_small: { sname: 'file_location_to_be_deprecated', volume_id: 100n, local_id: 5 },
                    photo_big: { local_id: 6 },
                    dc_id: 2,
                },
                status: { sname: 'user_status_offline', was_online: { epoch: EPOCH, iso: ISO } },
                flags: { value: 1131, bits: { self: true, contact: false, has_photo: true, has_last_name: false } },
            });
            expect('last_name' in user).toBe(false);
            expect('phone' in user).toBe(false);
        });

        it('decodes user_empty and the status variants', () => {
            expect(decodeAll(tds().sig(0x200250ba).int32(3).build()).id).toBe(3);
            expect(decodeAll(tds().sig(0xe26f42f1).build()).sname).toBe('user_status_recently');
        });
    });

    describe('chats and channels', () => {
        it('decodes a basic group', () => {
            const bytes = tds().sig(0x3bda1bde).uint32(0).int32(7).tstring('Team')
                .sig(0x37c1011c).int32(3).uint32(1_400_000_000).int32(1).build();
            expect(decodeAll(bytes)).toMatchObject({
                sname: 'chat',
                id: 7,
                title: 'Team',
                photo: { sname: 'chat_photo_empty' },
                participants_count: 3,
                date: { epoch: 1_400_000_000 },
                version: 1,
            });
        });

        it('decodes a public broadcast channel', () => {
            const bytes = tds().sig(0x4df30834).uint32(32 | 64 | 8192 | 131072)
                .int32(1001).int64(5n).tstring('News').tstring('news')
                .sig(0x37c1011c).uint32(1_500_000_000).int32(0).int32(250).build();
            const channel = decodeAll(bytes);
            expect(channel).toMatchObject({
                sname: 'channel',
                id: 1001,
                access_hash: 5n,
                title: 'News',
                username: 'news',
                participants_count: 250,
                flags: { value: 139360, bits: { broadcast: true, megagroup: false, has_username: true } },
            });
            expect('admin_rights' in channel).toBe(false);
        });

        it('decodes a legacy chat with a boolean field', () => {
            const bytes = tds().sig(0x6e9c9bc7).int32(4).tstring('Old').sig(0x37c1011c)
                .int32(2).uint32(0).bool(true).int32(1).build();
            expect(decodeAll(bytes)).toMatchObject({ sname: 'chat_old', left: true, version: 1 });
        });
    });

    describe('messages', () => {
        it('decodes a forwarded document message with entities and views', () => {
            const bytes = tds().sig(0x452c0e65).uint32(4 | 128 | 256 | 512 | 1024)
                .int32(77).int32(42)
                .sig(0x9db1bc6d).int32(43)
                .sig(0xec338270).uint32(1).int32(99).uint32(1_500_000_000)
                .uint32(EPOCH).tstring('see file')
                .sig(0x9cb070d7).uint32(1)
                .sig(0x9ba29cc1).uint32(0).int64(555n).int64(1n).tbytes(new Uint8Array(0)).uint32(EPOCH)
                .tstring('application/pdf').int32(2048).int32(4)
                .vector(1).sig(0x15590068).tstring('a.pdf')
                .vector(1).sig(0xbd610bc9).int32(0).int32(3)
                .int32(12)
                .build();

            const message = decodeAll(bytes);
            expect(message).toMatchObject({
                sname: 'message',
                id: 77,
                from_id: 42,
                to_id: { sname: 'peer_user', user_id: 43 },
                fwd_from: { sname: 'message_fwd_header', from_id: 99, date: { epoch: 1_500_000_000 } },
                date: { epoch: EPOCH, iso: ISO },
                message: 'see file',
                media: {
                    sname: 'message_media_document',
                    document: {
                        sname: 'document',
                        id: 555n,
                        mime_type: 'application/pdf',
                        size: 2048,
                        dc_id: 4,
                        attributes: [{ sname: 'document_attribute_filename', file_name: 'a.pdf' }],
                    },
                },
                entities: [{ sname: 'message_entity_bold', offset: 0, length: 3 }],
                views: 12,
            });
            expect(message[TAIL_FIELD]).toEqual(new Uint8Array(0));
            expect('reply_to_msg_id' in message).toBe(false);
        });

        it('decodes a secret chat message and keeps the local tail', () => {
            const bytes = tds().sig(0x555555fa).uint32(2 | 8)
                .int32(9).int32(30).int32(42)
                .sig(0x9db1bc6d).int32(43)
                .uint32(EPOCH).tstring('psst')
                .sig(0x3ded6320)
                .vector(1).sig(0x826f8b60).int32(0).int32(4)
                .int64(123n)
                .tstring('x')
                .build();

            const message = decodeAll(bytes);
            expect(message).toMatchObject({
                sname: 'message_secret',
                flags: { value: 10, bits: { out: true, unread: false, has_reply_to_random_id: true, has_grouped_id: false } },
                id: 9,
                ttl: 30,
                from_id: 42,
                to_id: { sname: 'peer_user', user_id: 43 },
                date: { epoch: EPOCH, iso: ISO },
                message: 'psst',
                media: { sname: 'message_media_empty' },
                entities: [{ sname: 'message_entity_italic', offset: 0, length: 4 }],
                reply_to_random_id: 123n,
            });
            expect('via_bot_name' in message).toBe(false);
            expect(message[TAIL_FIELD]).toEqual(Uint8Array.from([1, 0x78, 0, 0]));
        });

        it('decodes the oldest secret message layout without entities', () => {
            const bytes = tds().sig(0x555555f8).uint32(0)
                .int32(-3).int32(0).int32(42)
                .sig(0x9db1bc6d).int32(43)
                .uint32(EPOCH).tstring('')
                .sig(0x3ded6320)
                .build();
            const message = decodeAll(bytes);
            expect(message).toMatchObject({ sname: 'message_secret_old', id: -3, ttl: 0, message: '' });
            expect('entities' in message).toBe(false);
            expect(message[TAIL_FIELD]).toEqual(new Uint8Array(0));
        });

        it('decodes a service message with a chat creation action', () => {
            const bytes = tds().sig(0x9e19a1f6).uint32(256).int32(5).int32(42)
                .sig(0xbad0e5bb).int32(7).uint32(EPOCH)
                .sig(0xa6638b9a).tstring('Team').vector(2).int32(42).int32(43)
                .build();
            expect(decodeAll(bytes)).toMatchObject({
                sname: 'message_service',
                from_id: 42,
                to_id: { sname: 'peer_chat', chat_id: 7 },
                action: { sname: 'message_action_chat_create', title: 'Team', users: [42, 43] },
            });
        });

        it('derives from_id from the recipient when it is absent', () => {
            const base = { sname: 'message', signature: 0x452c0e65 };
            expect(deriveFromId({ ...base, to_id: { sname: 'peer_user', signature: 0x9db1bc6d, user_id: 8 } }))
                .toEqual({ from_id: 8 });
            expect(deriveFromId({ ...base, to_id: { sname: 'peer_channel', signature: 0xbddde532, channel_id: 9 } }))
                .toEqual({ from_id: -9 });
            expect(deriveFromId({ ...base, to_id: { sname: 'peer_chat', signature: 0xbad0e5bb, chat_id: 9 } }))
                .toBeNull();
            expect(deriveFromId({ ...base, from_id: 1 })).toBeNull();
        });
    });

    describe('media', () => {
        it('decodes a photo with its sizes', () => {
            const w = tds().sig(0xd07504a5).uint32(0).int64(11n).int64(12n).tbytes(new Uint8Array(0)).uint32(EPOCH)
                .vector(2).sig(0x77bfb61b).tstring('s');
            fileLocation(w, 100n, 7);
            w.int32(90).int32(60).int32(1234)
                .sig(0xe0b0bc2e).tstring('i').tbytes(Uint8Array.from([1, 2]))
                .int32(2);

            expect(decodeAll(w.build())).toMatchObject({
                sname: 'photo',
                id: 11n,
                sizes: [
                    { sname: 'photo_size', type: 's', location: { volume_id: 100n, local_id: 7 }, w: 90, h: 60, size: 1234 },
                    { sname: 'photo_stripped_size', type: 'i', bytes: Uint8Array.from([1, 2]) },
                ],
                dc_id: 2,
            });
        });

        it('decodes a geo point of doubles', () => {
            const bytes = tds().sig(0x0296f104).double(12.5).double(41.75).int64(3n).build();
            expect(decodeAll(bytes)).toMatchObject({ sname: 'geo_point', long: 12.5, lat: 41.75, access_hash: 3n });
        });

        it('decodes a pending web page inside its media wrapper', () => {
            const bytes = tds().sig(0xa32dd600).sig(0xc586da1c).int64(1n).uint32(0).build();
            expect(decodeAll(bytes)).toMatchObject({
                sname: 'message_media_web_page',
                webpage: { sname: 'web_page_pending', id: 1n, date: { epoch: 0 } },
            });
        });
    });

    describe('markup', () => {
        it('decodes an inline keyboard', () => {
            const bytes = tds().sig(0x48a30254).vector(1)
                .sig(0x77608b83).vector(2)
                .sig(0x258aff05).tstring('Open').tstring('https://example.org')
                .sig(0x683a5e46).tstring('Ok').tbytes(Uint8Array.from([1]))
                .build();
            expect(decodeAll(bytes)).toMatchObject({
                sname: 'reply_inline_markup',
                rows: [{
                    sname: 'keyboard_button_row',
                    buttons: [
                        { sname: 'keyboard_button_url', text: 'Open', url: 'https://example.org' },
                        { sname: 'keyboard_button_callback', text: 'Ok', data: Uint8Array.from([1]) },
                    ],
                }],
            });
        });
    });

    describe('secret chats', () => {
        it('decodes a requested chat with its folder id', () => {
            const bytes = tds().sig(0x62718a82).uint32(1).int32(3)
                .int32(5).int64(6n).uint32(EPOCH).int32(42).int32(43).tbytes(Uint8Array.from([1, 2, 3]))
                .build();
            expect(decodeAll(bytes)).toMatchObject({
                sname: 'encrypted_chat_requested',
                flags: { value: 1, bits: { has_folder_id: true } },
                folder_id: 3,
                id: 5,
                admin_id: 42,
                participant_id: 43,
                g_a: Uint8Array.from([1, 2, 3]),
            });
        });

        it('decodes an established chat', () => {
            const bytes = tds().sig(0xfa56ce36).int32(5).int64(6n).uint32(EPOCH).int32(42).int32(43)
                .tbytes(new Uint8Array(0)).int64(-1n).build();
            expect(decodeAll(bytes)).toMatchObject({ sname: 'encrypted_chat', key_fingerprint: -1n });
        });
    });
});
