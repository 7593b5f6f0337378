/**
 * Basic groups, channels, their rights records and participant lists.
 *
 * `chat_participant` and `chat_channel_participant` share 0xc8d7493e on the
 * wire. Fields that hold one ask for `chat_participant` by name.
 */
import { flag, flags, int32, int64, obj, objAs, tbool, timestamp, tstring, vector } from '../codecs.js';
import { shape, type Shape } from '../shape.js';

const CHANNEL_BITS_LAYER72 = {
    creator: 0,
    left: 2,
    broadcast: 5,
    verified: 7,
    megagroup: 8,
    restricted: 9,
    democracy: 10,
    signatures: 11,
    min: 12,
} as const;

const CHANNEL_BITS_LAYER48 = {
    creator: 0,
    kicked: 1,
    left: 2,
    editor: 3,
    moderator: 4,
    broadcast: 5,
    verified: 7,
    megagroup: 8,
    restricted: 9,
    democracy: 10,
    signatures: 11,
} as const;

const CHANNEL_BITS_LAYER67 = { ...CHANNEL_BITS_LAYER48, min: 12 } as const;

const LEGACY_CHAT_BITS = {
    creator: 0,
    kicked: 1,
    left: 2,
    admins_enabled: 3,
    admin: 4,
    deactivated: 5,
} as const;

const CHANNEL_LAYER72_FIELDS = {
    flags: flags(CHANNEL_BITS_LAYER72),
    id: int32,
    access_hash: flag(13, int64),
    title: tstring,
    username: flag(6, tstring),
    photo: obj,
    date: timestamp,
    version: int32,
    restriction_reason: flag(9, tstring),
    admin_rights: flag(14, obj),
    banned_rights: flag(15, obj),
};

const CHAT_PARTICIPANT = objAs('chat_participant');

export const CHAT_SHAPES: readonly Shape[] = [
    shape(0x9ba2d800, 'chat_empty', { id: int32 }),
    shape(0x07328bdb, 'chat_forbidden', { id: int32, title: tstring }),
    shape(0xfb0ccc41, 'chat_forbidden_old', { id: int32, title: tstring, date: timestamp }),
    shape(0x6e9c9bc7, 'chat_old', {
        id: int32,
        title: tstring,
        photo: obj,
        participants_count: int32,
        date: timestamp,
        left: tbool,
        version: int32,
    }),
    shape(0x7312bc48, 'chat_old2', {
        flags: flags(LEGACY_CHAT_BITS),
        id: int32,
        title: tstring,
        photo: obj,
        participants_count: int32,
        date: timestamp,
        version: int32,
    }),
    shape(0xd91cdd54, 'chat_layer92', {
        flags: flags(LEGACY_CHAT_BITS),
        id: int32,
        title: tstring,
        photo: obj,
        participants_count: int32,
        date: timestamp,
        version: int32,
        migrated_to: flag(6, obj),
    }),
    shape(0x3bda1bde, 'chat', {
        flags: flags({ creator: 0, kicked: 1, left: 2, deactivated: 5 }),
        id: int32,
        title: tstring,
        photo: obj,
        participants_count: int32,
        date: timestamp,
        version: int32,
        migrated_to: flag(6, obj),
        admin_rights: flag(14, obj),
        default_banned_rights: flag(18, obj),
    }),

    shape(0x4b1b7506, 'channel_layer48', {
        flags: flags(CHANNEL_BITS_LAYER48),
        id: int32,
        access_hash: int64,
        title: tstring,
        username: flag(6, tstring),
        photo: obj,
        date: timestamp,
        version: int32,
        restriction_reason: flag(9, tstring),
    }),
    shape(0xa14dca52, 'channel_layer67', {
        flags: flags(CHANNEL_BITS_LAYER67),
        id: int32,
        access_hash: flag(13, int64),
        title: tstring,
        username: flag(6, tstring),
        photo: obj,
        date: timestamp,
        version: int32,
        restriction_reason: flag(9, tstring),
    }),
    shape(0x0cb44b1c, 'channel_layer72', CHANNEL_LAYER72_FIELDS),
    shape(0x450b7115, 'channel_layer77', {
        ...CHANNEL_LAYER72_FIELDS,
        participants_count: flag(17, int32),
    }),
    shape(0x4df30834, 'channel', {
        flags: flags({
            creator: 0,
            left: 2,
            broadcast: 5,
            verified: 7,
            megagroup: 8,
            restricted: 9,
            signatures: 11,
            min: 12,
            scam: 19,
            has_link: 20,
            has_geo: 21,
            slowmode_enabled: 22,
        }),
        id: int32,
        access_hash: flag(13, int64),
        title: tstring,
        username: flag(6, tstring),
        photo: obj,
        date: timestamp,
        version: int32,
        restriction_reason: flag(9, vector(obj)),
        admin_rights: flag(14, obj),
        banned_rights: flag(15, obj),
        default_banned_rights: flag(18, obj),
        participants_count: flag(17, int32),
    }),
    shape(0x8537784f, 'channel_forbidden_layer67', {
        flags: flags({ broadcast: 5, megagroup: 8 }),
        id: int32,
        access_hash: int64,
        title: tstring,
    }),
    shape(0x289da732, 'channel_forbidden', {
        flags: flags({ broadcast: 5, megagroup: 8 }),
        id: int32,
        access_hash: int64,
        title: tstring,
        until_date: flag(16, timestamp),
    }),

    shape(0x5fb224d5, 'chat_admin_rights', {
        flags: flags({
            change_info: 0,
            post_messages: 1,
            edit_messages: 2,
            delete_messages: 3,
            ban_users: 4,
            invite_users: 5,
            pin_messages: 7,
            add_admins: 9,
        }),
    }),
    shape(0x9f120418, 'chat_banned_rights', {
        flags: flags({
            view_messages: 0,
            send_messages: 1,
            send_media: 2,
            send_stickers: 3,
            send_gifs: 4,
            send_games: 5,
            send_inline: 6,
            embed_links: 7,
            send_polls: 8,
            change_info: 10,
            invite_users: 15,
            pin_messages: 17,
        }),
        until_date: timestamp,
    }),
    shape(0x5d7ceba5, 'channel_admin_rights_layer92', {
        flags: flags({
            change_info: 0,
            post_messages: 1,
            edit_messages: 2,
            delete_messages: 3,
            ban_users: 4,
            invite_users: 5,
            invite_link: 6,
            pin_messages: 7,
            add_admins: 9,
            manage_call: 10,
        }),
    }),
    shape(0x58cf4249, 'channel_banned_rights_layer92', {
        flags: flags({
            view_messages: 0,
            send_messages: 1,
            send_media: 2,
            send_stickers: 3,
            send_gifs: 4,
            send_games: 5,
            send_inline: 6,
            embed_links: 7,
        }),
        until_date: timestamp,
    }),

    shape(0x3f460fed, 'chat_participants', {
        chat_id: int32,
        participants: vector(CHAT_PARTICIPANT),
        version: int32,
    }),
    shape(0xfc900c2b, 'chat_participants_forbidden', {
        flags: flags(),
        chat_id: int32,
        self_participant: flag(0, CHAT_PARTICIPANT),
    }),
    shape(0xc8d7493e, 'chat_participant', {
        user_id: int32,
        inviter_id: int32,
        date: timestamp,
    }, { sharedSignature: true }),
    shape(0xc8d7493e, 'chat_channel_participant', {
        channel_participant: obj,
    }, { sharedSignature: true }),
    shape(0xda13538a, 'chat_participant_creator', { user_id: int32 }),
    shape(0xe2d6e436, 'chat_participant_admin', {
        user_id: int32,
        inviter_id: int32,
        date: timestamp,
    }),

    shape(0x15ebac1d, 'channel_participant', { user_id: int32, date: timestamp }),
    shape(0xa3289a6d, 'channel_participant_self', {
        user_id: int32,
        inviter_id: int32,
        date: timestamp,
    }),
    shape(0xe3e2e1f9, 'channel_participant_creator_layer103', { user_id: int32 }),
    shape(0x808d15a4, 'channel_participant_creator', {
        flags: flags(),
        user_id: int32,
        rank: flag(0, tstring),
    }),
    shape(0xccbebbaf, 'channel_participant_admin', {
        flags: flags({ can_edit: 0, self: 1 }),
        user_id: int32,
        inviter_id: flag(1, int32),
        promoted_by: int32,
        date: timestamp,
        admin_rights: obj,
        rank: flag(2, tstring),
    }),
    shape(0x1c0facaf, 'channel_participant_banned', {
        flags: flags({ left: 0 }),
        user_id: int32,
        kicked_by: int32,
        date: timestamp,
        banned_rights: obj,
    }),
];
