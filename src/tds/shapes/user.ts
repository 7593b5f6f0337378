/**
 * Users, user statuses and the UserFull record kept in `user_settings`.
 */
import { flag, flags, int32, int64, obj, tbool, timestamp, tstring, vector } from '../codecs.js';
import { shape, type Shape } from '../shape.js';

const USER_BITS_LAYER65 = {
    self: 10,
    contact: 11,
    mutual_contact: 12,
    deleted: 13,
    bot: 14,
    bot_chat_history: 15,
    bot_nochats: 16,
    verified: 17,
    restricted: 18,
    min: 20,
    bot_inline_geo: 21,
} as const;

const USER_BITS = { ...USER_BITS_LAYER65, support: 23, scam: 24 } as const;

const USER_HEAD = {
    access_hash: flag(0, int64),
    first_name: flag(1, tstring),
    last_name: flag(2, tstring),
    username: flag(3, tstring),
    phone: flag(4, tstring),
    photo: flag(5, obj),
    status: flag(6, obj),
    bot_info_version: flag(14, int32),
};

export const USER_SHAPES: readonly Shape[] = [
    shape(0x09d05049, 'user_status_empty', {}),
    shape(0xedb93949, 'user_status_online', { expires: timestamp }),
    shape(0x008c703f, 'user_status_offline', { was_online: timestamp }),
    shape(0xe26f42f1, 'user_status_recently', {}),
    shape(0x07bf09fc, 'user_status_last_week', {}),
    shape(0x77ebc742, 'user_status_last_month', {}),

    shape(0x200250ba, 'user_empty', { id: int32 }),
    shape(0xd10d979a, 'user_layer65', {
        flags: flags(USER_BITS_LAYER65),
        id: int32,
        ...USER_HEAD,
        restriction_reason: flag(18, tstring),
        bot_inline_placeholder: flag(19, tstring),
    }),
    shape(0x2e13f4c3, 'user_layer104', {
        flags: flags(USER_BITS),
        id: int32,
        ...USER_HEAD,
        restriction_reason: flag(18, tstring),
        bot_inline_placeholder: flag(19, tstring),
        lang_code: flag(22, tstring),
    }),
    shape(0x938458c1, 'user', {
        flags: flags(USER_BITS),
        id: int32,
        ...USER_HEAD,
        restriction_reason: flag(18, vector(obj)),
        bot_inline_placeholder: flag(19, tstring),
        lang_code: flag(22, tstring),
    }),
    shape(0xd072acb4, 'restriction_reason', {
        platform: tstring,
        reason: tstring,
        text: tstring,
    }),

    shape(0xedf17c12, 'user_full', {
        flags: flags({
            blocked: 0,
            phone_calls_available: 4,
            phone_calls_private: 5,
            can_pin_message: 7,
            has_scheduled: 12,
        }),
        user: obj,
        about: flag(1, tstring),
        settings: obj,
        profile_photo: flag(2, obj),
        notify_settings: obj,
        bot_info: flag(3, obj),
        pinned_msg_id: flag(6, int32),
        common_chats_count: int32,
        folder_id: flag(11, int32),
    }),
    shape(0x8ea4a881, 'user_full_layer98', {
        flags: flags({
            blocked: 0,
            phone_calls_available: 4,
            phone_calls_private: 5,
            can_pin_message: 7,
        }),
        user: obj,
        about: flag(1, tstring),
        link: obj,
        profile_photo: flag(2, obj),
        notify_settings: obj,
        bot_info: flag(3, obj),
        pinned_msg_id: flag(6, int32),
        common_chats_count: int32,
    }),

    shape(0x3ace484c, 'contacts_link', {
        my_link: obj,
        foreign_link: obj,
        user: obj,
    }),
    shape(0x5f4f9247, 'contact_link_unknown', {}),
    shape(0xfeedd3ad, 'contact_link_none', {}),
    shape(0x268f3f59, 'contact_link_has_phone', {}),
    shape(0xd502c2d0, 'contact_link_contact', {}),

    shape(0x818426cd, 'peer_settings', {
        flags: flags({
            report_spam: 0,
            add_contact: 1,
            block_contact: 2,
            share_contact: 3,
            need_contacts_exception: 4,
            report_geo: 5,
        }),
    }),
    shape(0xaf509d20, 'peer_notify_settings', {
        flags: flags(),
        show_previews: flag(0, tbool),
        silent: flag(1, tbool),
        mute_until: flag(2, timestamp),
        sound: flag(3, tstring),
    }),
    shape(0x9acda4c0, 'peer_notify_settings_layer77', {
        flags: flags({ show_previews: 0, silent: 1 }),
        mute_until: timestamp,
        sound: tstring,
    }),
    shape(0x70a68512, 'peer_notify_settings_empty_layer77', {}),

    shape(0x98e81d3a, 'bot_info', {
        user_id: int32,
        description: tstring,
        commands: vector(obj),
    }),
    shape(0xc27ac8c7, 'bot_command', {
        command: tstring,
        description: tstring,
    }),
];
