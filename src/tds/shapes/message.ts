/**
 * Messages, service messages and forward headers.
 *
 * Message shapes keep trailing bytes in `unparsed`: the client appends its
 * own local fields after the server-defined ones.
 */
import { flag, flags, int32, int64, obj, timestamp, tstring, vector } from '../codecs.js';
import { shape, type Shape, type ShapeOptions } from '../shape.js';
import { isDecodedRecord, type DecodedRecord, type FieldValue } from '../../tds-types.js';

/**
 * Sender of a message stored without `from_id`: the peer user of a private
 * chat, or the negated channel id of a channel post.
 */
export function deriveFromId(record: DecodedRecord): Readonly<Record<string, FieldValue>> | null {
    if (record.from_id !== undefined) return null;
    const peer = record.to_id;
    if (!isDecodedRecord(peer)) return null;
    if (peer.sname === 'peer_user' && typeof peer.user_id === 'number') {
        return { from_id: peer.user_id };
    }
    if (peer.sname === 'peer_channel' && typeof peer.channel_id === 'number') {
        return { from_id: -peer.channel_id };
    }
    return null;
}

const MESSAGE_OPTIONS: ShapeOptions = { tail: true, derive: deriveFromId };

const MESSAGE_BITS_LAYER104 = {
    out: 1,
    mentioned: 4,
    media_unread: 5,
    silent: 13,
    post: 14,
} as const;

const MESSAGE_HEAD = {
    id: int32,
    from_id: flag(8, int32),
    to_id: obj,
    fwd_from: flag(2, obj),
    via_bot_id: flag(11, int32),
    reply_to_msg_id: flag(3, int32),
    date: timestamp,
    message: tstring,
    media: flag(9, obj),
    reply_markup: flag(6, obj),
    entities: flag(7, vector(obj)),
    views: flag(10, int32),
    edit_date: flag(15, timestamp),
};

const MESSAGE_BITS_SECRET = {
    unread: 0,
    out: 1,
    mentioned: 4,
    media_unread: 5,
} as const;

/** `ttl` is the self-destruct timer; `from_id` is always stored. */
const MESSAGE_SECRET_HEAD = {
    id: int32,
    ttl: int32,
    from_id: int32,
    to_id: obj,
    date: timestamp,
    message: tstring,
    media: obj,
};

export const MESSAGE_SHAPES: readonly Shape[] = [
    shape(0x83e5de54, 'message_empty', { id: int32 }),
    shape(0x452c0e65, 'message', {
        flags: flags({
            ...MESSAGE_BITS_LAYER104,
            from_scheduled: 18,
            legacy: 19,
            edit_hide: 21,
        }),
        ...MESSAGE_HEAD,
        post_author: flag(16, tstring),
        grouped_id: flag(17, int64),
        restriction_reason: flag(22, vector(obj)),
    }, MESSAGE_OPTIONS),
    shape(0x44f9b43d, 'message_layer104', {
        flags: flags(MESSAGE_BITS_LAYER104),
        ...MESSAGE_HEAD,
        post_author: flag(16, tstring),
        grouped_id: flag(17, int64),
    }, MESSAGE_OPTIONS),
    shape(0x90dddc11, 'message_layer72', {
        flags: flags(MESSAGE_BITS_LAYER104),
        ...MESSAGE_HEAD,
        post_author: flag(16, tstring),
    }, MESSAGE_OPTIONS),
    shape(0xc09be45f, 'message_layer68', {
        flags: flags(MESSAGE_BITS_LAYER104),
        ...MESSAGE_HEAD,
    }, MESSAGE_OPTIONS),

    // Client-local records for secret chat messages.
    shape(0x555555fa, 'message_secret', {
        flags: flags(MESSAGE_BITS_SECRET),
        ...MESSAGE_SECRET_HEAD,
        entities: vector(obj),
        via_bot_name: flag(11, tstring),
        reply_to_random_id: flag(3, int64),
        grouped_id: flag(17, int64),
    }, MESSAGE_OPTIONS),
    shape(0x555555f9, 'message_secret_layer72', {
        flags: flags(MESSAGE_BITS_SECRET),
        ...MESSAGE_SECRET_HEAD,
        entities: vector(obj),
        via_bot_name: flag(11, tstring),
        reply_to_random_id: flag(3, int64),
    }, MESSAGE_OPTIONS),
    shape(0x555555f8, 'message_secret_old', {
        flags: flags(MESSAGE_BITS_SECRET),
        ...MESSAGE_SECRET_HEAD,
    }, MESSAGE_OPTIONS),

    shape(0x9e19a1f6, 'message_service', {
        flags: flags({ ...MESSAGE_BITS_LAYER104, legacy: 19 }),
        id: int32,
        from_id: flag(8, int32),
        to_id: obj,
        reply_to_msg_id: flag(3, int32),
        date: timestamp,
        action: obj,
    }, MESSAGE_OPTIONS),
    shape(0xc06b9607, 'message_service_layer48', {
        flags: flags(MESSAGE_BITS_LAYER104),
        id: int32,
        from_id: flag(8, int32),
        to_id: obj,
        date: timestamp,
        action: obj,
    }, MESSAGE_OPTIONS),

    shape(0xec338270, 'message_fwd_header', {
        flags: flags(),
        from_id: flag(0, int32),
        from_name: flag(5, tstring),
        date: timestamp,
        channel_id: flag(1, int32),
        channel_post: flag(2, int32),
        post_author: flag(3, tstring),
        saved_from_peer: flag(4, obj),
        saved_from_msg_id: flag(4, int32),
    }),
    shape(0x559ebe6d, 'message_fwd_header_layer72', {
        flags: flags(),
        from_id: flag(0, int32),
        date: timestamp,
        channel_id: flag(1, int32),
        channel_post: flag(2, int32),
        post_author: flag(3, tstring),
        saved_from_peer: flag(4, obj),
        saved_from_msg_id: flag(4, int32),
    }),
    shape(0xfadff4ac, 'message_fwd_header_layer68', {
        flags: flags(),
        from_id: flag(0, int32),
        date: timestamp,
        channel_id: flag(1, int32),
        channel_post: flag(2, int32),
        post_author: flag(3, tstring),
    }),
    shape(0xc786ddcb, 'message_fwd_header_layer67', {
        flags: flags(),
        from_id: flag(0, int32),
        date: timestamp,
        channel_id: flag(1, int32),
        channel_post: flag(2, int32),
    }),
];
