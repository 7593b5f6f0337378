/**
 * Secret chat records from `enc_chats.data`. `admin_id` is the user that
 * started the chat; `participant_id` the one that accepted it.
 */
import { flag, flags, int32, int64, tbytes, timestamp } from '../codecs.js';
import { shape, type Shape, type FieldMap } from '../shape.js';

const ENC_CHAT_HEAD: FieldMap = {
    id: int32,
    access_hash: int64,
    date: timestamp,
    admin_id: int32,
    participant_id: int32,
};

export const ENCRYPTED_SHAPES: readonly Shape[] = [
    shape(0xab7ec0a0, 'encrypted_chat_empty', { id: int32 }),
    shape(0x3bf703dc, 'encrypted_chat_waiting', ENC_CHAT_HEAD),
    shape(0xc878527e, 'encrypted_chat_requested_layer115', { ...ENC_CHAT_HEAD, g_a: tbytes }),
    shape(0x62718a82, 'encrypted_chat_requested', {
        flags: flags(),
        folder_id: flag(0, int32),
        ...ENC_CHAT_HEAD,
        g_a: tbytes,
    }),
    shape(0xfa56ce36, 'encrypted_chat', {
        ...ENC_CHAT_HEAD,
        g_a_or_b: tbytes,
        key_fingerprint: int64,
    }),
    shape(0x13d6dd27, 'encrypted_chat_discarded', { id: int32 }),
];
