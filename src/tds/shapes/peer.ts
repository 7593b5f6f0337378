import { int32, int64 } from '../codecs.js';
import { shape, type Shape } from '../shape.js';

export const PEER_SHAPES: readonly Shape[] = [
    shape(0x9db1bc6d, 'peer_user', { user_id: int32 }),
    shape(0xbad0e5bb, 'peer_chat', { chat_id: int32 }),
    shape(0xbddde532, 'peer_channel', { channel_id: int32 }),

    shape(0x7f3b18ea, 'input_peer_empty', {}),
    shape(0x7da07ec9, 'input_peer_self', {}),
    shape(0x179be863, 'input_peer_chat', { chat_id: int32 }),
    shape(0x7b8e7de6, 'input_peer_user', { user_id: int32, access_hash: int64 }),
    shape(0x20adaef8, 'input_peer_channel', { channel_id: int32, access_hash: int64 }),

    shape(0xb98886cf, 'input_user_empty', {}),
    shape(0xf7c1b13f, 'input_user_self', {}),
    shape(0xd8292816, 'input_user', { user_id: int32, access_hash: int64 }),

    shape(0xee8c1e86, 'input_channel_empty', {}),
    shape(0xafeb712e, 'input_channel', { channel_id: int32, access_hash: int64 }),
];
