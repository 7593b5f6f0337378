import { flag, flags, int32, int64, obj, tstring, vector } from '../codecs.js';
import { shape, type Shape } from '../shape.js';

export const ACTION_SHAPES: readonly Shape[] = [
    shape(0xb6aef7b0, 'message_action_empty', {}),
    shape(0xa6638b9a, 'message_action_chat_create', { title: tstring, users: vector(int32) }),
    shape(0xb5a1ce5a, 'message_action_chat_edit_title', { title: tstring }),
    shape(0x7fcb13a8, 'message_action_chat_edit_photo', { photo: obj }),
    shape(0x95e3fbef, 'message_action_chat_delete_photo', {}),
    shape(0x488a7337, 'message_action_chat_add_user', { users: vector(int32) }),
    shape(0x5e3cfc4b, 'message_action_chat_add_user_old', { user_id: int32 }),
    shape(0xb2ae9b0c, 'message_action_chat_delete_user', { user_id: int32 }),
    shape(0xf89cf5e8, 'message_action_chat_joined_by_link', { inviter_id: int32 }),
    shape(0x95d2ac92, 'message_action_channel_create', { title: tstring }),
    shape(0x51bdb021, 'message_action_chat_migrate_to', { channel_id: int32 }),
    shape(0xb055eaee, 'message_action_channel_migrate_from', { title: tstring, chat_id: int32 }),
    shape(0x94bd38ed, 'message_action_pin_message', {}),
    shape(0x9fbab604, 'message_action_history_clear', {}),
    shape(0x92a72876, 'message_action_game_score', { game_id: int64, score: int32 }),
    shape(0x40699cd0, 'message_action_payment_sent', { currency: tstring, total_amount: int64 }),
    shape(0x80e11a7f, 'message_action_phone_call', {
        flags: flags({ video: 2 }),
        call_id: int64,
        reason: flag(0, obj),
        duration: flag(1, int32),
    }),
    shape(0x4792929b, 'message_action_screenshot_taken', {}),
    shape(0xfae69f56, 'message_action_custom_action', { message: tstring }),
    shape(0xabe9affe, 'message_action_bot_allowed', { domain: tstring }),
    shape(0xf3f25f76, 'message_action_contact_sign_up', {}),

    // Client-local actions, never sent by the server.
    shape(0x55555550, 'message_action_user_joined', {}),
    shape(0x55555551, 'message_action_user_updated_photo', { new_user_photo: obj }),
    shape(0x55555552, 'message_action_ttl_change', { ttl: int32 }),
    shape(0x555555f5, 'message_action_login_unknown_location', { title: tstring, address: tstring }),

    shape(0x85e42301, 'phone_call_discard_reason_missed', {}),
    shape(0xe095c1a0, 'phone_call_discard_reason_disconnect', {}),
    shape(0x57adc690, 'phone_call_discard_reason_hangup', {}),
    shape(0xfaf7e8c9, 'phone_call_discard_reason_busy', {}),
];
