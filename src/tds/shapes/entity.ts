import { int32, obj, tstring } from '../codecs.js';
import { shape, type Shape, type FieldMap } from '../shape.js';

const SPAN: FieldMap = { offset: int32, length: int32 };

export const ENTITY_SHAPES: readonly Shape[] = [
    shape(0xbb92ba95, 'message_entity_unknown', SPAN),
    shape(0xfa04579d, 'message_entity_mention', SPAN),
    shape(0x6f635b0d, 'message_entity_hashtag', SPAN),
    shape(0x6cef8ac7, 'message_entity_bot_command', SPAN),
    shape(0x6ed02538, 'message_entity_url', SPAN),
    shape(0x64e475c2, 'message_entity_email', SPAN),
    shape(0xbd610bc9, 'message_entity_bold', SPAN),
    shape(0x826f8b60, 'message_entity_italic', SPAN),
    shape(0x28a20571, 'message_entity_code', SPAN),
    shape(0x73924be0, 'message_entity_pre', { ...SPAN, language: tstring }),
    shape(0x76a6d327, 'message_entity_text_url', { ...SPAN, url: tstring }),
    shape(0x352dca58, 'message_entity_mention_name', { ...SPAN, user_id: int32 }),
    shape(0x208e68c9, 'input_message_entity_mention_name', { ...SPAN, user_id: obj }),
    shape(0x9b69e34b, 'message_entity_phone', SPAN),
    shape(0x4c4e743f, 'message_entity_cashtag', SPAN),
    shape(0x9c4e7e8b, 'message_entity_underline', SPAN),
    shape(0xbf0693d4, 'message_entity_strike', SPAN),
    shape(0x020df5d0, 'message_entity_blockquote', SPAN),
];
