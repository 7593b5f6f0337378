import type { Shape } from '../shape.js';
import { ACTION_SHAPES } from './action.js';
import { BASIC_SHAPES } from './basic.js';
import { CHAT_SHAPES } from './chat.js';
import { DOCUMENT_SHAPES } from './document.js';
import { ENCRYPTED_SHAPES } from './encrypted.js';
import { ENTITY_SHAPES } from './entity.js';
import { FILE_SHAPES } from './file.js';
import { MARKUP_SHAPES } from './markup.js';
import { MEDIA_SHAPES } from './media.js';
import { MESSAGE_SHAPES } from './message.js';
import { PEER_SHAPES } from './peer.js';
import { USER_SHAPES } from './user.js';
import { WEBPAGE_SHAPES } from './webpage.js';

export { deriveFromId } from './message.js';

export const ALL_SHAPES: readonly Shape[] = [
    ...BASIC_SHAPES,
    ...PEER_SHAPES,
    ...FILE_SHAPES,
    ...USER_SHAPES,
    ...CHAT_SHAPES,
    ...MESSAGE_SHAPES,
    ...ACTION_SHAPES,
    ...ENTITY_SHAPES,
    ...MARKUP_SHAPES,
    ...MEDIA_SHAPES,
    ...DOCUMENT_SHAPES,
    ...WEBPAGE_SHAPES,
    ...ENCRYPTED_SHAPES,
];
