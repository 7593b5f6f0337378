import { flag, flags, int32, obj, tbytes, tstring, vector } from '../codecs.js';
import { shape, type Shape } from '../shape.js';

export const MARKUP_SHAPES: readonly Shape[] = [
    shape(0xa03e5b85, 'reply_keyboard_hide', { flags: flags({ selective: 2 }) }),
    shape(0xf4108aa0, 'reply_keyboard_force_reply', { flags: flags({ single_use: 1, selective: 2 }) }),
    shape(0x3502758c, 'reply_keyboard_markup', {
        flags: flags({ resize: 0, single_use: 1, selective: 2 }),
        rows: vector(obj),
    }),
    shape(0x48a30254, 'reply_inline_markup', { rows: vector(obj) }),
    shape(0x77608b83, 'keyboard_button_row', { buttons: vector(obj) }),

    shape(0xa2fa4880, 'keyboard_button', { text: tstring }),
    shape(0x258aff05, 'keyboard_button_url', { text: tstring, url: tstring }),
    shape(0x683a5e46, 'keyboard_button_callback', { text: tstring, data: tbytes }),
    shape(0xb16a6c29, 'keyboard_button_request_phone', { text: tstring }),
    shape(0xfc796b3f, 'keyboard_button_request_geo_location', { text: tstring }),
    shape(0x0568a748, 'keyboard_button_switch_inline', {
        flags: flags({ same_peer: 0 }),
        text: tstring,
        query: tstring,
    }),
    shape(0x50f41ccf, 'keyboard_button_game', { text: tstring }),
    shape(0xafd93fbb, 'keyboard_button_buy', { text: tstring }),
    shape(0x10b78d29, 'keyboard_button_url_auth', {
        flags: flags(),
        text: tstring,
        fwd_text: flag(0, tstring),
        url: tstring,
        button_id: int32,
    }),
];
