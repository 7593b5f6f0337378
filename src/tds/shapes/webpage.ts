/**
 * Link previews and the Instant View page tree (blocks, rich text).
 */
import { flag, flags, int32, int64, obj, tbool, timestamp, tstring, vector } from '../codecs.js';
import { shape, type Shape, type FieldMap } from '../shape.js';

const WEB_PAGE_PREVIEW = {
    type: flag(0, tstring),
    site_name: flag(1, tstring),
    title: flag(2, tstring),
    description: flag(3, tstring),
    photo: flag(4, obj),
    embed_url: flag(5, tstring),
    embed_type: flag(5, tstring),
    embed_width: flag(6, int32),
    embed_height: flag(6, int32),
    duration: flag(7, int32),
    author: flag(8, tstring),
    document: flag(9, obj),
};

const TEXT: FieldMap = { text: obj };
const PAGE_CONTENT: FieldMap = { blocks: vector(obj), photos: vector(obj), documents: vector(obj) };

export const WEBPAGE_SHAPES: readonly Shape[] = [
    shape(0xeb1477e8, 'web_page_empty', { id: int64 }),
    shape(0xc586da1c, 'web_page_pending', { id: int64, date: timestamp }),
    shape(0x85849473, 'web_page_not_modified', {}),
    shape(0xca820ed7, 'web_page_layer58', {
        flags: flags(),
        id: int64,
        url: tstring,
        display_url: tstring,
        ...WEB_PAGE_PREVIEW,
    }),
    shape(0x5f07b4bc, 'web_page_layer104', {
        flags: flags(),
        id: int64,
        url: tstring,
        display_url: tstring,
        hash: int32,
        ...WEB_PAGE_PREVIEW,
        cached_page: flag(10, obj),
    }),
    shape(0xfa64e172, 'web_page', {
        flags: flags(),
        id: int64,
        url: tstring,
        display_url: tstring,
        hash: int32,
        ...WEB_PAGE_PREVIEW,
        cached_page: flag(10, obj),
        documents: flag(11, vector(obj)),
    }),

    shape(0xae891bec, 'page', {
        flags: flags({ part: 0, rtl: 1, v2: 2 }),
        url: tstring,
        ...PAGE_CONTENT,
    }),
    shape(0x8e3f9ebe, 'page_part_layer82', PAGE_CONTENT),
    shape(0x556ec7aa, 'page_full_layer82', PAGE_CONTENT),
    shape(0x6f747657, 'page_caption', { text: obj, credit: obj }),
    shape(0xb92fb6cd, 'page_list_item_text', TEXT),
    shape(0x25e073fc, 'page_list_item_blocks', { blocks: vector(obj) }),

    shape(0x13567e8a, 'page_block_unsupported', {}),
    shape(0x70abc3fd, 'page_block_title', TEXT),
    shape(0x8ffa9a1f, 'page_block_subtitle', TEXT),
    shape(0xbaafe5e0, 'page_block_author_date', { author: obj, published_date: timestamp }),
    shape(0xbfd064ec, 'page_block_header', TEXT),
    shape(0xf12bb6e1, 'page_block_subheader', TEXT),
    shape(0x1e148390, 'page_block_kicker', TEXT),
    shape(0x467a0766, 'page_block_paragraph', TEXT),
    shape(0xc070d93e, 'page_block_preformatted', { text: obj, language: tstring }),
    shape(0x48870999, 'page_block_footer', TEXT),
    shape(0xdb20b188, 'page_block_divider', {}),
    shape(0xce0d37b0, 'page_block_anchor', { name: tstring }),
    shape(0x263d7c26, 'page_block_blockquote', { text: obj, caption: obj }),
    shape(0x4f4456d3, 'page_block_pullquote', { text: obj, caption: obj }),
    shape(0x39f23300, 'page_block_cover', { cover: obj }),
    shape(0xef1751b5, 'page_block_channel', { channel: obj }),
    shape(0x1759c560, 'page_block_photo', {
        flags: flags(),
        photo_id: int64,
        caption: obj,
        url: flag(0, tstring),
        webpage_id: flag(0, int64),
    }),
    shape(0x7c8fe7b6, 'page_block_video', {
        flags: flags({ autoplay: 0, loop: 1 }),
        video_id: int64,
        caption: obj,
    }),
    shape(0x804361ea, 'page_block_audio', { audio_id: int64, caption: obj }),
    shape(0x65a0fa4d, 'page_block_collage', { items: vector(obj), caption: obj }),
    shape(0x031f9590, 'page_block_slideshow', { items: vector(obj), caption: obj }),
    shape(0x76768bed, 'page_block_details', {
        flags: flags({ open: 0 }),
        blocks: vector(obj),
        title: obj,
    }),
    shape(0xe4e88011, 'page_block_list', { items: vector(obj) }),
    shape(0x3a58c7f4, 'page_block_list_layer82', { ordered: tbool, items: vector(obj) }),

    shape(0xdc3d824f, 'text_empty', {}),
    shape(0x744694e0, 'text_plain', { text: tstring }),
    shape(0x6724abc4, 'text_bold', TEXT),
    shape(0xd912a59c, 'text_italic', TEXT),
    shape(0xc12622c4, 'text_underline', TEXT),
    shape(0x9bf8bb95, 'text_strike', TEXT),
    shape(0x6c3f19b9, 'text_fixed', TEXT),
    shape(0x3c2884c1, 'text_url', { text: obj, url: tstring, webpage_id: int64 }),
    shape(0xde5a0dd6, 'text_email', { text: obj, email: tstring }),
    shape(0x7e6260d7, 'text_concat', { texts: vector(obj) }),
    shape(0xed6a8504, 'text_subscript', TEXT),
    shape(0xc7fb5e01, 'text_superscript', TEXT),
    shape(0x034b8621, 'text_marked', TEXT),
    shape(0x1ccb966a, 'text_phone', { text: obj, phone: tstring }),
    shape(0x081ccf4f, 'text_image', { document_id: int64, w: int32, h: int32 }),
    shape(0x35553762, 'text_anchor', { text: obj, name: tstring }),
];
