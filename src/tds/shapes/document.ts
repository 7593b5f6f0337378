import { double, flag, flags, int32, int64, obj, tbytes, timestamp, tstring, vector } from '../codecs.js';
import { shape, type Shape } from '../shape.js';

export const DOCUMENT_SHAPES: readonly Shape[] = [
    shape(0x36f8c871, 'document_empty', { id: int64 }),
    shape(0x9ba29cc1, 'document', {
        flags: flags(),
        id: int64,
        access_hash: int64,
        file_reference: tbytes,
        date: timestamp,
        mime_type: tstring,
        size: int32,
        thumbs: flag(0, vector(obj)),
        dc_id: int32,
        attributes: vector(obj),
    }),
    shape(0x59534e4c, 'document_layer92', {
        id: int64,
        access_hash: int64,
        file_reference: tbytes,
        date: timestamp,
        mime_type: tstring,
        size: int32,
        thumb: obj,
        dc_id: int32,
        version: int32,
        attributes: vector(obj),
    }),
    shape(0x87232bc7, 'document_layer82', {
        id: int64,
        access_hash: int64,
        date: timestamp,
        mime_type: tstring,
        size: int32,
        thumb: obj,
        dc_id: int32,
        version: int32,
        attributes: vector(obj),
    }),
    shape(0x9efc6326, 'document_old', {
        id: int64,
        access_hash: int64,
        user_id: int32,
        date: timestamp,
        file_name: tstring,
        mime_type: tstring,
        size: int32,
        thumb: obj,
        dc_id: int32,
    }),

    shape(0x6c37c15c, 'document_attribute_image_size', { w: int32, h: int32 }),
    shape(0x11b58939, 'document_attribute_animated', {}),
    shape(0x6319d612, 'document_attribute_sticker', {
        flags: flags({ mask: 1 }),
        alt: tstring,
        stickerset: obj,
        mask_coords: flag(0, obj),
    }),
    shape(0x3a556302, 'document_attribute_sticker_layer55', { alt: tstring, stickerset: obj }),
    shape(0x994c9882, 'document_attribute_sticker_old2', { alt: tstring }),
    shape(0xfb0a5727, 'document_attribute_sticker_old', {}),
    shape(0x0ef02ce6, 'document_attribute_video', {
        flags: flags({ round_message: 0, supports_streaming: 1 }),
        duration: int32,
        w: int32,
        h: int32,
    }),
    shape(0x5910cccb, 'document_attribute_video_layer65', { duration: int32, w: int32, h: int32 }),
    shape(0x9852f9c6, 'document_attribute_audio', {
        flags: flags({ voice: 10 }),
        duration: int32,
        title: flag(0, tstring),
        performer: flag(1, tstring),
        waveform: flag(2, tbytes),
    }),
    shape(0xded218e0, 'document_attribute_audio_layer45', {
        duration: int32,
        title: tstring,
        performer: tstring,
    }),
    shape(0x051448e5, 'document_attribute_audio_old', { duration: int32 }),
    shape(0x15590068, 'document_attribute_filename', { file_name: tstring }),
    shape(0x9801d2f7, 'document_attribute_has_stickers', {}),

    shape(0xffb62b95, 'input_sticker_set_empty', {}),
    shape(0x9de7a269, 'input_sticker_set_id', { id: int64, access_hash: int64 }),
    shape(0x861cc8a0, 'input_sticker_set_short_name', { short_name: tstring }),
    shape(0x028703c8, 'input_sticker_set_animated_emoji', {}),
    shape(0xaed6dbb2, 'mask_coords', { n: int32, x: double, y: double, zoom: double }),
];
