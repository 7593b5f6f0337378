/**
 * Message media, geo points, games, photos and photo sizes.
 */
import { double, flag, flags, int32, int64, obj, tbytes, timestamp, tstring, vector } from '../codecs.js';
import { shape, type Shape } from '../shape.js';

export const MEDIA_SHAPES: readonly Shape[] = [
    shape(0x3ded6320, 'message_media_empty', {}),
    shape(0x695150d7, 'message_media_photo', {
        flags: flags(),
        photo: flag(0, obj),
        ttl_seconds: flag(2, int32),
    }),
    shape(0xb5223b0f, 'message_media_photo_layer74', {
        flags: flags(),
        photo: flag(0, obj),
        caption: flag(1, tstring),
        ttl_seconds: flag(2, int32),
    }),
    shape(0x3d8ce53d, 'message_media_photo_layer68', { photo: obj, caption: tstring }),
    shape(0xc8c45a2a, 'message_media_photo_old', { photo: obj }),
    shape(0x9cb070d7, 'message_media_document', {
        flags: flags(),
        document: flag(0, obj),
        ttl_seconds: flag(2, int32),
    }),
    shape(0x7c4414d3, 'message_media_document_layer74', {
        flags: flags(),
        document: flag(0, obj),
        caption: flag(1, tstring),
        ttl_seconds: flag(2, int32),
    }),
    shape(0xf3e02ea8, 'message_media_document_layer68', { document: obj, caption: tstring }),
    shape(0x2fda2204, 'message_media_document_old', { document: obj }),
    shape(0x56e0d474, 'message_media_geo', { geo: obj }),
    shape(0x7c3c2609, 'message_media_geo_live', { geo: obj, period: int32 }),
    shape(0xcbf24940, 'message_media_contact', {
        phone_number: tstring,
        first_name: tstring,
        last_name: tstring,
        vcard: tstring,
        user_id: int32,
    }),
    shape(0x5e7d2f39, 'message_media_contact_layer81', {
        phone_number: tstring,
        first_name: tstring,
        last_name: tstring,
        user_id: int32,
    }),
    shape(0x9f84f49e, 'message_media_unsupported', {}),
    shape(0xa32dd600, 'message_media_web_page', { webpage: obj }),
    shape(0x2ec0533f, 'message_media_venue', {
        geo: obj,
        title: tstring,
        address: tstring,
        provider: tstring,
        venue_id: tstring,
        venue_type: tstring,
    }),
    shape(0x7912b71f, 'message_media_venue_layer71', {
        geo: obj,
        title: tstring,
        address: tstring,
        provider: tstring,
        venue_id: tstring,
    }),
    shape(0xfdb19008, 'message_media_game', { game: obj }),

    shape(0x1117dd5f, 'geo_point_empty', {}),
    shape(0x0296f104, 'geo_point', { long: double, lat: double, access_hash: int64 }),
    shape(0x2049d70c, 'geo_point_layer81', { long: double, lat: double }),

    shape(0xbdf9653b, 'game', {
        flags: flags(),
        id: int64,
        access_hash: int64,
        short_name: tstring,
        title: tstring,
        description: tstring,
        photo: obj,
        document: flag(0, obj),
    }),

    shape(0x2331b22d, 'photo_empty', { id: int64 }),
    shape(0xd07504a5, 'photo', {
        flags: flags({ has_stickers: 0 }),
        id: int64,
        access_hash: int64,
        file_reference: tbytes,
        date: timestamp,
        sizes: vector(obj),
        dc_id: int32,
    }),
    shape(0x9c477dd8, 'photo_layer97', {
        flags: flags({ has_stickers: 0 }),
        id: int64,
        access_hash: int64,
        file_reference: tbytes,
        date: timestamp,
        sizes: vector(obj),
    }),
    shape(0x9288dd29, 'photo_layer82', {
        flags: flags({ has_stickers: 0 }),
        id: int64,
        access_hash: int64,
        date: timestamp,
        sizes: vector(obj),
    }),
    shape(0xcded42fe, 'photo_layer55', {
        id: int64,
        access_hash: int64,
        date: timestamp,
        sizes: vector(obj),
    }),
    shape(0xc3838076, 'photo_old2', {
        id: int64,
        access_hash: int64,
        user_id: int32,
        date: timestamp,
        geo: obj,
        sizes: vector(obj),
    }),
    shape(0x22b56751, 'photo_old', {
        id: int64,
        access_hash: int64,
        user_id: int32,
        date: timestamp,
        caption: tstring,
        geo: obj,
        sizes: vector(obj),
    }),

    shape(0x0e17e23c, 'photo_size_empty', { type: tstring }),
    shape(0x77bfb61b, 'photo_size', {
        type: tstring,
        location: obj,
        w: int32,
        h: int32,
        size: int32,
    }),
    shape(0xe9a734fa, 'photo_cached_size', {
        type: tstring,
        location: obj,
        w: int32,
        h: int32,
        bytes: tbytes,
    }),
    shape(0xe0b0bc2e, 'photo_stripped_size', { type: tstring, bytes: tbytes }),
    shape(0x5aa86a51, 'photo_size_progressive', {
        type: tstring,
        location: obj,
        w: int32,
        h: int32,
        sizes: vector(int32),
    }),
];
