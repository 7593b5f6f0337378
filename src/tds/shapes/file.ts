/**
 * File locations and the small profile/chat photo records that point at
 * them. Cached thumbnails are named `<volume_id>_<local_id>.jpg` on disk.
 */
import { int32, int64, obj, tbytes } from '../codecs.js';
import { shape, type Shape } from '../shape.js';

export const FILE_SHAPES: readonly Shape[] = [
    shape(0x7c596b46, 'file_location_unavailable', {
        volume_id: int64,
        local_id: int32,
        secret: int64,
    }),
    shape(0x53d69076, 'file_location_layer82', {
        dc_id: int32,
        volume_id: int64,
        local_id: int32,
        secret: int64,
    }),
    shape(0x091d11eb, 'file_location_layer97', {
        dc_id: int32,
        volume_id: int64,
        local_id: int32,
        secret: int64,
        file_reference: tbytes,
    }),
    shape(0xbc7fc6cd, 'file_location_to_be_deprecated', {
        volume_id: int64,
        local_id: int32,
    }),
    shape(0x55555554, 'file_encrypted_location', {
        dc_id: int32,
        volume_id: int64,
        local_id: int32,
        secret: int64,
        key: tbytes,
        iv: tbytes,
    }),

    shape(0x4f11bae1, 'user_profile_photo_empty', {}),
    shape(0x990d1493, 'user_profile_photo_old', {
        photo_small: obj,
        photo_big: obj,
    }),
    shape(0xd559d8c8, 'user_profile_photo_layer97', {
        photo_id: int64,
        photo_small: obj,
        photo_big: obj,
    }),
    shape(0xecd75d8c, 'user_profile_photo', {
        photo_id: int64,
        photo_small: obj,
        photo_big: obj,
        dc_id: int32,
    }),

    shape(0x37c1011c, 'chat_photo_empty', {}),
    shape(0x6153276a, 'chat_photo_layer97', {
        photo_small: obj,
        photo_big: obj,
    }),
    shape(0x475cdbd5, 'chat_photo', {
        photo_small: obj,
        photo_big: obj,
        dc_id: int32,
    }),
];
