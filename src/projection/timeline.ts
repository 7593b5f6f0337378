import type { DecodeResult } from '../tds/decode.js';
import type { TdsLogger } from '../tds/types.js';
import type { DecodedRecord, FieldValue } from '../tds-types.js';
import { isDecodedRecord, isFieldArray, isFieldError } from '../tds-types.js';
import type {
    ChatEntry,
    DialogEntry,
    EncryptedChatEntry,
    MessageEntry,
    UserEntry,
} from './entities.js';
import { TYPE_MSG_TO_USER } from './entities.js';
import {
    bigintField,
    dictToString,
    epochField,
    escapeCsv,
    fieldOf,
    flagBit,
    hasFlags,
    numberField,
    recordField,
    stringField,
    stripQuotes,
    toDate,
    type Cell,
} from './fields.js';

export const TYPE_CHAT_CREATION_DATE = 'chat_creation_date';
export const TYPE_CHAT_LAST_UPDATE = 'chat_last_update';
export const TYPE_KEY_DATE = 'key_date';
export const TYPE_USER_STATUS_UPDATE = 'user_status_update';
export const TYPE_DECODE_ERROR = 'decode_error';

export const TIMELINE_COLUMNS = [
    'timestamp', 'source', 'id', 'type',
    'from', 'from_id', 'to', 'to_id',
    'dialog', 'dialog_type',
    'content', 'media', 'extra',
] as const;

const SEPARATOR = ',';

export interface TimelineRow {
    timestamp: string;
    source: string;
    id: Cell;
    type: string;
    from: Cell;
    fromId: Cell;
    to: Cell;
    toId: Cell;
    dialog: Cell;
    dialogType: string;
    content: string;
    /** Written as is; message media summaries are already escaped. */
    media: string;
    extra: Record<string, Cell>;
}

/** Tables the timeline is built from, keyed by their uid / mid column. */
export interface TimelineTables {
    chats: ReadonlyMap<bigint, ChatEntry>;
    dialogs: ReadonlyMap<bigint, DialogEntry>;
    encChats: ReadonlyMap<bigint, EncryptedChatEntry>;
    users: ReadonlyMap<bigint, UserEntry>;
    messages: ReadonlyMap<bigint, MessageEntry>;
}

export function newRow(source: string, id: Cell): TimelineRow {
    return {
        timestamp: '',
        source,
        id,
        type: '',
        from: '',
        fromId: '',
        to: '',
        toId: '',
        dialog: '',
        dialogType: '',
        content: '',
        media: '',
        extra: {},
    };
}

export function toRowString(row: TimelineRow): string {
    return [
        row.timestamp,
        row.source,
        row.id,
        row.type,
        row.from,
        row.fromId,
        row.to,
        row.toId,
        row.dialog,
        row.dialogType,
        escapeCsv(row.content),
        row.media,
        escapeCsv(dictToString(row.extra)),
    ].join(SEPARATOR);
}

/**
 * Chronological order. Array#sort is stable, so rows sharing a timestamp
 * keep their source order; undated rows follow in source order.
 */
export function sortTimeline(rows: readonly TimelineRow[]): TimelineRow[] {
    const dated = rows.filter((row) => row.timestamp !== '');
    const undated = rows.filter((row) => row.timestamp === '');
    dated.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
    return [...dated, ...undated];
}

export function renderTimeline(rows: readonly TimelineRow[]): string {
    const lines = [TIMELINE_COLUMNS.join(SEPARATOR), ...rows.map(toRowString)];
    return lines.join('\n') + '\n';
}

/** Error text of a blob that did not decode, null when it did. */
export function decodeFailure(blob: DecodeResult | null): string | null {
    if (!blob) return 'no blob data';
    if (blob.ok) return null;
    return `${blob.error.name}: ${blob.error.message}`;
}

function countFieldErrors(value: FieldValue | undefined): number {
    if (isFieldError(value)) return 1;
    if (isFieldArray(value)) return value.reduce((n: number, item) => n + countFieldErrors(item), 0);
    if (!isDecodedRecord(value)) return 0;
    let count = 0;
    for (const field of Object.values(value)) count += countFieldErrors(field);
    return count;
}

/**
 * Extra entries for a blob that decoded only in part: `partial` counts the
 * unconsumed bytes, `field_errors` the fields replaced by a FieldError.
 */
export function decodeMarkers(blob: DecodeResult | null): Record<string, Cell> {
    const markers: Record<string, Cell> = {};
    if (!blob || !blob.ok) return markers;
    if (blob.unconsumed) markers.partial = blob.unconsumed.length;
    const errors = typeof blob.value === 'boolean' ? 0 : countFieldErrors(blob.value);
    if (errors > 0) markers.field_errors = errors;
    return markers;
}

function errorRow(source: string, id: Cell, failure: string): TimelineRow {
    const row = newRow(source, id);
    row.type = TYPE_DECODE_ERROR;
    row.content = failure;
    return row;
}

// --- ROW SOURCES ---

export function chatRows(tables: TimelineTables): TimelineRow[] {
    const rows: TimelineRow[] = [];
    for (const [uid, chat] of tables.chats) {
        const failure = decodeFailure(chat.blob);
        if (failure !== null) {
            rows.push(errorRow('chats', uid, failure));
            continue;
        }
        const record = chat.record;
        const row = newRow('chats', uid);
        row.dialog = chat.shortestId;
        row.dialogType = chat.chatType;
        row.content = `${record?.sname ?? ''} ${dictToString(chat.dictId)}`;

        const created = chat.creationDate;
        if (created) {
            row.timestamp = toDate(created);
            row.type = TYPE_CHAT_CREATION_DATE;
        } else {
            row.type = record?.sname ?? '';
        }

        if (hasFlags(record)) {
            const flags: Record<string, Cell> = {};
            if (flagBit(record, 'creator')) flags.creator = 'true';
            if (flagBit(record, 'left')) flags.left = 'true';
            if (flagBit(record, 'broadcast')) flags.broadcast = 'true';
            if (flagBit(record, 'megagroup')) flags.megagroup = 'true';
            if (flagBit(record, 'has_participants_count')) {
                flags.members = numberField(record, 'participants_count') ?? '';
            }
            row.content += ` ${dictToString(flags)}`;
        }

        row.media = chat.photoInfo;
        Object.assign(row.extra, decodeMarkers(chat.blob));
        rows.push(row);
    }
    return rows;
}

function dialogOf(tables: TimelineTables, row: TimelineRow, id: bigint): void {
    const chat = tables.chats.get(id);
    if (chat) {
        row.dialog = chat.shortestId;
        row.dialogType = chat.chatType;
        return;
    }
    const encChat = tables.encChats.get(id);
    if (encChat) {
        row.dialog = encChat.shortestId;
        row.dialogType = 'encrypted 1-1';
        return;
    }
    row.dialogType = '1-1';
}

export function dialogRows(tables: TimelineTables): TimelineRow[] {
    const rows: TimelineRow[] = [];
    for (const [did, dialog] of tables.dialogs) {
        const row = newRow('dialogs', did);
        dialogOf(tables, row, dialog.peerId);
        row.content = `dialog unread_count:${dialog.unreadCount} inbox_max:${dialog.inboxMax} `
            + `outbox_max:${dialog.outboxMax} pts:${dialog.pts} last_mid:${dialog.lastMid}`;
        row.timestamp = toDate(dialog.date);
        row.type = TYPE_CHAT_LAST_UPDATE;
        rows.push(row);
    }
    return rows;
}

export function encChatRows(tables: TimelineTables): TimelineRow[] {
    const rows: TimelineRow[] = [];
    for (const [uid, encChat] of tables.encChats) {
        const failure = decodeFailure(encChat.blob);
        if (failure !== null) {
            rows.push(errorRow('enc_chats', uid, failure));
            continue;
        }
        const row = newRow('enc_chats', uid);
        row.dialog = encChat.shortestId;
        row.dialogType = 'encrypted 1-1';

        const participant = encChat.participantId;
        row.from = tables.users.get(encChat.adminId)?.shortestId ?? '';
        row.fromId = encChat.adminId;
        row.to = participant === null ? '' : tables.users.get(participant)?.shortestId ?? '';
        row.toId = participant ?? '';
        row.content = `${encChat.record?.sname ?? ''} ${dictToString(encChat.dictId)}`;

        const created = encChat.creationDate;
        if (created) {
            row.timestamp = toDate(created);
            row.type = TYPE_CHAT_CREATION_DATE;
        }
        Object.assign(row.extra, decodeMarkers(encChat.blob));
        rows.push(row);

        if (encChat.keyDate) {
            rows.push({ ...row, extra: { ...row.extra }, timestamp: toDate(encChat.keyDate), type: TYPE_KEY_DATE });
        }
    }
    return rows;
}

export function userRows(tables: TimelineTables): TimelineRow[] {
    const rows: TimelineRow[] = [];
    for (const [uid, user] of tables.users) {
        const failure = decodeFailure(user.blob);
        if (failure !== null) {
            rows.push(errorRow('users', uid, failure));
            continue;
        }
        const record = user.record;
        const row = newRow('users', uid);
        row.from = user.shortestId;
        row.fromId = uid;

        if (user.status > 0) {
            row.type = TYPE_USER_STATUS_UPDATE;
            row.timestamp = toDate(user.status);
        }

        row.content = dictToString(user.dictId);
        const info: Record<string, Cell> = {};
        if (hasFlags(record)) {
            const status = recordField(record, 'status');
            if (flagBit(record, 'has_status') && status) info.status = status.sname;
            if (flagBit(record, 'bot')) info.bot = 'true';
            if (flagBit(record, 'mutual_contact')) {
                info.mutual_contact = 'true';
            } else if (flagBit(record, 'contact')) {
                info.contact = 'true';
            }
        }
        if (Object.keys(info).length > 0) row.content += ` ${dictToString(info)}`;

        row.media = user.photoInfo;
        Object.assign(row.extra, decodeMarkers(user.blob));
        rows.push(row);
    }
    return rows;
}

function fileNames(document: DecodedRecord): string {
    const attributes = fieldOf(document, 'attributes');
    if (!isFieldArray(attributes)) return '';
    let names = '';
    for (const attribute of attributes) {
        if (isDecodedRecord(attribute) && attribute.sname === 'document_attribute_filename') {
            names += ` file_name:${stringField(attribute, 'file_name')}`;
        }
    }
    return names;
}

function photoSizes(photo: DecodedRecord): string {
    const sizes = fieldOf(photo, 'sizes');
    if (!isFieldArray(sizes)) return '';
    let out = '';
    for (const size of sizes) {
        if (!isDecodedRecord(size)) continue;
        const location = recordField(size, 'location');
        if (!location) continue;
        const bytes = fieldOf(size, 'bytes');
        const length = numberField(size, 'size') ?? (bytes instanceof Uint8Array ? bytes.length : '');
        out += ` ${numberField(size, 'w') ?? ''}x${numberField(size, 'h') ?? ''}(${length} bytes):`
            + `${bigintField(location, 'volume_id') ?? ''}_${numberField(location, 'local_id') ?? ''}.jpg`;
    }
    return out;
}

/** One-line summary of a message's media field; null without media. */
export function messageMedia(record: DecodedRecord | null): string | null {
    const media = recordField(record, 'media');
    if (!media) return null;

    const document = recordField(media, 'document');
    if (document) {
        return `document id:${bigintField(document, 'id') ?? ''} date:${toDate(epochField(document, 'date'))} `
            + `mime:${stringField(document, 'mime_type')} size:${numberField(document, 'size') ?? ''}`
            + fileNames(document);
    }

    const photo = recordField(media, 'photo');
    if (photo) {
        return `photo id:${bigintField(photo, 'id') ?? ''} date:${toDate(epochField(photo, 'date'))}`
            + photoSizes(photo);
    }

    const webpage = recordField(media, 'webpage');
    if (webpage) {
        let summary = `webpage id:${bigintField(webpage, 'id') ?? ''} url:${stringField(webpage, 'url')}`;
        const title = stringField(webpage, 'title');
        if (title) summary += ` title:${title}`;
        const description = stringField(webpage, 'description');
        if (description) summary += ` description:${description}`;
        return summary;
    }

    return media.sname;
}

export function messageRows(tables: TimelineTables, logger: TdsLogger | null = null): TimelineRow[] {
    const rows: TimelineRow[] = [];
    for (const [mid, message] of tables.messages) {
        const failure = decodeFailure(message.blob);
        if (failure !== null) {
            rows.push(errorRow('messages', mid, failure));
            continue;
        }
        const record = message.record;
        const row = newRow('messages', mid);

        const fromId = message.fromId;
        if (fromId) {
            row.fromId = fromId;
            row.from = tables.users.get(BigInt(fromId))?.shortestId ?? fromId;
        }

        const [dialog, sequence] = message.dialogAndSequence;
        row.extra.dialog = dialog;
        row.extra.sequence = sequence;
        dialogOf(tables, row, dialog);

        const [toId, toType] = message.toIdAndType;
        if (toId === null) {
            logger?.error?.(`message ${mid}, unmanaged to_id!`);
        } else {
            row.toId = toId;
            if (toType === TYPE_MSG_TO_USER) {
                row.to = tables.users.get(BigInt(toId))?.shortestId ?? '';
            } else {
                row.to = tables.chats.get(BigInt(toId))?.shortestId ?? '';
            }
        }

        row.type = record?.sname ?? '';
        const action = message.action;
        if (action) {
            Object.assign(row.extra, action.fields);
            row.content = action.name;
        } else {
            row.content = stripQuotes(message.content);
        }

        const reply = message.replyRecord;
        if (reply) {
            row.content += ` [IS REPLY TO MSG ID ${numberField(reply, 'id') ?? ''} `
                + `${toDate(epochField(reply, 'date'))}]\n${message.replyContent}`;
        }

        const fwd = recordField(record, 'fwd_from');
        if (fwd) {
            row.content += ` [FORWARDED OF MSG BY ${numberField(fwd, 'from_id') ?? ''} `
                + `${toDate(epochField(fwd, 'date'))}]`;
        }

        const views = numberField(record, 'views');
        if (views) row.extra.views = views;

        const media = messageMedia(record);
        if (media) row.media = escapeCsv(media);

        row.timestamp = toDate(message.dateFromBlob);
        Object.assign(row.extra, decodeMarkers(message.blob));
        rows.push(row);
    }
    return rows;
}

/** Every row source in table order, then sorted chronologically. */
export function buildTimeline(tables: TimelineTables, logger: TdsLogger | null = null): TimelineRow[] {
    return sortTimeline([
        ...chatRows(tables),
        ...dialogRows(tables),
        ...encChatRows(tables),
        ...userRows(tables),
        ...messageRows(tables, logger),
    ]);
}
