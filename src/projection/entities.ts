/**
 * Row views for the cache tables. Each entry keeps the SQL metadata and the
 * decode result of its blob column, and derives the identifiers used by the
 * dumps and the timeline.
 */
import { recordOf, type DecodeResult } from '../tds/decode.js';
import { formatInline } from '../tds/render.js';
import type { DecodedRecord } from '../tds-types.js';
import {
    bitLength,
    epochField,
    escapeCsv,
    fieldOf,
    flagBit,
    intColumn,
    numColumn,
    numberField,
    recordField,
    stringField,
    stripQuotes,
    type Cell,
} from './fields.js';
import type { SqlRow } from './source.js';

export const TYPE_MSG_TO_CHANNEL = 'channel';
export const TYPE_MSG_TO_USER = 'chat';

/** Offset applied by the client to negative (local, unsent) message ids. */
const LOCAL_MESSAGE_ID_OFFSET = 210000n;
const LOW_32 = 0xffffffffn;

/** `<volume_id>_<local_id>.jpg` of a file location record. */
function locationFile(location: DecodedRecord | null): string | null {
    if (!location) return null;
    return `${String(fieldOf(location, 'volume_id') ?? '')}_${String(fieldOf(location, 'local_id') ?? '')}.jpg`;
}

/** `<photo sname> small: <file> big: <file>` for a user or chat photo field. */
export function photoInfo(record: DecodedRecord | null): string {
    const photo = recordField(record, 'photo');
    if (!photo) return '';
    let info = photo.sname;
    const small = locationFile(recordField(photo, 'photo_small'));
    if (small) info += ` small: ${small}`;
    const big = locationFile(recordField(photo, 'photo_big'));
    if (big) info += ` big: ${big}`;
    return info;
}

// --- CHATS ---

export class ChatEntry {
    readonly record: DecodedRecord | null;

    constructor(readonly uid: bigint, readonly name: string, readonly blob: DecodeResult | null) {
        this.record = recordOf(blob);
    }

    get title(): string {
        return stringField(this.record, 'title');
    }

    get username(): string {
        return flagBit(this.record, 'has_username') ? stringField(this.record, 'username') : '';
    }

    get dictId(): Record<string, Cell> {
        const dict: Record<string, Cell> = { title: this.title };
        if (flagBit(this.record, 'has_username')) dict.username = this.username;
        return dict;
    }

    /** `1-N`, `N-N` or `?-?`, then ` pub`/` prv`, then ` left` when left. */
    get chatType(): string {
        if (!fieldOf(this.record, 'flags')) return '';
        let type: string;
        if (flagBit(this.record, 'broadcast')) {
            type = '1-N';
        } else if (flagBit(this.record, 'megagroup')) {
            type = 'N-N';
        } else {
            type = '?-?';
        }
        type += flagBit(this.record, 'has_username') ? ' pub' : ' prv';
        if (flagBit(this.record, 'left')) type += ' left';
        return type;
    }

    get shortestId(): string {
        return this.username || this.title || String(this.uid);
    }

    get creationDate(): number | null {
        return epochField(this.record, 'date');
    }

    get photoInfo(): string {
        return photoInfo(this.record);
    }
}

// --- USERS ---

export class UserEntry {
    readonly record: DecodedRecord | null;

    constructor(
        readonly uid: bigint,
        readonly name: string,
        readonly status: number,
        readonly blob: DecodeResult | null,
    ) {
        this.record = recordOf(blob);
    }

    get firstName(): string {
        return stringField(this.record, 'first_name');
    }

    get lastName(): string {
        return stringField(this.record, 'last_name');
    }

    get username(): string {
        return stringField(this.record, 'username');
    }

    get phone(): string {
        return stringField(this.record, 'phone');
    }

    get isSelf(): boolean {
        return flagBit(this.record, 'self');
    }

    /** Id stored in the blob, for the row/blob consistency check. */
    get blobId(): number | null {
        return numberField(this.record, 'id');
    }

    get fullTextId(): string {
        return `uid: ${this.uid} nick: ${this.username} fullname: ${this.firstName} ${this.lastName} phone: ${this.phone}`;
    }

    get dictId(): Record<string, Cell> {
        const dict: Record<string, Cell> = {};
        if (this.username) dict.username = this.username;
        if (this.firstName) dict.firstname = this.firstName;
        if (this.lastName) dict.lastname = this.lastName;
        if (this.phone) dict.phone = this.phone;
        return dict;
    }

    get shortestId(): string {
        let id: string;
        if (this.username) {
            id = this.username;
        } else if (this.firstName || this.lastName) {
            id = [this.firstName, this.lastName].filter((part) => part).join(' ');
        } else {
            id = String(this.uid);
        }
        return this.isSelf ? `${id} (owner)` : id;
    }

    get photoInfo(): string {
        return photoInfo(this.record);
    }
}

// --- DIALOGS ---

export class DialogEntry {
    readonly did: bigint;
    readonly date: number;
    readonly unreadCount: number;
    readonly lastMid: bigint;
    readonly inboxMax: number;
    readonly outboxMax: number;
    readonly lastMidI: bigint;
    readonly unreadCountI: number;
    readonly pts: number;
    readonly dateI: number;
    readonly pinned: number;
    readonly flags: bigint;

    constructor(row: SqlRow) {
        this.did = intColumn(row, 'did');
        this.date = numColumn(row, 'date');
        this.unreadCount = numColumn(row, 'unread_count');
        this.lastMid = intColumn(row, 'last_mid');
        this.inboxMax = numColumn(row, 'inbox_max');
        this.outboxMax = numColumn(row, 'outbox_max');
        this.lastMidI = intColumn(row, 'last_mid_i');
        this.unreadCountI = numColumn(row, 'unread_count_i');
        this.pts = numColumn(row, 'pts');
        this.dateI = numColumn(row, 'date_i');
        this.pinned = numColumn(row, 'pinned');
        this.flags = intColumn(row, 'flags');
    }

    /** Chat or secret chat id: high word of a wide id, else the absolute id. */
    get peerId(): bigint {
        if (bitLength(this.did) > 32) return this.did >> 32n;
        return this.did < 0n ? -this.did : this.did;
    }
}

// --- SECRET CHATS ---

export interface EncryptedChatColumns {
    uid: bigint;
    user: bigint;
    name: string;
    g: Uint8Array | null;
    authkey: Uint8Array | null;
    ttl: number;
    layer: number;
    seqIn: number;
    seqOut: number;
    useCount: number;
    exchangeId: bigint;
    keyDate: number;
    fprint: bigint;
    fauthkey: Uint8Array | null;
    khash: Uint8Array | null;
    inSeqNo: number;
    adminId: bigint;
    mtprotoSeq: number;
}

export class EncryptedChatEntry {
    readonly record: DecodedRecord | null;

    constructor(readonly columns: EncryptedChatColumns, readonly blob: DecodeResult | null) {
        this.record = recordOf(blob);
    }

    get uid(): bigint {
        return this.columns.uid;
    }

    get adminId(): bigint {
        return this.columns.adminId;
    }

    get keyDate(): number {
        return this.columns.keyDate;
    }

    get dictId(): Record<string, Cell> {
        return {
            name: this.columns.name,
            ttl: this.columns.ttl,
            seq_in: this.columns.seqIn,
            seq_out: this.columns.seqOut,
        };
    }

    get shortestId(): string {
        return this.columns.name || String(this.columns.uid);
    }

    get creationDate(): number | null {
        return epochField(this.record, 'date');
    }

    /**
     * The user that accepted the chat: the blob's participant, else the row
     * `user` when it differs from the admin. Null when neither is usable.
     */
    get participantId(): bigint | null {
        const fromBlob = numberField(this.record, 'participant_id');
        if (fromBlob) return BigInt(fromBlob);
        if (this.columns.adminId !== this.columns.user) return this.columns.user;
        return null;
    }
}

// --- MEDIA, SENT FILES, USER SETTINGS ---

export class MediaEntry {
    readonly record: DecodedRecord | null;

    constructor(
        readonly mid: bigint,
        readonly uid: bigint,
        readonly date: number,
        readonly type: number,
        readonly blob: DecodeResult | null,
    ) {
        this.record = recordOf(blob);
    }
}

export class SentFileEntry {
    readonly record: DecodedRecord | null;

    constructor(
        readonly uid: string,
        readonly type: number,
        readonly parent: string | null,
        readonly blob: DecodeResult | null,
    ) {
        this.record = recordOf(blob);
    }
}

export class UserSettingsEntry {
    readonly record: DecodedRecord | null;

    constructor(readonly uid: bigint, readonly pinned: number, readonly blob: DecodeResult | null) {
        this.record = recordOf(blob);
    }
}

// --- MESSAGES ---

export interface MessageColumns {
    mid: bigint;
    uid: bigint;
    readState: number;
    sendState: number;
    date: number;
    out: number;
    ttl: number;
    media: number;
    imp: number;
    mention: number;
}

export class MessageEntry {
    readonly record: DecodedRecord | null;
    readonly replyRecord: DecodedRecord | null;

    constructor(
        readonly columns: MessageColumns,
        readonly blob: DecodeResult | null,
        readonly replyBlob: DecodeResult | null,
    ) {
        this.record = recordOf(blob);
        this.replyRecord = recordOf(replyBlob);
    }

    get mid(): bigint {
        return this.columns.mid;
    }

    get uid(): bigint {
        return this.columns.uid;
    }

    get fromId(): number | null {
        return numberField(this.record, 'from_id');
    }

    get dateFromBlob(): number | null {
        return epochField(this.record, 'date');
    }

    /**
     * Dialog id and in-dialog sequence number.
     *
     * Secret chat messages pack both into a wide mid. Otherwise the dialog
     * comes from uid (high word when wide, absolute when negative) and local
     * negative mids are shifted back by the client's offset.
     */
    get dialogAndSequence(): [bigint, bigint] {
        const { mid, uid } = this.columns;
        if (bitLength(mid) > 32) {
            return [(mid >> 32n) & LOW_32, mid & LOW_32];
        }
        let dialog: bigint;
        if (bitLength(uid) > 32) {
            dialog = (uid >> 32n) & LOW_32;
        } else {
            dialog = uid < 0n ? -uid : uid;
        }
        const sequence = mid > 0n ? mid : -mid - LOCAL_MESSAGE_ID_OFFSET;
        return [dialog, sequence];
    }

    /** Recipient id and `channel` / `chat`; nulls for other peers. */
    get toIdAndType(): [number, string] | [null, null] {
        const peer = recordField(this.record, 'to_id');
        if (peer?.sname === 'peer_channel') {
            const id = numberField(peer, 'channel_id');
            if (id !== null) return [id, TYPE_MSG_TO_CHANNEL];
        }
        if (peer?.sname === 'peer_user') {
            const id = numberField(peer, 'user_id');
            if (id !== null) return [id, TYPE_MSG_TO_USER];
        }
        return [null, null];
    }

    /** Message text as a CSV cell, empty when there is none. */
    get content(): string {
        return escapeCsv(stringField(this.record, 'message'));
    }

    get replyContent(): string {
        return stripQuotes(escapeCsv(stringField(this.replyRecord, 'message')));
    }

    /** Service action name and its fields, null for ordinary messages. */
    get action(): { name: string; fields: Record<string, Cell> } | null {
        const action = recordField(this.record, 'action');
        if (!action) return null;
        const fields: Record<string, Cell> = {};
        for (const [key, value] of Object.entries(action)) {
            if (key === 'sname' || key === 'signature' || value === undefined) continue;
            fields[key] = typeof value === 'string' ? value : formatInline(value);
        }
        return { name: action.sname, fields };
    }
}
