import fs from 'node:fs';
import path from 'node:path';
import { decodeBlob, type DecodeResult } from '../tds/decode.js';
import type { DecoderOptions, TdsLogger } from '../tds/types.js';
import { dumpTables, type CacheTables } from './dump.js';
import {
    ChatEntry,
    DialogEntry,
    EncryptedChatEntry,
    MediaEntry,
    MessageEntry,
    SentFileEntry,
    UserEntry,
    UserSettingsEntry,
} from './entities.js';
import { blobColumn, intColumn, numColumn, numberField, optionalColumn, textColumn } from './fields.js';
import { SqliteCacheSource, type CacheSource, type SqlRow } from './source.js';
import { buildTimeline, renderTimeline, type TimelineRow } from './timeline.js';

export interface CacheDatabaseOptions {
    logger?: TdsLogger | null;
    /** Options for every blob decode; its logger defaults to `logger`. */
    decoder?: DecoderOptions;
}

/** Blob date and row date may differ by less than this many seconds. */
const MAX_DATE_SKEW = 5;

export const TIMELINE_FILE = 'timeline.csv';

/**
 * Reads the cache tables, decodes every blob column and projects the result
 * into per-table dumps and the timeline.
 *
 * Consistency problems in the cache are logged as warnings. Rows whose
 * blob disagrees with their columns are still projected; of the rows
 * sharing a key only the first is kept, and a row without a key is skipped.
 */
export class CacheDatabase {
    private readonly source: CacheSource;
    private readonly logger: TdsLogger | null;
    private readonly decoderOptions: DecoderOptions;

    private readonly chats = new Map<bigint, ChatEntry>();
    private readonly contacts = new Map<bigint, number>();
    private readonly dialogs = new Map<bigint, DialogEntry>();
    private readonly encChats = new Map<bigint, EncryptedChatEntry>();
    private readonly media = new Map<bigint, MediaEntry>();
    private readonly messages = new Map<bigint, MessageEntry>();
    private readonly sentFiles = new Map<string, SentFileEntry>();
    private readonly users = new Map<bigint, UserEntry>();
    private readonly userSettings = new Map<bigint, UserSettingsEntry>();

    constructor(source: CacheSource, options: CacheDatabaseOptions = {}) {
        this.source = source;
        this.logger = options.logger ?? null;
        this.decoderOptions = { ...options.decoder, logger: options.decoder?.logger ?? this.logger };
    }

    static open(file: string, options: CacheDatabaseOptions = {}): CacheDatabase {
        return new CacheDatabase(SqliteCacheSource.open(file, options.logger ?? null), options);
    }

    get tables(): CacheTables {
        return {
            chats: this.chats,
            contacts: this.contacts,
            dialogs: this.dialogs,
            encChats: this.encChats,
            media: this.media,
            messages: this.messages,
            sentFiles: this.sentFiles,
            users: this.users,
            userSettings: this.userSettings,
        };
    }

    parse(): void {
        this.parseChats();
        this.parseContacts();
        this.parseDialogs();
        this.parseEncChats();
        this.parseMedia();
        this.parseMessages();
        this.parseSentFiles();
        this.parseUsers();
        this.parseUserSettings();
    }

    saveParsedTables(outDir: string): void {
        for (const [file, contents] of dumpTables(this.tables)) {
            fs.writeFileSync(path.join(outDir, file), contents, 'utf8');
        }
    }

    timeline(): TimelineRow[] {
        return buildTimeline(this.tables, this.logger);
    }

    createTimeline(outDir: string): void {
        fs.writeFileSync(path.join(outDir, TIMELINE_FILE), renderTimeline(this.timeline()), 'utf8');
    }

    close(): void {
        this.source.close();
    }

    // --- TABLE READERS ---

    private rows(table: string): SqlRow[] {
        return this.source.readTable(table) ?? [];
    }

    private decode(table: string, key: bigint | string, bytes: Uint8Array | null): DecodeResult | null {
        if (!bytes) {
            this.logger?.error?.(`${table} uid:${key} blob is not made by bytes, skipping it`);
            return null;
        }
        return decodeBlob(bytes, this.decoderOptions);
    }

    /** False, with a warning, for a zero or repeated key. */
    private acceptKey<K>(table: string, key: K, seen: ReadonlyMap<K, unknown>): boolean {
        if (!key) {
            this.logger?.warn?.(`${table}: row without a key, skipping it`);
            return false;
        }
        if (seen.has(key)) {
            this.logger?.warn?.(`${table}: duplicate key ${String(key)}, keeping the first row`);
            return false;
        }
        this.logger?.debug?.(`parsing ${table}, entry uid: ${String(key)}`);
        return true;
    }

    private parseChats(): void {
        for (const row of this.rows('chats')) {
            const uid = intColumn(row, 'uid');
            if (!this.acceptKey('chats', uid, this.chats)) continue;
            const blob = this.decode('chats', uid, blobColumn(row, 'data'));
            this.chats.set(uid, new ChatEntry(uid, textColumn(row, 'name'), blob));
        }
    }

    private parseContacts(): void {
        for (const row of this.rows('contacts')) {
            const uid = intColumn(row, 'uid');
            if (!this.acceptKey('contacts', uid, this.contacts)) continue;
            this.contacts.set(uid, numColumn(row, 'mutual'));
        }
    }

    private parseDialogs(): void {
        for (const row of this.rows('dialogs')) {
            const did = intColumn(row, 'did');
            if (!this.acceptKey('dialogs', did, this.dialogs)) continue;
            this.dialogs.set(did, new DialogEntry(row));
        }
    }

    private parseEncChats(): void {
        for (const row of this.rows('enc_chats')) {
            const uid = intColumn(row, 'uid');
            if (!this.acceptKey('enc_chats', uid, this.encChats)) continue;
            const blob = this.decode('enc_chats', uid, blobColumn(row, 'data'));
            const entry = new EncryptedChatEntry({
                uid,
                user: intColumn(row, 'user'),
                name: textColumn(row, 'name'),
                g: blobColumn(row, 'g'),
                authkey: blobColumn(row, 'authkey'),
                ttl: numColumn(row, 'ttl'),
                layer: numColumn(row, 'layer'),
                seqIn: numColumn(row, 'seq_in'),
                seqOut: numColumn(row, 'seq_out'),
                useCount: numColumn(row, 'use_count'),
                exchangeId: intColumn(row, 'exchange_id'),
                keyDate: numColumn(row, 'key_date'),
                fprint: intColumn(row, 'fprint'),
                fauthkey: blobColumn(row, 'fauthkey'),
                khash: blobColumn(row, 'khash'),
                inSeqNo: numColumn(row, 'in_seq_no'),
                adminId: intColumn(row, 'admin_id'),
                mtprotoSeq: numColumn(row, 'mtproto_seq'),
            }, blob);

            const blobAdmin = numberField(entry.record, 'admin_id');
            if (blobAdmin && BigInt(blobAdmin) !== entry.adminId) {
                this.logger?.warn?.(`enc_chats uid:${uid} admin_id ${entry.adminId} differs from blob admin_id ${blobAdmin}`);
            }
            const blobParticipant = numberField(entry.record, 'participant_id');
            const user = entry.columns.user;
            if (blobParticipant && user !== entry.adminId && user !== BigInt(blobParticipant)) {
                this.logger?.warn?.(`enc_chats uid:${uid} user ${user} differs from blob participant_id ${blobParticipant}`);
            }
            if (entry.participantId === null) {
                this.logger?.warn?.(`encrypted chat ${uid} has not a valid participant_id!`);
            }
            this.encChats.set(uid, entry);
        }
    }

    private parseMedia(): void {
        for (const row of this.rows('media_v2')) {
            const mid = intColumn(row, 'mid');
            if (!this.acceptKey('media_v2', mid, this.media)) continue;
            const blob = this.decode('media_v2', mid, blobColumn(row, 'data'));
            this.media.set(mid, new MediaEntry(
                mid, intColumn(row, 'uid'), numColumn(row, 'date'), numColumn(row, 'type'), blob,
            ));
        }
    }

    private parseMessages(): void {
        for (const row of this.rows('messages')) {
            const mid = intColumn(row, 'mid');
            if (!this.acceptKey('messages', mid, this.messages)) continue;
            const blob = this.decode('messages', mid, blobColumn(row, 'data'));
            const replyBytes = blobColumn(row, 'replydata');
            const reply = replyBytes && replyBytes.length > 0 ? decodeBlob(replyBytes, this.decoderOptions) : null;
            const message = new MessageEntry({
                mid,
                uid: intColumn(row, 'uid'),
                readState: numColumn(row, 'read_state'),
                sendState: numColumn(row, 'send_state'),
                date: numColumn(row, 'date'),
                out: numColumn(row, 'out'),
                ttl: numColumn(row, 'ttl'),
                media: numColumn(row, 'media'),
                imp: numColumn(row, 'imp'),
                mention: numColumn(row, 'mention'),
            }, blob, reply);

            const blobDate = message.dateFromBlob;
            if (blobDate && Math.abs(blobDate - message.columns.date) >= MAX_DATE_SKEW) {
                this.logger?.warn?.(
                    `message ${mid}: blob date ${blobDate} differs from row date ${message.columns.date}`
                );
            }
            this.messages.set(mid, message);
        }
    }

    private parseSentFiles(): void {
        for (const row of this.rows('sent_files_v2')) {
            const uid = textColumn(row, 'uid');
            if (!this.acceptKey('sent_files_v2', uid, this.sentFiles)) continue;
            const blob = this.decode('sent_files_v2', uid, blobColumn(row, 'data'));
            // Older clients have neither `type` nor `parent`.
            const type = optionalColumn(row, 'type');
            const parent = 'parent' in row && row.parent !== null ? textColumn(row, 'parent') : null;
            this.sentFiles.set(uid, new SentFileEntry(uid, type === null ? 0 : Number(type), parent, blob));
        }
    }

    private parseUsers(): void {
        let selfUsers = 0;
        for (const row of this.rows('users')) {
            const uid = intColumn(row, 'uid');
            if (!this.acceptKey('users', uid, this.users)) continue;
            const blob = this.decode('users', uid, blobColumn(row, 'data'));
            const user = new UserEntry(uid, textColumn(row, 'name'), numColumn(row, 'status'), blob);
            if (user.blobId !== null && BigInt(user.blobId) !== uid) {
                this.logger?.warn?.(`users uid:${uid} differs from blob id ${user.blobId}`);
            }
            if (user.isSelf) selfUsers++;
            this.users.set(uid, user);
        }
        if (this.users.size > 0 && selfUsers !== 1) {
            this.logger?.warn?.(`users: expected exactly one self user, found ${selfUsers}`);
        }
    }

    private parseUserSettings(): void {
        for (const row of this.rows('user_settings')) {
            const uid = intColumn(row, 'uid');
            if (!this.acceptKey('user_settings', uid, this.userSettings)) continue;
            const blob = this.decode('user_settings', uid, blobColumn(row, 'info'));
            this.userSettings.set(uid, new UserSettingsEntry(uid, numColumn(row, 'pinned'), blob));
        }
    }
}
