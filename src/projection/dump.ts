/**
 * Per-table text dumps (`table_<name>.txt`): a separator line, the row's
 * SQL metadata, then the decoded record tree.
 */
import type { DecodeResult } from '../tds/decode.js';
import { hexBytes } from '../tds/format.js';
import { formatInline, renderRecord } from '../tds/render.js';
import type { MediaEntry, SentFileEntry, UserSettingsEntry } from './entities.js';
import { toDate } from './fields.js';
import type { TimelineTables } from './timeline.js';

export const SEPARATOR_LINE = '-'.repeat(80);

export interface CacheTables extends TimelineTables {
    contacts: ReadonlyMap<bigint, number>;
    media: ReadonlyMap<bigint, MediaEntry>;
    sentFiles: ReadonlyMap<string, SentFileEntry>;
    userSettings: ReadonlyMap<bigint, UserSettingsEntry>;
}

/** Record tree, or a one-line marker for a blob that did not decode fully. */
export function renderDecoded(result: DecodeResult | null): string {
    if (!result) return '<no data>';
    if (!result.ok) return `<decode failed: ${result.error.name}: ${result.error.message}>`;
    const tree = typeof result.value === 'boolean' ? formatInline(result.value) : renderRecord(result.value);
    return result.unconsumed ? `${tree}\n<partial: ${result.unconsumed.length} unconsumed bytes>` : tree;
}

function userLine(tables: CacheTables, uid: bigint): string {
    const user = tables.users.get(uid);
    return user ? `From [users] -> ${user.fullTextId}` : 'User uid missing in [users]';
}

function bytesText(bytes: Uint8Array | null): string {
    return bytes ? hexBytes(bytes) : '';
}

export function dumpChats(tables: CacheTables): string {
    let out = '';
    for (const [uid, chat] of tables.chats) {
        out += `${SEPARATOR_LINE}\nuid: ${uid} name: ${chat.name}\n\n${renderDecoded(chat.blob)}\n\n`;
    }
    return out;
}

export function dumpContacts(tables: CacheTables): string {
    let out = '';
    for (const [uid, mutual] of tables.contacts) {
        out += `${SEPARATOR_LINE}\nuid: ${uid} mutual: ${mutual}\n${userLine(tables, uid)}\n`;
    }
    return out;
}

export function dumpDialogs(tables: CacheTables): string {
    let out = '';
    for (const [did, d] of tables.dialogs) {
        out += `${SEPARATOR_LINE}\ndid: ${did}, date: ${d.date} [${toDate(d.date)}]\n`
            + `unread_count: ${d.unreadCount}, last_mid: ${d.lastMid}, inbox_max: ${d.inboxMax}, `
            + `outbox_max: ${d.outboxMax}, last_mid_i: ${d.lastMidI}\n`
            + `unread_count_i: ${d.unreadCountI}, pts: ${d.pts}, date_i: ${d.dateI}, pinned: ${d.pinned}, `
            + `flags: ${d.flags}\n\n`;
    }
    return out;
}

export function dumpEncChats(tables: CacheTables): string {
    let out = '';
    for (const encChat of tables.encChats.values()) {
        const c = encChat.columns;
        out += `${SEPARATOR_LINE}\nuid: ${c.uid} user: ${c.user} name: ${c.name}\n\n`
            + `g: ${bytesText(c.g)}\nauthkey: ${bytesText(c.authkey)}\n`
            + `ttl: ${c.ttl} layer: ${c.layer} seq_in: ${c.seqIn} seq_out: ${c.seqOut} use_count: ${c.useCount}\n`
            + `exchange_id: ${c.exchangeId} key_date: ${c.keyDate} fprint: ${c.fprint}\n`
            + `fauthkey: ${bytesText(c.fauthkey)}\nkhash: ${bytesText(c.khash)}\n`
            + `in_seq_no: ${c.inSeqNo} admin_id: ${c.adminId} mtproto_seq: ${c.mtprotoSeq}\n`
            + `\n${renderDecoded(encChat.blob)}\n\n`;
    }
    return out;
}

export function dumpMedia(tables: CacheTables): string {
    let out = '';
    for (const [mid, media] of tables.media) {
        out += `${SEPARATOR_LINE}\nmid: ${mid} uid: ${media.uid} date: ${media.date} [${toDate(media.date)}] `
            + `type: ${media.type}\n${userLine(tables, media.uid)}\n\n${renderDecoded(media.blob)}\n\n`;
    }
    return out;
}

export function dumpMessages(tables: CacheTables): string {
    let out = '';
    for (const message of tables.messages.values()) {
        const c = message.columns;
        out += `${SEPARATOR_LINE}\nmid: ${c.mid} uid: ${c.uid} read_state: ${c.readState} send_state: ${c.sendState} `
            + `date: ${c.date} out: ${c.out} ttl: ${c.ttl} media: ${c.media} imp: ${c.imp} mention: ${c.mention}\n`
            + `${userLine(tables, c.uid)}\n\n${renderDecoded(message.blob)}\n`;
        if (message.replyBlob) {
            out += `\n----- IS REPLY  TO ---\n\n${renderDecoded(message.replyBlob)}\n`;
        }
        out += '\n';
    }
    return out;
}

export function dumpSentFiles(tables: CacheTables): string {
    let out = '';
    for (const file of tables.sentFiles.values()) {
        out += `${SEPARATOR_LINE}\nuid: ${file.uid} type: ${file.type} parent: ${file.parent ?? ''}\n\n`
            + `${renderDecoded(file.blob)}\n\n`;
    }
    return out;
}

export function dumpUsers(tables: CacheTables): string {
    let out = '';
    for (const user of tables.users.values()) {
        // A positive status is the epoch of the last status change.
        const status = user.status > 0 ? toDate(user.status) : String(user.status);
        out += `${SEPARATOR_LINE}\nuid: ${user.uid} name: ${user.name} status: ${status}\n`
            + `${user.fullTextId}\n\n${renderDecoded(user.blob)}\n\n`;
    }
    return out;
}

export function dumpUserSettings(tables: CacheTables): string {
    let out = '';
    for (const settings of tables.userSettings.values()) {
        out += `${SEPARATOR_LINE}\nuid: ${settings.uid} pinned: ${settings.pinned}\n`
            + `${userLine(tables, settings.uid)}\n\n${renderDecoded(settings.blob)}\n\n`;
    }
    return out;
}

/** Dump file name → contents, in table order. */
export function dumpTables(tables: CacheTables): Map<string, string> {
    return new Map([
        ['table_chats.txt', dumpChats(tables)],
        ['table_contacts.txt', dumpContacts(tables)],
        ['table_dialogs.txt', dumpDialogs(tables)],
        ['table_enc_chats.txt', dumpEncChats(tables)],
        ['table_media_v2.txt', dumpMedia(tables)],
        ['table_messages.txt', dumpMessages(tables)],
        ['table_sent_files_v2.txt', dumpSentFiles(tables)],
        ['table_users.txt', dumpUsers(tables)],
        ['table_user_settings.txt', dumpUserSettings(tables)],
    ]);
}
