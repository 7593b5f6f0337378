import Database from 'better-sqlite3';
import { tds } from './tds-writer.js';

export const EPOCH = 1_600_000_000;

const SCHEMA = `
    CREATE TABLE chats (uid INTEGER, name TEXT, data BLOB);
    CREATE TABLE contacts (uid INTEGER, mutual INTEGER);
    CREATE TABLE dialogs (did INTEGER, date INTEGER, unread_count INTEGER, last_mid INTEGER, inbox_max INTEGER,
        outbox_max INTEGER, last_mid_i INTEGER, unread_count_i INTEGER, pts INTEGER, date_i INTEGER,
        pinned INTEGER, flags INTEGER);
    CREATE TABLE media_v2 (mid INTEGER, uid INTEGER, date INTEGER, type INTEGER, data BLOB);
    CREATE TABLE messages (mid INTEGER, uid INTEGER, read_state INTEGER, send_state INTEGER, date INTEGER,
        data BLOB, out INTEGER, ttl INTEGER, media INTEGER, replydata BLOB, imp INTEGER, mention INTEGER);
    CREATE TABLE sent_files_v2 (uid TEXT, data BLOB);
    CREATE TABLE users (uid INTEGER, name TEXT, status INTEGER, data BLOB);
    CREATE TABLE user_settings (uid INTEGER, info BLOB, pinned INTEGER);
`;

/** Public broadcast channel "News" (@news) with 250 members. */
export function channelBlob(): Buffer {
    return Buffer.from(tds().sig(0x4df30834).uint32(32 | 64 | 8192 | 131072)
        .int32(1001).int64(5n).tstring('News').tstring('news')
        .sig(0x37c1011c).uint32(1_500_000_000).int32(0).int32(250).build());
}

/** The cache owner: user 42, first name Ann. */
export function ownerBlob(): Buffer {
    return Buffer.from(tds().sig(0x938458c1).uint32(2 | 1024).int32(42).tstring('Ann').build());
}

/** Private message 77 from user 42 to user 43. */
export function messageBlob(): Buffer {
    return Buffer.from(tds().sig(0x452c0e65).uint32(256).int32(77).int32(42)
        .sig(0x9db1bc6d).int32(43).uint32(EPOCH).tstring('hi').build());
}

/**
 * Cache with one channel, its dialog, the owner (listed twice in contacts),
 * a readable and a corrupt message and one sent file. There is no
 * `enc_chats` table, and `sent_files_v2` has neither `type` nor `parent`.
 */
export function populateCache(db: Database.Database): void {
    db.exec(SCHEMA);
    db.prepare('INSERT INTO chats VALUES (?, ?, ?)').run(1001, 'news', channelBlob());
    const contact = db.prepare('INSERT INTO contacts VALUES (?, ?)');
    contact.run(42, 1);
    contact.run(42, 0);
    db.prepare('INSERT INTO dialogs VALUES (?, ?, 0, 77, 0, 0, 0, 0, 0, 0, 0, 0)').run(-1001, EPOCH + 50);
    db.prepare('INSERT INTO users VALUES (?, ?, ?, ?)').run(42, 'ann', EPOCH + 100, ownerBlob());
    const message = db.prepare('INSERT INTO messages VALUES (?, ?, 0, 0, ?, ?, 0, 0, 0, NULL, 0, 0)');
    message.run(77, 42, EPOCH, messageBlob());
    message.run(78, 42, EPOCH, Buffer.from(tds().sig(0xdeadbeef).build()));
    db.prepare('INSERT INTO sent_files_v2 VALUES (?, ?)').run('abc', Buffer.from(tds().sig(0x36f8c871).int64(1n).build()));
}

export function createCache(file: string = ':memory:'): Database.Database {
    const db = new Database(file);
    populateCache(db);
    return db;
}
