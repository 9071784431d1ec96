// ABOUTME: SQLite cache of session-derived data: chats, messages, downloaded files, current user.
// ABOUTME: Deduplicates pushed messages by id and is wiped when the session closes.

import Database from "better-sqlite3";
import type { ChatMessage, ChatSummary, UserProfile } from "./transport.js";

interface ChatRow {
  id: string;
  title: string;
  username: string | null;
  unread_count: number;
  last_message_at: number | null;
}

interface MessageRow {
  id: string;
  chat_id: string;
  sender_id: string;
  is_outgoing: number;
  date: number;
  text: string | null;
  voice_file_id: string | null;
  voice_duration: number | null;
  voice_waveform: string | null;
  local_path: string | null;
}

export class MessageStore {
  private readonly db: Database.Database;

  /**
   * Open the cache. Use ":memory:" for tests or a file path for production.
   */
  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chats (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        username TEXT,
        unread_count INTEGER NOT NULL DEFAULT 0,
        last_message_at INTEGER
      );
      CREATE TABLE IF NOT EXISTS messages (
        chat_id TEXT NOT NULL,
        id TEXT NOT NULL,
        sender_id TEXT NOT NULL,
        is_outgoing INTEGER NOT NULL,
        date INTEGER NOT NULL,
        text TEXT,
        voice_file_id TEXT,
        voice_duration INTEGER,
        voice_waveform TEXT,
        PRIMARY KEY (chat_id, id)
      );
      CREATE INDEX IF NOT EXISTS idx_messages_chat_date
        ON messages(chat_id, date);
      CREATE TABLE IF NOT EXISTS files (
        file_id TEXT PRIMARY KEY,
        local_path TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS current_user (
        slot INTEGER PRIMARY KEY CHECK (slot = 1),
        profile TEXT NOT NULL
      );
    `);
  }

  upsertChats(chats: ChatSummary[]): void {
    const stmt = this.db.prepare(
      `INSERT INTO chats (id, title, username, unread_count, last_message_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         title = excluded.title,
         username = excluded.username,
         unread_count = excluded.unread_count,
         last_message_at = excluded.last_message_at`,
    );
    const upsertAll = this.db.transaction((rows: ChatSummary[]) => {
      for (const c of rows) {
        stmt.run(c.id, c.title, c.username, c.unreadCount, c.lastMessageAt);
      }
    });
    upsertAll(chats);
  }

  listChats(): ChatSummary[] {
    const rows = this.db
      .prepare<[], ChatRow>(
        `SELECT * FROM chats
         ORDER BY last_message_at IS NULL, last_message_at DESC, title`,
      )
      .all();
    return rows.map((r) => ({
      id: r.id,
      title: r.title,
      username: r.username,
      unreadCount: r.unread_count,
      lastMessageAt: r.last_message_at,
    }));
  }

  /**
   * Store a message. Returns false when a message with the same id was already stored.
   */
  insertMessage(message: ChatMessage): boolean {
    const voice = message.voice;
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO messages
           (chat_id, id, sender_id, is_outgoing, date, text, voice_file_id, voice_duration, voice_waveform)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        message.chatId,
        message.id,
        message.senderId,
        message.isOutgoing ? 1 : 0,
        message.date,
        message.text,
        voice?.fileId ?? null,
        voice?.durationSeconds ?? null,
        voice?.waveform ? JSON.stringify(voice.waveform) : null,
      );

    if (voice?.localPath) {
      this.setLocalPath(voice.fileId, voice.localPath);
    }
    return result.changes > 0;
  }

  /**
   * The latest `limit` messages of a chat, oldest first.
   */
  getMessages(chatId: string, limit: number): ChatMessage[] {
    const rows = this.db
      .prepare<[string, number], MessageRow>(
        `SELECT m.*, f.local_path AS local_path
         FROM messages m
         LEFT JOIN files f ON f.file_id = m.voice_file_id
         WHERE m.chat_id = ?
         ORDER BY m.date DESC, m.rowid DESC
         LIMIT ?`,
      )
      .all(chatId, limit);
    return rows.reverse().map(toMessage);
  }

  setLocalPath(fileId: string, localPath: string): void {
    this.db
      .prepare(
        `INSERT INTO files (file_id, local_path) VALUES (?, ?)
         ON CONFLICT(file_id) DO UPDATE SET local_path = excluded.local_path`,
      )
      .run(fileId, localPath);
  }

  findLocalPath(fileId: string): string | null {
    const row = this.db
      .prepare<[string], { local_path: string }>(`SELECT local_path FROM files WHERE file_id = ?`)
      .get(fileId);
    return row?.local_path ?? null;
  }

  setCurrentUser(user: UserProfile): void {
    this.db
      .prepare(
        `INSERT INTO current_user (slot, profile) VALUES (1, ?)
         ON CONFLICT(slot) DO UPDATE SET profile = excluded.profile`,
      )
      .run(JSON.stringify(user));
  }

  getCurrentUser(): UserProfile | null {
    const row = this.db
      .prepare<[], { profile: string }>(`SELECT profile FROM current_user WHERE slot = 1`)
      .get();
    if (!row) return null;
    const profile: UserProfile = JSON.parse(row.profile);
    return profile;
  }

  /**
   * Drop everything derived from the session.
   */
  clear(): void {
    this.db.exec(`
      DELETE FROM messages;
      DELETE FROM chats;
      DELETE FROM files;
      DELETE FROM current_user;
    `);
  }

  close(): void {
    this.db.close();
  }
}

function toMessage(row: MessageRow): ChatMessage {
  const waveform: number[] | null = row.voice_waveform ? JSON.parse(row.voice_waveform) : null;
  return {
    id: row.id,
    chatId: row.chat_id,
    senderId: row.sender_id,
    isOutgoing: row.is_outgoing === 1,
    date: row.date,
    text: row.text,
    voice:
      row.voice_file_id === null
        ? null
        : {
            fileId: row.voice_file_id,
            durationSeconds: row.voice_duration ?? 0,
            waveform,
            localPath: row.local_path,
          },
  };
}
