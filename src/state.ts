/**
 * state.ts — SQLite-backed conversation state
 *
 * What survives a bot restart:
 *   1. Per chat: the agent thread id, whether we asked for the user's name,
 *      channel and last-seen time
 *   2. Per user: the name they gave us
 *   3. Settings: the id of the agent the registrar created
 *
 * Schema
 * ──────
 *   conversations(chat_id, thread_id, prompted_for_name, channel_id, last_seen)
 *   user_profiles(user_id, name, ts)
 *   settings(key, value)
 *
 * All operations are synchronous (better-sqlite3 API).
 * Pass ":memory:" for a throwaway database.
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";

export interface ConversationData {
    threadId: string | null;
    promptedForName: boolean;
    channelId: string | null;
    /** ISO timestamp of the last message */
    lastSeen: string | null;
}

export interface StateStore {
    getConversation(chatId: string): ConversationData;
    saveConversation(chatId: string, data: ConversationData): void;
    /** Forget the agent thread (used by /clear); the user's name is kept */
    resetConversation(chatId: string): void;
    countConversations(): number;

    getUserName(userId: string): string | null;
    setUserName(userId: string, name: string): void;

    getSetting(key: string): string | null;
    setSetting(key: string, value: string): void;
    deleteSetting(key: string): void;

    close(): void;
}

/** settings key holding the registered agent id */
export const AGENT_ID_SETTING = "agent_id";

const EMPTY_CONVERSATION: ConversationData = {
    threadId: null,
    promptedForName: false,
    channelId: null,
    lastSeen: null,
};

interface ConversationRow {
    thread_id: string | null;
    prompted_for_name: number;
    channel_id: string | null;
    last_seen: string | null;
}

function openDb(dbPath: string): Database.Database {
    if (dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath);

    // WAL mode for better write performance
    if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");

    db.exec(`
        CREATE TABLE IF NOT EXISTS conversations (
            chat_id           TEXT    PRIMARY KEY,
            thread_id         TEXT,
            prompted_for_name INTEGER NOT NULL DEFAULT 0,
            channel_id        TEXT,
            last_seen         TEXT
        );

        CREATE TABLE IF NOT EXISTS user_profiles (
            user_id TEXT    PRIMARY KEY,
            name    TEXT    NOT NULL,
            ts      INTEGER NOT NULL DEFAULT (unixepoch())
        );

        CREATE TABLE IF NOT EXISTS settings (
            key   TEXT PRIMARY KEY,
            value TEXT NOT NULL
        );
    `);

    logger.info("State DB ready", { path: dbPath });
    return db;
}

export function createStateStore(dbPath: string): StateStore {
    const db = openDb(dbPath);

    const stmtGetConv = db.prepare<[string], ConversationRow>(
        "SELECT thread_id, prompted_for_name, channel_id, last_seen FROM conversations WHERE chat_id = ?"
    );
    const stmtUpsertConv = db.prepare<[string, string | null, number, string | null, string | null]>(
        `INSERT INTO conversations (chat_id, thread_id, prompted_for_name, channel_id, last_seen)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(chat_id) DO UPDATE SET
            thread_id = excluded.thread_id,
            prompted_for_name = excluded.prompted_for_name,
            channel_id = excluded.channel_id,
            last_seen = excluded.last_seen`
    );
    const stmtResetConv = db.prepare<[string]>(
        "UPDATE conversations SET thread_id = NULL WHERE chat_id = ?"
    );
    const stmtCountConv = db.prepare<[], { n: number }>(
        "SELECT COUNT(*) AS n FROM conversations"
    );

    const stmtGetUser = db.prepare<[string], { name: string }>(
        "SELECT name FROM user_profiles WHERE user_id = ?"
    );
    const stmtSetUser = db.prepare<[string, string]>(
        `INSERT INTO user_profiles (user_id, name) VALUES (?, ?)
         ON CONFLICT(user_id) DO UPDATE SET name = excluded.name, ts = unixepoch()`
    );

    const stmtGetSetting = db.prepare<[string], { value: string }>(
        "SELECT value FROM settings WHERE key = ?"
    );
    const stmtSetSetting = db.prepare<[string, string]>(
        `INSERT INTO settings (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
    );
    const stmtDeleteSetting = db.prepare<[string]>("DELETE FROM settings WHERE key = ?");

    return {
        getConversation(chatId) {
            const row = stmtGetConv.get(chatId);
            if (!row) return { ...EMPTY_CONVERSATION };
            return {
                threadId: row.thread_id,
                promptedForName: row.prompted_for_name === 1,
                channelId: row.channel_id,
                lastSeen: row.last_seen,
            };
        },

        saveConversation(chatId, data) {
            stmtUpsertConv.run(
                chatId,
                data.threadId,
                data.promptedForName ? 1 : 0,
                data.channelId,
                data.lastSeen
            );
        },

        resetConversation(chatId) {
            stmtResetConv.run(chatId);
        },

        countConversations() {
            return stmtCountConv.get()?.n ?? 0;
        },

        getUserName(userId) {
            return stmtGetUser.get(userId)?.name ?? null;
        },

        setUserName(userId, name) {
            stmtSetUser.run(userId, name);
        },

        getSetting(key) {
            return stmtGetSetting.get(key)?.value ?? null;
        },

        setSetting(key, value) {
            stmtSetSetting.run(key, value);
        },

        deleteSetting(key) {
            stmtDeleteSetting.run(key);
        },

        close() {
            db.close();
        },
    };
}
