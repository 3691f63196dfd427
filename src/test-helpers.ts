/**
 * test-helpers.ts — In-process Telegram Bot API for bot tests
 *
 * createBot() is pointed at this server through `apiRoot`, so grammY runs its
 * real client code against 127.0.0.1 and every outgoing call is recorded.
 */

import { once } from "node:events";
import type { Server } from "node:http";
import express, { type Express } from "express";
import type { Update } from "grammy/types";

export const TEST_BOT_TOKEN = "test-token";

export const TEST_BOT_INFO = {
    id: 42,
    is_bot: true,
    first_name: "Bridge",
    username: "bridge_test_bot",
    can_join_groups: true,
    can_read_all_group_messages: false,
    supports_inline_queries: false,
};

export interface ApiCall {
    method: string;
    payload: Record<string, unknown>;
}

export interface Listening {
    url: string;
    close(): Promise<void>;
}

/** Serve an express app on a free local port */
export async function listen(app: Express): Promise<Listening> {
    const server: Server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") {
        throw new Error("Expected the test server to listen on a TCP port");
    }
    return {
        url: `http://127.0.0.1:${address.port}`,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.closeAllConnections();
                server.close((err) => (err ? reject(err) : resolve()));
            }),
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface FakeBotApi {
    apiRoot: string;
    calls: ApiCall[];
    /** Texts of every sendMessage, in order */
    texts(): string[];
    close(): Promise<void>;
}

export async function startFakeBotApi(): Promise<FakeBotApi> {
    const calls: ApiCall[] = [];
    let messageId = 0;

    const app = express();
    app.use(express.json());
    app.post("/:bot/:method", (req, res) => {
        const { method } = req.params;
        const payload: Record<string, unknown> = isRecord(req.body) ? req.body : {};
        calls.push({ method, payload });

        switch (method) {
            case "getMe":
                res.json({ ok: true, result: TEST_BOT_INFO });
                return;
            case "sendMessage":
                res.json({
                    ok: true,
                    result: {
                        message_id: ++messageId,
                        date: 0,
                        chat: { id: payload["chat_id"], type: "private", first_name: "Ada" },
                        text: payload["text"],
                    },
                });
                return;
            default:
                res.json({ ok: true, result: true });
        }
    });

    const server = await listen(app);
    return {
        apiRoot: server.url,
        calls,
        texts: () =>
            calls
                .filter((c) => c.method === "sendMessage")
                .map((c) => c.payload["text"])
                .filter((t): t is string => typeof t === "string"),
        close: () => server.close(),
    };
}

let nextUpdateId = 0;

/** A private-chat text message, marked as a command when it starts with "/" */
export function textUpdate(text: string, userId = 7, chatId = 100): Update {
    const commandEnd = text.indexOf(" ");
    const entities = text.startsWith("/")
        ? [{ type: "bot_command" as const, offset: 0, length: commandEnd === -1 ? text.length : commandEnd }]
        : undefined;

    return {
        update_id: ++nextUpdateId,
        message: {
            message_id: nextUpdateId,
            date: 0,
            chat: { id: chatId, type: "private", first_name: "Ada" },
            from: { id: userId, is_bot: false, first_name: "Ada" },
            text,
            ...(entities ? { entities } : {}),
        },
    };
}
