import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { Bot } from "grammy";
import { createBot, createWebhookServer, formatToolList, type BotDeps } from "./bot.js";
import { ConversationHost, type TurnRunner } from "./conversation.js";
import { createStateStore, type StateStore } from "./state.js";
import { toToolDescriptor } from "./mcp/client.js";
import { STORAGE_TOOLS } from "./mcp/test-helpers.js";
import { synthesizeStubs } from "./tools/mcp-bridge.js";
import { ConnectionError } from "./errors.js";
import type { SyncResult } from "./sync.js";
import {
    TEST_BOT_TOKEN,
    listen,
    startFakeBotApi,
    textUpdate,
    type FakeBotApi,
    type Listening,
} from "./test-helpers.js";

const CATALOG = STORAGE_TOOLS.map(toToolDescriptor);

describe("formatToolList", () => {
    it("reports an empty catalog", () => {
        expect(formatToolList([])).toBe("🔌 No tools discovered on the MCP server.");
    });

    it("lists tools with optional parameters marked", () => {
        const tools = [
            toToolDescriptor({ name: "list_containers", description: "List containers", inputSchema: { type: "object" } }),
            toToolDescriptor({
                name: "upload_blob",
                inputSchema: {
                    type: "object",
                    properties: { blob_name: { type: "string" }, overwrite: { type: "boolean" } },
                    required: ["blob_name"],
                },
            }),
        ];

        expect(formatToolList(tools)).toBe(
            "🔌 MCP tools (2)\n\n" +
            "• list_containers()\n   List containers\n" +
            "• upload_blob(blob_name, overwrite?)" +
            "\n\nUsage: /tools reload"
        );
    });
});

describe("createBot", () => {
    let api: FakeBotApi;
    let state: StateStore;
    let runTurn: Mock<TurnRunner>;
    let resync: Mock<() => Promise<SyncResult>>;

    function makeBot(overrides: Partial<BotDeps> = {}): Bot {
        return createBot({
            token: TEST_BOT_TOKEN,
            apiRoot: api.apiRoot,
            allowedUserIds: [],
            host: new ConversationHost(state, runTurn),
            tools: () => CATALOG,
            resync,
            status: () => ({ agentId: "asst_1", conversations: 1, mcpUrl: "http://localhost:8000/sse", connected: true }),
            ...overrides,
        });
    }

    async function send(bot: Bot, text: string, userId = 7): Promise<void> {
        await bot.init();
        await bot.handleUpdate(textUpdate(text, userId));
    }

    beforeEach(async () => {
        api = await startFakeBotApi();
        state = createStateStore(":memory:");
        state.setUserName("7", "Ada");
        runTurn = vi.fn<TurnRunner>(async (threadId) => ({
            reply: "Here is the news.",
            threadId: threadId ?? "thread_1",
            status: "completed",
        }));
        resync = vi.fn<() => Promise<SyncResult>>();
    });

    afterEach(async () => {
        state.close();
        await api.close();
    });

    it("answers a text message with the agent's reply", async () => {
        await send(makeBot(), "What is new in Lisbon?");

        expect(runTurn).toHaveBeenCalledWith(null, "What is new in Lisbon?");
        expect(api.calls.find((c) => c.method === "sendChatAction")?.payload).toMatchObject({
            chat_id: 100,
            action: "typing",
        });
        expect(api.texts()).toEqual(["Here is the news."]);
        expect(state.getConversation("100")).toMatchObject({ threadId: "thread_1", channelId: "telegram" });
    });

    it("drops updates from users outside the whitelist", async () => {
        await send(makeBot({ allowedUserIds: [99] }), "hello", 7);

        expect(runTurn).not.toHaveBeenCalled();
        expect(api.calls.map((c) => c.method)).toEqual(["getMe"]);
    });

    it("lets whitelisted users through", async () => {
        await send(makeBot({ allowedUserIds: [99, 7] }), "hello", 7);

        expect(api.texts()).toEqual(["Here is the news."]);
    });

    it("apologises when the turn fails", async () => {
        runTurn.mockRejectedValue(new Error("run failed"));

        await send(makeBot(), "hello");

        expect(api.texts()).toEqual(["❌ The bot encountered an error. Check the logs and try again."]);
    });

    it("forgets the thread on /clear", async () => {
        state.saveConversation("100", {
            threadId: "thread_9",
            promptedForName: false,
            channelId: "telegram",
            lastSeen: "2026-10-19T09:00:00.000Z",
        });

        await send(makeBot(), "/clear");

        expect(api.texts()).toEqual(["🧹 Conversation cleared. The next message starts a fresh thread."]);
        expect(state.getConversation("100").threadId).toBeNull();
        expect(runTurn).not.toHaveBeenCalled();
    });

    it("lists the catalog on /tools", async () => {
        await send(makeBot(), "/tools");

        expect(api.texts()).toEqual([formatToolList(CATALOG)]);
    });

    it("re-registers the tools on /tools reload", async () => {
        resync.mockResolvedValue({ agentId: "asst_1", created: false, stubs: synthesizeStubs(CATALOG) });

        await send(makeBot(), "/tools reload");

        expect(resync).toHaveBeenCalledOnce();
        expect(api.texts()).toEqual(["🔄 Re-discovering MCP tools…", "✅ Registered 3 MCP tool(s) on the agent."]);
    });

    it("reports a failed reload", async () => {
        resync.mockRejectedValue(new ConnectionError("Could not connect to MCP server at http://localhost:8000/sse"));

        await send(makeBot(), "/tools reload");

        expect(api.texts()).toEqual([
            "🔄 Re-discovering MCP tools…",
            "❌ Reload failed: Could not connect to MCP server at http://localhost:8000/sse",
        ]);
    });

    it("shows the agent and catalog on /status", async () => {
        await send(makeBot(), "/status");

        expect(api.texts()).toEqual([
            "🤖 Status\n\n" +
            "Agent: asst_1\n" +
            "MCP server: http://localhost:8000/sse (connected)\n" +
            "Tools: 3\n" +
            "Conversations: 1",
        ]);
    });
});

describe("createWebhookServer", () => {
    let api: FakeBotApi;
    let state: StateStore;
    let webhook: Listening | null;

    function botWith(runTurn: TurnRunner): Bot {
        return createBot({
            token: TEST_BOT_TOKEN,
            apiRoot: api.apiRoot,
            allowedUserIds: [],
            host: new ConversationHost(state, runTurn),
            tools: () => CATALOG,
            resync: () => Promise.reject(new Error("not used")),
            status: () => ({ agentId: null, conversations: 0, mcpUrl: "http://localhost:8000/sse", connected: false }),
        });
    }

    function post(path: string, body: unknown, secret?: string): Promise<Response> {
        const headers: Record<string, string> = { "content-type": "application/json" };
        if (secret !== undefined) headers["x-telegram-bot-api-secret-token"] = secret;
        return fetch(`${webhook?.url}${path}`, { method: "POST", headers, body: JSON.stringify(body) });
    }

    const reply: TurnRunner = async (threadId) => ({
        reply: "Here is the news.",
        threadId: threadId ?? "thread_1",
        status: "completed",
    });

    beforeEach(async () => {
        api = await startFakeBotApi();
        state = createStateStore(":memory:");
        state.setUserName("7", "Ada");
        webhook = null;
    });

    afterEach(async () => {
        await webhook?.close();
        state.close();
        await api.close();
    });

    it("answers health checks", async () => {
        webhook = await listen(createWebhookServer(botWith(reply), "/api/messages", "test-secret"));

        const res = await fetch(`${webhook.url}/healthz`);

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ ok: true });
    });

    it("rejects posts without the right secret token", async () => {
        const runTurn = vi.fn<TurnRunner>(reply);
        webhook = await listen(createWebhookServer(botWith(runTurn), "/api/messages", "test-secret"));

        const missing = await post("/api/messages", textUpdate("hello"));
        const wrong = await post("/api/messages", textUpdate("hello"), "other-secret");

        expect(missing.status).toBe(401);
        expect(wrong.status).toBe(401);
        expect(runTurn).not.toHaveBeenCalled();
    });

    it("handles an update posted with the secret token", async () => {
        webhook = await listen(createWebhookServer(botWith(reply), "/api/messages", "test-secret"));

        const res = await post("/api/messages", textUpdate("hello"), "test-secret");

        expect(res.status).toBe(200);
        expect(api.texts()).toEqual(["Here is the news."]);
    });

    it("answers Telegram before a slow turn finishes and still sends the reply", async () => {
        let finish: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            finish = resolve;
        });
        const runTurn = vi.fn<TurnRunner>(async (threadId, text) => {
            await gate;
            return reply(threadId, text);
        });
        webhook = await listen(createWebhookServer(botWith(runTurn), "/api/messages", "test-secret", 20));

        const res = await post("/api/messages", textUpdate("hello"), "test-secret");

        expect(res.status).toBe(200);
        await vi.waitFor(() => expect(runTurn).toHaveBeenCalledOnce());
        expect(api.texts()).toEqual([]);

        finish();
        await vi.waitFor(() => expect(api.texts()).toEqual(["Here is the news."]));
    });
});
