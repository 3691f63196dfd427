/**
 * bot.ts — GrammY Telegram bot setup
 *
 * Access control:
 *   WHITELIST: when ALLOWED_USER_IDS is set, updates from anyone else are
 *   silently dropped.
 *
 * Transport is chosen in index.ts: long polling, or a webhook served by
 * express (see createWebhookServer below).
 */

import { Bot, webhookCallback, type Context } from "grammy";
import express, { type Express } from "express";
import { logger } from "./logger.js";
import { describeError } from "./errors.js";
import type { ConversationHost } from "./conversation.js";
import type { ToolDescriptor } from "./mcp/types.js";
import type { SyncResult } from "./sync.js";

export const CHANNEL_ID = "telegram";

export interface BotDeps {
    token: string;
    /** Bot API root; grammY's default when omitted */
    apiRoot?: string;
    allowedUserIds: readonly number[];
    host: ConversationHost;
    /** Current catalog, for /tools */
    tools(): readonly ToolDescriptor[];
    /** Re-run the setup step, for /tools reload */
    resync(): Promise<SyncResult>;
    status(): { agentId: string | null; conversations: number; mcpUrl: string; connected: boolean };
}

/** Drop any update from a user outside the whitelist (empty whitelist = open bot) */
function isAuthorized(ctx: Context, allowed: readonly number[]): boolean {
    if (allowed.length === 0) return true;
    const userId = ctx.from?.id;
    return userId !== undefined && allowed.includes(userId);
}

/** Render the catalog for /tools */
export function formatToolList(tools: readonly ToolDescriptor[]): string {
    if (tools.length === 0) return "🔌 No tools discovered on the MCP server.";

    const lines = tools.map((t) => {
        const params = t.parameters.map((p) => (p.required ? p.name : `${p.name}?`)).join(", ");
        const description = t.description ? `\n   ${t.description}` : "";
        return `• ${t.name}(${params})${description}`;
    });
    return `🔌 MCP tools (${tools.length})\n\n${lines.join("\n")}\n\nUsage: /tools reload`;
}

export function createBot(deps: BotDeps): Bot {
    const bot = new Bot(deps.token, deps.apiRoot ? { client: { apiRoot: deps.apiRoot } } : {});

    // ── Whitelist middleware ─────────────────────────────────────────────────
    bot.use(async (ctx, next) => {
        if (!isAuthorized(ctx, deps.allowedUserIds)) {
            logger.warn("Ignoring message from unauthorized user", {
                userId: ctx.from?.id,
            });
            return; // silent drop
        }
        await next();
    });

    // ── /start ───────────────────────────────────────────────────────────────
    bot.command("start", async (ctx) => {
        await ctx.reply(
            "👋 Hi! Ask me for the latest news on any topic and I'll summarise it. " +
            "I can also file the summary in your storage account.\n\n" +
            "Commands: /clear · /tools · /status"
        );
    });

    // ── /clear ───────────────────────────────────────────────────────────────
    bot.command("clear", async (ctx) => {
        deps.host.resetConversation(String(ctx.chat.id));
        await ctx.reply("🧹 Conversation cleared. The next message starts a fresh thread.");
    });

    // ── /tools ───────────────────────────────────────────────────────────────
    bot.command("tools", async (ctx) => {
        const arg = ctx.match.trim();

        if (arg === "reload") {
            await ctx.reply("🔄 Re-discovering MCP tools…");
            try {
                const result = await deps.resync();
                await ctx.reply(`✅ Registered ${result.stubs.length} MCP tool(s) on the agent.`);
            } catch (err) {
                logger.error("Tool reload failed", { err: describeError(err) });
                await ctx.reply(`❌ Reload failed: ${describeError(err)}`);
            }
            return;
        }

        await ctx.reply(formatToolList(deps.tools()));
    });

    // ── /status ──────────────────────────────────────────────────────────────
    bot.command("status", async (ctx) => {
        const s = deps.status();
        await ctx.reply(
            "🤖 Status\n\n" +
            `Agent: ${s.agentId ?? "(not registered)"}\n` +
            `MCP server: ${s.mcpUrl} (${s.connected ? "connected" : "disconnected"})\n` +
            `Tools: ${deps.tools().length}\n` +
            `Conversations: ${s.conversations}`
        );
    });

    // ── Text messages ────────────────────────────────────────────────────────
    bot.on("message:text", async (ctx) => {
        await ctx.replyWithChatAction("typing");

        try {
            const replies = await deps.host.handleMessage({
                chatId: String(ctx.chat.id),
                userId: String(ctx.from.id),
                channelId: CHANNEL_ID,
                text: ctx.message.text,
            });
            for (const reply of replies) {
                await ctx.reply(reply);
            }
        } catch (err) {
            logger.error("Agent error", { err: describeError(err) });
            await ctx.reply("❌ The bot encountered an error. Check the logs and try again.");
        }
    });

    // ── Error handler ────────────────────────────────────────────────────────
    bot.catch((err) => {
        logger.error("Unhandled bot error", { err: describeError(err.error), update: err.ctx.update.update_id });
    });

    return bot;
}

/**
 * Telegram waits about 10 s for a webhook answer before it retries the update.
 * A turn that takes longer is answered with 200 at this point and keeps
 * running; its replies go out through the Bot API as usual.
 */
export const WEBHOOK_ANSWER_AFTER_MS = 8_000;

/** Express app that feeds Telegram webhook posts into the bot */
export function createWebhookServer(
    bot: Bot,
    path: string,
    secretToken: string,
    answerAfterMs: number = WEBHOOK_ANSWER_AFTER_MS
): Express {
    const app = express();
    app.use(express.json());

    app.get("/healthz", (_req, res) => {
        res.json({ ok: true });
    });

    const handleUpdate = webhookCallback(bot, "express", {
        onTimeout: "return",
        timeoutMilliseconds: answerAfterMs,
        ...(secretToken ? { secretToken } : {}),
    });
    app.post(path, (req, res, next) => {
        handleUpdate(req, res).catch(next);
    });

    return app;
}
