/**
 * index.ts — Bot entry point
 *
 * Starts telemetry, syncs the MCP catalog onto the agent, then serves
 * Telegram over long polling or a webhook.
 * Handles graceful shutdown on SIGINT / SIGTERM.
 */

import type { Server } from "http";
import { createBot, createWebhookServer } from "./bot.js";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { describeError } from "./errors.js";
import { createRuntime, startTelemetry } from "./runtime.js";
import type { Telemetry } from "./telemetry.js";
import { runAgentTurn } from "./agent.js";
import { ConversationHost } from "./conversation.js";

let telemetry: Telemetry | null = null;

async function main() {
    logger.info("🚀 agent-tool-bridge starting up…", {
        service: config.AGENT_SERVICE,
        model: config.AGENT_MODEL,
        mcp: config.MCP_SERVER_URL,
        mode: config.BOT_MODE,
    });

    if (!config.TELEGRAM_BOT_TOKEN) {
        throw new Error("TELEGRAM_BOT_TOKEN is required to run the bot");
    }

    telemetry = await startTelemetry(config);
    const runtime = createRuntime(config);

    // Setup step: a catalog or registration failure stops the bot here
    let agentId: string;
    try {
        ({ agentId } = await runtime.sync());
    } catch (err) {
        await runtime.shutdown();
        throw err;
    }

    const host = new ConversationHost(runtime.state, (threadId, text) =>
        runAgentTurn(
            {
                service: runtime.service,
                router: runtime.router,
                agentId,
                maxIterations: config.AGENT_MAX_ITERATIONS,
                pollIntervalMs: config.RUN_POLL_INTERVAL_MS,
            },
            threadId,
            text
        )
    );

    const bot = createBot({
        token: config.TELEGRAM_BOT_TOKEN,
        apiRoot: config.TELEGRAM_API_ROOT,
        allowedUserIds: config.ALLOWED_USER_IDS,
        host,
        tools: () => runtime.router.catalog,
        resync: async () => {
            const result = await runtime.sync();
            agentId = result.agentId;
            return result;
        },
        status: () => ({
            agentId,
            conversations: runtime.state.countConversations(),
            mcpUrl: runtime.catalog.url,
            connected: runtime.catalog.connected,
        }),
    });

    let server: Server | null = null;

    const shutdown = async (signal: string) => {
        logger.info(`Received ${signal}, shutting down…`);
        if (server) server.close();
        if (config.BOT_MODE === "polling") await bot.stop();
        await runtime.shutdown();
        await telemetry?.flush();
    };
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            shutdown(signal).catch((err) => {
                logger.error("Error during shutdown", { err: describeError(err) });
                process.exitCode = 1;
            });
        });
    }

    if (config.BOT_MODE === "webhook") {
        await bot.init();
        if (config.WEBHOOK_URL) {
            await bot.api.setWebhook(
                config.WEBHOOK_URL,
                config.WEBHOOK_SECRET ? { secret_token: config.WEBHOOK_SECRET } : {}
            );
            logger.info("Webhook registered with Telegram", { url: config.WEBHOOK_URL });
        }
        const app = createWebhookServer(bot, config.WEBHOOK_PATH, config.WEBHOOK_SECRET);
        server = app.listen(config.PORT, () => {
            logger.info(`✅ @${bot.botInfo.username} listening on :${config.PORT}${config.WEBHOOK_PATH}`);
        });
        return;
    }

    await bot.start({
        onStart(botInfo) {
            logger.info(`✅ Bot is online as @${botInfo.username}`);
            if (config.ALLOWED_USER_IDS.length > 0) {
                logger.info(`🔒 Only responding to Telegram user IDs: ${config.ALLOWED_USER_IDS.join(", ")}`);
            }
        },
    });
}

main().catch(async (err) => {
    logger.error("Fatal error during startup", { err: describeError(err) });
    await telemetry?.flush();
    process.exit(1);
});
