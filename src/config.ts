/**
 * config.ts — Environment validation using Zod
 * Validated on startup. The process exits immediately if anything is invalid.
 * Secrets live in .env (or Key Vault, see secrets.ts) — never in code or logs.
 */

import { z } from "zod";
import "dotenv/config";

const numeric = (fallback: string) =>
    z.string().regex(/^\d+$/).transform(Number).default(fallback);

const flagList = z
    .string()
    .default("")
    .transform((v) =>
        v
            .split(",")
            .map((s) => s.trim())
            .filter((s) => s.length > 0)
    );

const envSchema = z.object({
    // ── Hosted agent service ─────────────────────────────────────────────────

    /** Which flavour of the Assistants API to talk to */
    AGENT_SERVICE: z.enum(["openai", "azure"]).default("openai"),

    /** OpenAI API key (AGENT_SERVICE=openai) */
    OPENAI_API_KEY: z.string().default(""),

    /** Optional OpenAI-compatible base URL */
    OPENAI_BASE_URL: z.string().url().optional().or(z.literal("")).default(""),

    /** Azure OpenAI resource endpoint (AGENT_SERVICE=azure) */
    AZURE_OPENAI_ENDPOINT: z.string().url().optional().or(z.literal("")).default(""),

    /** Azure OpenAI key — leave empty to authenticate with DefaultAzureCredential */
    AZURE_OPENAI_API_KEY: z.string().default(""),

    /** Azure OpenAI API version that exposes assistants */
    AZURE_OPENAI_API_VERSION: z.string().default("2024-05-01-preview"),

    /** Id of an existing agent; empty means "create one on first registration" */
    AGENT_ID: z.string().default(""),

    AGENT_NAME: z.string().default("news-capsule-assistant"),

    /** Model deployment the agent runs on */
    AGENT_MODEL: z.string().default("gpt-4o"),

    AGENT_DESCRIPTION: z
        .string()
        .default(
            "Finds the latest news on a topic and files summaries in cloud object storage through an MCP server."
        ),

    /** Path to the agent instructions (relative to project root) */
    AGENT_INSTRUCTIONS_PATH: z.string().default("./instructions.md"),

    /** Maximum tool-call rounds per run before the run is cancelled */
    AGENT_MAX_ITERATIONS: numeric("10"),

    /** Delay between run status polls */
    RUN_POLL_INTERVAL_MS: numeric("1000"),

    // ── MCP tool server ──────────────────────────────────────────────────────

    MCP_SERVER_URL: z.string().url().default("http://localhost:8000/sse"),

    MCP_TRANSPORT: z.enum(["sse", "streamable_http"]).default("sse"),

    /** JSON object of extra request headers; values support ${VAR} substitution */
    MCP_HEADERS: z
        .string()
        .default("{}")
        .transform((raw, ctx) => {
            try {
                const parsed: unknown = JSON.parse(raw);
                const headers = z.record(z.string()).safeParse(parsed);
                if (headers.success) return headers.data;
            } catch {
                // reported below
            }
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "MCP_HEADERS must be a JSON object of string values",
            });
            return z.NEVER;
        }),

    MCP_CONNECT_TIMEOUT_MS: numeric("30000"),

    // ── Telegram ─────────────────────────────────────────────────────────────

    /** Telegram bot token from @BotFather (required to run the bot) */
    TELEGRAM_BOT_TOKEN: z.string().default(""),

    /** Bot API root; set it to use a self-hosted Telegram Bot API server */
    TELEGRAM_API_ROOT: z.string().url().default("https://api.telegram.org"),

    /** Comma-separated Telegram user IDs allowed to talk to the bot; empty = everyone */
    ALLOWED_USER_IDS: flagList.pipe(
        z.array(z.string().regex(/^\d+$/, "ALLOWED_USER_IDS must be numeric Telegram user IDs").transform(Number))
    ),

    BOT_MODE: z.enum(["polling", "webhook"]).default("polling"),

    /** [webhook] Port the express server listens on */
    PORT: numeric("3978"),

    /** [webhook] Route Telegram posts updates to */
    WEBHOOK_PATH: z.string().startsWith("/").default("/api/messages"),

    /** [webhook] Public URL registered with Telegram on startup; empty = register it yourself */
    WEBHOOK_URL: z.string().url().optional().or(z.literal("")).default(""),

    /** [webhook] Secret Telegram echoes in X-Telegram-Bot-Api-Secret-Token */
    WEBHOOK_SECRET: z.string().default(""),

    // ── Storage, search, secrets, telemetry ──────────────────────────────────

    /** Path to the SQLite conversation-state database file */
    STATE_DB_PATH: z.string().default("./data/state.db"),

    /** Log level */
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    /** Tavily API key for the web_search tool (https://app.tavily.com) */
    TAVILY_API_KEY: z.string().default(""),

    /** Azure Key Vault URL, e.g. https://my-vault.vault.azure.net/ */
    KEY_VAULT_URL: z.string().url().optional().or(z.literal("")).default(""),

    /** Secret holding the Application Insights connection string */
    APPINSIGHTS_SECRET_NAME: z.string().default("app-insights-connection-string"),

    APPLICATIONINSIGHTS_CONNECTION_STRING: z.string().default(""),
});

function parseEnv() {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment configuration:\n");
        for (const issue of result.error.issues) {
            console.error(`  • ${issue.path.join(".")}: ${issue.message}`);
        }
        console.error("\nCopy .env.example to .env and fill in your values.\n");
        process.exit(1);
    }
    return result.data;
}

export const config = parseEnv();
export type Config = typeof config;
