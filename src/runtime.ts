/**
 * runtime.ts — Builds the object graph shared by the bot and the CLI
 *
 *   state      SQLite conversation state + stored agent id
 *   catalog    MCP session with the storage tool server
 *   router     built-in tools + catalog → invocation router
 *   service    Assistants API (OpenAI / Azure OpenAI)
 *   registrar  publishes stubs on the agent
 */

import type { Config } from "./config.js";
import { logger } from "./logger.js";
import { describeError } from "./errors.js";
import { createStateStore, AGENT_ID_SETTING, type StateStore } from "./state.js";
import { McpCatalogClient } from "./mcp/client.js";
import { InvocationRouter, type ToolDefinition } from "./tools/index.js";
import { createWebSearchTool } from "./tools/web-search.js";
import { AssistantsAgentService, createAgentServiceClient } from "./agent-service/client.js";
import { AgentRegistrar } from "./agent-service/registrar.js";
import { loadInstructions } from "./agent-service/instructions.js";
import type { AgentService } from "./agent-service/types.js";
import { createSecretStore } from "./secrets.js";
import { initTelemetry, type Telemetry } from "./telemetry.js";
import { syncAgentTools, type SyncResult } from "./sync.js";

export interface Runtime {
    state: StateStore;
    catalog: McpCatalogClient;
    router: InvocationRouter;
    service: AgentService;
    registrar: AgentRegistrar;
    /** AGENT_ID from the environment, else the id stored by the last registration */
    resolveAgentId(): string | null;
    /** Setup step; stores the resulting agent id */
    sync(): Promise<SyncResult>;
    shutdown(): Promise<void>;
}

/** Connect telemetry when a connection string is configured or stored in Key Vault */
export async function startTelemetry(cfg: Config): Promise<Telemetry | null> {
    const secrets = createSecretStore(cfg.KEY_VAULT_URL);
    const connectionString =
        cfg.APPLICATIONINSIGHTS_CONNECTION_STRING || (await secrets.getSecret(cfg.APPINSIGHTS_SECRET_NAME));

    if (!connectionString) {
        logger.debug("Telemetry disabled (no Application Insights connection string)");
        return null;
    }

    try {
        const telemetry = initTelemetry(connectionString);
        logger.info("Telemetry enabled (Application Insights)");
        return telemetry;
    } catch (err) {
        logger.warn("Could not start telemetry", { error: describeError(err) });
        return null;
    }
}

function builtInTools(cfg: Config): ToolDefinition[] {
    const tools: ToolDefinition[] = [];
    if (cfg.TAVILY_API_KEY) {
        tools.push(createWebSearchTool(cfg.TAVILY_API_KEY));
    } else {
        logger.warn("TAVILY_API_KEY not set — web_search will not be registered");
    }
    return tools;
}

export function createRuntime(cfg: Config): Runtime {
    const state = createStateStore(cfg.STATE_DB_PATH);

    const catalog = new McpCatalogClient({
        url: cfg.MCP_SERVER_URL,
        transport: cfg.MCP_TRANSPORT,
        headers: cfg.MCP_HEADERS,
        connectTimeoutMs: cfg.MCP_CONNECT_TIMEOUT_MS,
    });

    const router = new InvocationRouter(catalog, builtInTools(cfg));
    const service = new AssistantsAgentService(createAgentServiceClient(cfg));
    const registrar = new AgentRegistrar(service, {
        name: cfg.AGENT_NAME,
        model: cfg.AGENT_MODEL,
        description: cfg.AGENT_DESCRIPTION,
        instructions: loadInstructions(cfg.AGENT_INSTRUCTIONS_PATH),
    });

    const resolveAgentId = () => cfg.AGENT_ID || state.getSetting(AGENT_ID_SETTING);

    return {
        state,
        catalog,
        router,
        service,
        registrar,
        resolveAgentId,

        async sync() {
            const result = await syncAgentTools({ catalog, registrar, router }, resolveAgentId());
            state.setSetting(AGENT_ID_SETTING, result.agentId);
            if (cfg.AGENT_ID && cfg.AGENT_ID !== result.agentId) {
                logger.warn("AGENT_ID points to a missing agent — update .env", { agentId: result.agentId });
            }
            return result;
        },

        async shutdown() {
            await catalog.disconnect();
            state.close();
        },
    };
}
