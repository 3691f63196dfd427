/**
 * agent-service/client.ts — AgentService on the Assistants API
 *
 * Covers: OpenAI, OpenAI-compatible gateways (OPENAI_BASE_URL) and Azure
 * OpenAI. Azure authenticates with a key when one is configured, otherwise
 * with a DefaultAzureCredential bearer token.
 */

import OpenAI, { AzureOpenAI } from "openai";
import { DefaultAzureCredential, getBearerTokenProvider } from "@azure/identity";
import type { Config } from "../config.js";
import { logger } from "../logger.js";
import type {
    AgentRecord,
    AgentService,
    AgentSettings,
    RunState,
    ToolOutput,
} from "./types.js";

const AZURE_SCOPE = "https://cognitiveservices.azure.com/.default";

type ServiceConfig = Pick<
    Config,
    | "AGENT_SERVICE"
    | "OPENAI_API_KEY"
    | "OPENAI_BASE_URL"
    | "AZURE_OPENAI_ENDPOINT"
    | "AZURE_OPENAI_API_KEY"
    | "AZURE_OPENAI_API_VERSION"
>;

/** Factory — called with live config values so keys are read after .env loads */
export function createAgentServiceClient(cfg: ServiceConfig): OpenAI {
    if (cfg.AGENT_SERVICE === "azure") {
        if (!cfg.AZURE_OPENAI_ENDPOINT) {
            throw new Error("AZURE_OPENAI_ENDPOINT is required when AGENT_SERVICE=azure");
        }
        if (cfg.AZURE_OPENAI_API_KEY) {
            return new AzureOpenAI({
                endpoint: cfg.AZURE_OPENAI_ENDPOINT,
                apiKey: cfg.AZURE_OPENAI_API_KEY,
                apiVersion: cfg.AZURE_OPENAI_API_VERSION,
            });
        }
        return new AzureOpenAI({
            endpoint: cfg.AZURE_OPENAI_ENDPOINT,
            azureADTokenProvider: getBearerTokenProvider(new DefaultAzureCredential(), AZURE_SCOPE),
            apiVersion: cfg.AZURE_OPENAI_API_VERSION,
        });
    }

    if (!cfg.OPENAI_API_KEY) {
        throw new Error("OPENAI_API_KEY is required when AGENT_SERVICE=openai");
    }
    return new OpenAI({
        apiKey: cfg.OPENAI_API_KEY,
        baseURL: cfg.OPENAI_BASE_URL || undefined,
    });
}

function toAgentRecord(assistant: OpenAI.Beta.Assistant): AgentRecord {
    return { id: assistant.id, name: assistant.name, tools: assistant.tools };
}

function toRunState(run: OpenAI.Beta.Threads.Run): RunState {
    const action = run.required_action;
    return {
        id: run.id,
        threadId: run.thread_id,
        status: run.status,
        toolCalls:
            action?.type === "submit_tool_outputs"
                ? action.submit_tool_outputs.tool_calls.map((tc) => ({
                    id: tc.id,
                    name: tc.function.name,
                    arguments: tc.function.arguments,
                }))
                : null,
        lastError: run.last_error?.message ?? null,
    };
}

export class AssistantsAgentService implements AgentService {
    constructor(private readonly client: OpenAI) { }

    async getAgent(agentId: string): Promise<AgentRecord | null> {
        try {
            return toAgentRecord(await this.client.beta.assistants.retrieve(agentId));
        } catch (err) {
            if (err instanceof OpenAI.NotFoundError) return null;
            throw err;
        }
    }

    async createAgent(settings: AgentSettings): Promise<AgentRecord> {
        const assistant = await this.client.beta.assistants.create({
            model: settings.model,
            name: settings.name,
            description: settings.description,
            instructions: settings.instructions,
            tools: settings.tools,
        });
        return toAgentRecord(assistant);
    }

    async updateAgent(agentId: string, settings: AgentSettings): Promise<AgentRecord> {
        const assistant = await this.client.beta.assistants.update(agentId, {
            model: settings.model,
            name: settings.name,
            description: settings.description,
            instructions: settings.instructions,
            tools: settings.tools,
        });
        return toAgentRecord(assistant);
    }

    async deleteAgent(agentId: string): Promise<void> {
        await this.client.beta.assistants.del(agentId);
    }

    async createThread(): Promise<string> {
        const thread = await this.client.beta.threads.create();
        logger.debug("Thread created", { threadId: thread.id });
        return thread.id;
    }

    async addUserMessage(threadId: string, text: string): Promise<void> {
        await this.client.beta.threads.messages.create(threadId, { role: "user", content: text });
    }

    async createRun(threadId: string, agentId: string): Promise<RunState> {
        return toRunState(await this.client.beta.threads.runs.create(threadId, { assistant_id: agentId }));
    }

    async getRun(threadId: string, runId: string): Promise<RunState> {
        return toRunState(await this.client.beta.threads.runs.retrieve(threadId, runId));
    }

    async submitToolOutputs(threadId: string, runId: string, outputs: ToolOutput[]): Promise<RunState> {
        const run = await this.client.beta.threads.runs.submitToolOutputs(threadId, runId, {
            tool_outputs: outputs.map((o) => ({ tool_call_id: o.toolCallId, output: o.output })),
        });
        return toRunState(run);
    }

    async cancelRun(threadId: string, runId: string): Promise<RunState> {
        return toRunState(await this.client.beta.threads.runs.cancel(threadId, runId));
    }

    async getRunReply(threadId: string, runId: string): Promise<string> {
        const page = await this.client.beta.threads.messages.list(threadId, {
            run_id: runId,
            order: "asc",
        });

        const parts: string[] = [];
        for (const message of page.data) {
            if (message.role !== "assistant") continue;
            for (const block of message.content) {
                if (block.type === "text") parts.push(block.text.value);
            }
        }
        return parts.join("\n\n");
    }
}
