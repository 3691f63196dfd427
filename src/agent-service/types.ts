/**
 * agent-service/types.ts — The slice of the hosted agent service we use
 *
 * The bot and the registrar only speak this interface. client.ts implements
 * it on the Assistants API (OpenAI or Azure OpenAI); tests use an in-memory
 * fake.
 */

import type OpenAI from "openai";

export type AgentTool = OpenAI.Beta.AssistantTool;

export interface AgentSettings {
    name: string;
    model: string;
    instructions: string;
    description: string;
    tools: AgentTool[];
}

export interface AgentRecord {
    id: string;
    name: string | null;
    tools: AgentTool[];
}

export type RunStatus =
    | "queued"
    | "in_progress"
    | "requires_action"
    | "cancelling"
    | "cancelled"
    | "failed"
    | "completed"
    | "incomplete"
    | "expired";

/** A function call the run is waiting on */
export interface PendingToolCall {
    id: string;
    name: string;
    /** Raw JSON string, as produced by the model */
    arguments: string;
}

export interface RunState {
    id: string;
    threadId: string;
    status: RunStatus;
    /** Set while status is "requires_action" */
    toolCalls: PendingToolCall[] | null;
    lastError: string | null;
}

export interface ToolOutput {
    toolCallId: string;
    output: string;
}

export interface AgentService {
    /** Returns null when the agent does not exist */
    getAgent(agentId: string): Promise<AgentRecord | null>;
    createAgent(settings: AgentSettings): Promise<AgentRecord>;
    updateAgent(agentId: string, settings: AgentSettings): Promise<AgentRecord>;
    deleteAgent(agentId: string): Promise<void>;

    createThread(): Promise<string>;
    addUserMessage(threadId: string, text: string): Promise<void>;
    createRun(threadId: string, agentId: string): Promise<RunState>;
    getRun(threadId: string, runId: string): Promise<RunState>;
    submitToolOutputs(threadId: string, runId: string, outputs: ToolOutput[]): Promise<RunState>;
    cancelRun(threadId: string, runId: string): Promise<RunState>;
    /** Assistant text produced by one run, oldest first */
    getRunReply(threadId: string, runId: string): Promise<string>;
}
