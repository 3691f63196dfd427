/**
 * agent-service/test-helpers.ts — In-memory AgentService for tests
 *
 * Agents live in a Map. Runs follow a script: createRun returns the first
 * step, every getRun / submitToolOutputs call advances to the next one.
 */

import type {
    AgentRecord,
    AgentService,
    AgentSettings,
    PendingToolCall,
    RunState,
    RunStatus,
    ToolOutput,
} from "./types.js";

export interface RunStep {
    status: RunStatus;
    toolCalls?: PendingToolCall[];
    lastError?: string;
}

export class FakeAgentService implements AgentService {
    readonly agents = new Map<string, AgentSettings>();
    /** Every method call, in order */
    readonly calls: string[] = [];
    readonly messages: Array<{ threadId: string; text: string }> = [];
    readonly submitted: ToolOutput[][] = [];
    reply = "";
    /** Method name → error it should throw */
    failures = new Map<keyof AgentService, Error>();

    private steps: RunStep[] = [{ status: "completed" }];
    private cursor = 0;
    private nextId = 1;

    scriptRun(steps: RunStep[]): void {
        this.steps = steps;
    }

    async getAgent(agentId: string): Promise<AgentRecord | null> {
        this.record("getAgent");
        const settings = this.agents.get(agentId);
        return settings ? { id: agentId, name: settings.name, tools: settings.tools } : null;
    }

    async createAgent(settings: AgentSettings): Promise<AgentRecord> {
        this.record("createAgent");
        const id = `asst_${this.nextId++}`;
        this.agents.set(id, settings);
        return { id, name: settings.name, tools: settings.tools };
    }

    async updateAgent(agentId: string, settings: AgentSettings): Promise<AgentRecord> {
        this.record("updateAgent");
        this.agents.set(agentId, settings);
        return { id: agentId, name: settings.name, tools: settings.tools };
    }

    async deleteAgent(agentId: string): Promise<void> {
        this.record("deleteAgent");
        this.agents.delete(agentId);
    }

    async createThread(): Promise<string> {
        this.record("createThread");
        return `thread_${this.nextId++}`;
    }

    async addUserMessage(threadId: string, text: string): Promise<void> {
        this.record("addUserMessage");
        this.messages.push({ threadId, text });
    }

    async createRun(threadId: string): Promise<RunState> {
        this.record("createRun");
        this.cursor = 0;
        return this.step(threadId);
    }

    async getRun(threadId: string): Promise<RunState> {
        this.record("getRun");
        this.cursor++;
        return this.step(threadId);
    }

    async submitToolOutputs(threadId: string, _runId: string, outputs: ToolOutput[]): Promise<RunState> {
        this.record("submitToolOutputs");
        this.submitted.push(outputs);
        this.cursor++;
        return this.step(threadId);
    }

    async cancelRun(threadId: string, runId: string): Promise<RunState> {
        this.record("cancelRun");
        return { id: runId, threadId, status: "cancelled", toolCalls: null, lastError: null };
    }

    async getRunReply(): Promise<string> {
        this.record("getRunReply");
        return this.reply;
    }

    private record(method: keyof AgentService): void {
        this.calls.push(method);
        const failure = this.failures.get(method);
        if (failure) throw failure;
    }

    private step(threadId: string): RunState {
        const step = this.steps[Math.min(this.cursor, this.steps.length - 1)] ?? { status: "completed" };
        return {
            id: "run_1",
            threadId,
            status: step.status,
            toolCalls: step.toolCalls ?? null,
            lastError: step.lastError ?? null,
        };
    }
}
