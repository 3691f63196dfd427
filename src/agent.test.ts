import { beforeEach, describe, expect, it, vi } from "vitest";
import { MAX_ITERATIONS_REPLY, runAgentTurn, type AgentTurnDeps } from "./agent.js";
import { FakeAgentService } from "./agent-service/test-helpers.js";
import { InvocationRouter, type RemoteToolExecutor } from "./tools/index.js";
import { toToolDescriptor } from "./mcp/client.js";

function storageRemote(): RemoteToolExecutor & { calls: Array<[string, Record<string, unknown>]> } {
    const calls: Array<[string, Record<string, unknown>]> = [];
    return {
        calls,
        async callTool(name, args) {
            calls.push([name, args]);
            return { text: `Container '${String(args["name"])}' created.`, isError: false };
        },
    };
}

const createCall = { id: "call_1", name: "create_container", arguments: '{"name":"finance-news"}' };

describe("runAgentTurn", () => {
    let service: FakeAgentService;
    let remote: ReturnType<typeof storageRemote>;
    let deps: AgentTurnDeps;
    const sleep = vi.fn(async (_ms: number) => undefined);

    beforeEach(() => {
        sleep.mockClear();
        service = new FakeAgentService();
        remote = storageRemote();
        const router = new InvocationRouter(remote);
        router.setCatalog([toToolDescriptor({ name: "create_container", inputSchema: { type: "object" } })]);
        deps = {
            service,
            router,
            agentId: "asst_1",
            maxIterations: 3,
            pollIntervalMs: 250,
            sleep,
        };
    });

    it("starts a thread and returns the reply of a completed run", async () => {
        service.scriptRun([{ status: "queued" }, { status: "in_progress" }, { status: "completed" }]);
        service.reply = "  Here is today's news.  ";

        const result = await runAgentTurn(deps, null, "latest fintech news");

        expect(result).toEqual({ reply: "Here is today's news.", threadId: "thread_1", status: "completed" });
        expect(service.messages).toEqual([{ threadId: "thread_1", text: "latest fintech news" }]);
        expect(sleep).toHaveBeenCalledTimes(2);
        expect(sleep).toHaveBeenCalledWith(250);
    });

    it("reuses an existing thread", async () => {
        const result = await runAgentTurn(deps, "thread_42", "hello");

        expect(result.threadId).toBe("thread_42");
        expect(service.calls).not.toContain("createThread");
    });

    it("executes requested tool calls and submits their outputs", async () => {
        service.scriptRun([
            { status: "requires_action", toolCalls: [createCall] },
            { status: "completed" },
        ]);
        service.reply = "Filed.";

        const result = await runAgentTurn(deps, "thread_1", "file it");

        expect(result.reply).toBe("Filed.");
        expect(remote.calls).toEqual([["create_container", { name: "finance-news" }]]);
        expect(service.submitted).toEqual([[{ toolCallId: "call_1", output: "Container 'finance-news' created." }]]);
    });

    it("reports failed tool calls back to the run instead of throwing", async () => {
        service.scriptRun([
            { status: "requires_action", toolCalls: [{ id: "call_7", name: "drop_database", arguments: "{}" }] },
            { status: "completed" },
        ]);
        service.reply = "That tool is not available.";

        const result = await runAgentTurn(deps, "thread_1", "drop it");

        expect(result.status).toBe("completed");
        expect(service.submitted).toEqual([
            [
                {
                    toolCallId: "call_7",
                    output: JSON.stringify({
                        error: 'Failed to execute drop_database: tool "drop_database" is not in the current catalog',
                    }),
                },
            ],
        ]);
    });

    it("runs several calls of one round in order", async () => {
        const second = { id: "call_2", name: "create_container", arguments: '{"name":"sports"}' };
        service.scriptRun([{ status: "requires_action", toolCalls: [createCall, second] }, { status: "completed" }]);

        await runAgentTurn(deps, "thread_1", "two containers");

        expect(remote.calls.map(([, args]) => args["name"])).toEqual(["finance-news", "sports"]);
        expect(service.submitted[0]?.map((o) => o.toolCallId)).toEqual(["call_1", "call_2"]);
    });

    it("cancels the run once the tool-call cap is exceeded", async () => {
        service.scriptRun([{ status: "requires_action", toolCalls: [createCall] }]);

        const result = await runAgentTurn(deps, "thread_1", "loop forever");

        expect(result).toEqual({ reply: MAX_ITERATIONS_REPLY, threadId: "thread_1", status: "cancelled" });
        expect(service.submitted).toHaveLength(3);
        expect(service.calls.at(-1)).toBe("cancelRun");
    });

    it("cancels a run that requires action without tool calls", async () => {
        service.scriptRun([{ status: "requires_action", toolCalls: [] }]);

        const result = await runAgentTurn(deps, "thread_1", "hm");

        expect(result.status).toBe("cancelled");
        expect(result.reply).toBe('⚠️ The agent run ended with status "cancelled". Please try again.');
    });

    it("surfaces a failed run with its error", async () => {
        service.scriptRun([{ status: "failed", lastError: "rate_limit_exceeded: slow down" }]);

        const result = await runAgentTurn(deps, "thread_1", "news");

        expect(result.reply).toBe(
            '⚠️ The agent run ended with status "failed": rate_limit_exceeded: slow down Please try again.'
        );
        expect(service.calls).not.toContain("getRunReply");
    });

    it("falls back to a placeholder for an empty reply", async () => {
        service.reply = "   ";

        expect((await runAgentTurn(deps, "thread_1", "hi")).reply).toBe("(no response)");
    });
});
