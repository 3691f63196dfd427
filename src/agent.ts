/**
 * agent.ts — One conversation turn against the hosted agent
 *
 *   1. Make sure the conversation has a thread, add the user's message
 *   2. Start a run and poll it until it leaves queued / in_progress
 *   3. When the run requires action, execute the function calls one by one
 *      through the invocation router and submit the outputs
 *   4. Return the assistant's reply for this run
 *
 * Safety notes:
 *   - Tool-call rounds per run are capped (AGENT_MAX_ITERATIONS); the run is
 *     cancelled when the cap is hit
 *   - Tool failures come back as error outputs (router.dispatch), never throw
 */

import { logger } from "./logger.js";
import type { AgentService, RunState, RunStatus, ToolOutput } from "./agent-service/types.js";
import type { InvocationRouter } from "./tools/index.js";

const ACTIVE: ReadonlySet<RunStatus> = new Set(["queued", "in_progress", "requires_action"]);

export const MAX_ITERATIONS_REPLY =
    "⚠️ I hit my maximum tool-call limit for this turn. Please try again or rephrase your request.";

export interface AgentTurnDeps {
    service: AgentService;
    router: InvocationRouter;
    agentId: string;
    maxIterations: number;
    pollIntervalMs: number;
    /** Injected in tests */
    sleep?: (ms: number) => Promise<void>;
}

export interface AgentTurnResult {
    reply: string;
    threadId: string;
    status: RunStatus;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function executeToolCalls(router: InvocationRouter, run: RunState): Promise<ToolOutput[]> {
    const outputs: ToolOutput[] = [];
    // One at a time: no concurrent invocations within a turn
    for (const call of run.toolCalls ?? []) {
        logger.info("Executing tool call", { name: call.name, callId: call.id });
        const output = await router.dispatch(call.name, call.arguments);
        logger.debug("Tool result", { name: call.name, output });
        outputs.push({ toolCallId: call.id, output });
    }
    return outputs;
}

function terminalReply(run: RunState): string {
    const reason = run.lastError ? `: ${run.lastError}` : ".";
    return `⚠️ The agent run ended with status "${run.status}"${reason} Please try again.`;
}

/**
 * Run one full turn for an incoming message.
 *
 * @param threadId  The conversation's thread, or null to start a new one
 */
export async function runAgentTurn(
    deps: AgentTurnDeps,
    threadId: string | null,
    userMessage: string
): Promise<AgentTurnResult> {
    const { service, router, agentId } = deps;
    const sleep = deps.sleep ?? defaultSleep;

    const thread = threadId ?? (await service.createThread());
    await service.addUserMessage(thread, userMessage);

    let run = await service.createRun(thread, agentId);
    logger.debug("Run created", { threadId: thread, runId: run.id, status: run.status });

    let rounds = 0;
    while (ACTIVE.has(run.status)) {
        if (run.status === "requires_action") {
            if (!run.toolCalls || run.toolCalls.length === 0) {
                logger.warn("Run requires action but provided no tool calls — cancelling", { runId: run.id });
                run = await service.cancelRun(thread, run.id);
                break;
            }

            rounds++;
            if (rounds > deps.maxIterations) {
                logger.warn("Agent max iterations reached", { max: deps.maxIterations, runId: run.id });
                await service.cancelRun(thread, run.id);
                return { reply: MAX_ITERATIONS_REPLY, threadId: thread, status: "cancelled" };
            }

            logger.info(`Executing ${run.toolCalls.length} tool call(s)`, { round: rounds });
            const outputs = await executeToolCalls(router, run);
            run = await service.submitToolOutputs(thread, run.id, outputs);
            continue;
        }

        await sleep(deps.pollIntervalMs);
        run = await service.getRun(thread, run.id);
    }

    if (run.status !== "completed") {
        logger.warn("Run did not complete", { runId: run.id, status: run.status, error: run.lastError });
        return { reply: terminalReply(run), threadId: thread, status: run.status };
    }

    const reply = (await service.getRunReply(thread, run.id)).trim();
    logger.debug("Run completed", { runId: run.id, rounds });
    return { reply: reply || "(no response)", threadId: thread, status: run.status };
}
