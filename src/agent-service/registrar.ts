/**
 * agent-service/registrar.ts — Publishes the function stubs on the hosted agent
 *
 * register() makes the agent's function list equal to the given set:
 *   - agent exists  → update it; function tools are replaced, other tools
 *                     (code_interpreter, file_search) are kept
 *   - no/unknown id → create a new agent with the configured profile
 * Re-running with an unchanged catalog re-issues the same update.
 */

import type OpenAI from "openai";
import { logger } from "../logger.js";
import { BridgeError, RegistrationError, describeError } from "../errors.js";
import type { AgentService, AgentSettings, AgentTool } from "./types.js";

export interface AgentProfile {
    name: string;
    model: string;
    description: string;
    instructions: string;
}

export interface RegistrationOutcome {
    agentId: string;
    created: boolean;
    functionCount: number;
}

async function guarded<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (err) {
        if (err instanceof BridgeError) throw err;
        throw new RegistrationError(`${what}: ${describeError(err)}`, { cause: err });
    }
}

export class AgentRegistrar {
    constructor(
        private readonly service: AgentService,
        private readonly profile: AgentProfile
    ) { }

    async register(
        agentId: string | null,
        functions: readonly OpenAI.Beta.FunctionTool[]
    ): Promise<RegistrationOutcome> {
        const names = functions.map((f) => f.function.name);
        const duplicate = names.find((n, i) => names.indexOf(n) !== i);
        if (duplicate !== undefined) {
            throw new RegistrationError(`Function "${duplicate}" would be registered twice`);
        }

        const existing = agentId
            ? await guarded("Looking up agent", () => this.service.getAgent(agentId))
            : null;

        if (existing) {
            const kept = existing.tools.filter((t) => t.type !== "function");
            const settings = this.settings([...kept, ...functions]);
            await guarded(`Updating agent ${existing.id}`, () =>
                this.service.updateAgent(existing.id, settings)
            );
            logger.info("Agent updated", { agentId: existing.id, functions: names });
            return { agentId: existing.id, created: false, functionCount: functions.length };
        }

        if (agentId) {
            logger.warn("Configured agent not found — creating a new one", { agentId });
        }

        const created = await guarded("Creating agent", () =>
            this.service.createAgent(this.settings([...functions]))
        );
        logger.info("Agent created", { agentId: created.id, functions: names });
        return { agentId: created.id, created: true, functionCount: functions.length };
    }

    async remove(agentId: string): Promise<void> {
        await guarded(`Deleting agent ${agentId}`, () => this.service.deleteAgent(agentId));
        logger.info("Agent deleted", { agentId });
    }

    private settings(tools: AgentTool[]): AgentSettings {
        return { ...this.profile, tools };
    }
}
