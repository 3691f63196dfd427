/**
 * sync.ts — The setup step: discover → synthesize → register
 *
 * Runs at bot startup, on `/tools reload` and from `agent-tool-bridge register`.
 * Every failure here is fatal for the caller: if the catalog can't be read no
 * registration call is made, so the agent keeps its previous function list.
 * The router only switches to the new catalog once registration succeeded.
 */

import { logger } from "./logger.js";
import type { ToolDescriptor } from "./mcp/types.js";
import type { AgentRegistrar } from "./agent-service/registrar.js";
import { synthesizeStubs, type FunctionStub } from "./tools/mcp-bridge.js";
import type { InvocationRouter } from "./tools/index.js";

export interface ToolCatalog {
    listTools(): Promise<ToolDescriptor[]>;
}

export interface SyncDeps {
    catalog: ToolCatalog;
    registrar: AgentRegistrar;
    router: InvocationRouter;
}

export interface SyncResult {
    agentId: string;
    created: boolean;
    stubs: FunctionStub[];
}

export interface DiscoveredCatalog {
    descriptors: ToolDescriptor[];
    stubs: FunctionStub[];
}

/** Discover the remote catalog and build its stubs, without registering */
export async function discoverStubs(
    catalog: ToolCatalog,
    router: InvocationRouter
): Promise<DiscoveredCatalog> {
    const descriptors = await catalog.listTools();
    return { descriptors, stubs: synthesizeStubs(descriptors, router.localNames()) };
}

export async function syncAgentTools(deps: SyncDeps, agentId: string | null): Promise<SyncResult> {
    const { descriptors, stubs } = await discoverStubs(deps.catalog, deps.router);

    const functions = [...deps.router.localDefinitions(), ...stubs.map((s) => s.definition)];
    const outcome = await deps.registrar.register(agentId, functions);
    deps.router.setCatalog(descriptors);

    logger.info("Agent tools in sync", {
        agentId: outcome.agentId,
        created: outcome.created,
        remote: stubs.length,
        local: functions.length - stubs.length,
    });

    return { agentId: outcome.agentId, created: outcome.created, stubs };
}
