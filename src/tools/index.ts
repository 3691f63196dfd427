/**
 * tools/index.ts — Invocation router
 *
 * When a run stops with `requires_action`, every function call the agent
 * emitted comes through here. Built-in tools (web_search) are executed in
 * process; everything else must be a tool in the catalog that was last
 * registered on the agent (setCatalog) and is forwarded to the MCP server
 * with its arguments untouched.
 *
 * Adding a built-in tool:
 *   1. Create src/tools/my-tool.ts exporting a ToolDefinition
 *   2. Pass it to the router in runtime.ts
 */

import type OpenAI from "openai";
import { logger } from "../logger.js";
import { InvocationError, describeError } from "../errors.js";
import type { McpToolResult, ToolDescriptor } from "../mcp/types.js";

export interface ToolDefinition {
    /** The function specification registered on the agent */
    spec: OpenAI.Beta.FunctionTool;
    /** Execute the tool and return a string result */
    execute(args: Record<string, unknown>): Promise<string>;
}

/** The remote side of the router; McpCatalogClient satisfies this */
export interface RemoteToolExecutor {
    callTool(name: string, args: Record<string, unknown>): Promise<McpToolResult>;
}

export interface InvocationRequest {
    name: string;
    arguments: Record<string, unknown>;
}

/** Parse the JSON argument string the agent service hands us */
export function parseArguments(name: string, rawArgs: string): Record<string, unknown> {
    if (rawArgs.trim() === "") return {};

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawArgs);
    } catch (err) {
        throw new InvocationError(`could not parse arguments as JSON: ${rawArgs}`, name, { cause: err });
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new InvocationError(`arguments must be a JSON object, got: ${rawArgs}`, name);
    }
    return Object.fromEntries(Object.entries(parsed));
}

export class InvocationRouter {
    private readonly local = new Map<string, ToolDefinition>();
    private _catalog: readonly ToolDescriptor[] = [];

    constructor(
        private readonly remote: RemoteToolExecutor,
        localTools: readonly ToolDefinition[] = []
    ) {
        for (const tool of localTools) {
            this.local.set(tool.spec.function.name, tool);
        }
    }

    /** Definitions of the built-in tools, registered alongside the MCP stubs */
    localDefinitions(): OpenAI.Beta.FunctionTool[] {
        return [...this.local.values()].map((t) => t.spec);
    }

    localNames(): string[] {
        return [...this.local.keys()];
    }

    /** Remote tools the agent currently has registered */
    get catalog(): readonly ToolDescriptor[] {
        return this._catalog;
    }

    /** Route to this catalog from now on; call once it is registered on the agent */
    setCatalog(descriptors: readonly ToolDescriptor[]): void {
        this._catalog = [...descriptors];
    }

    /**
     * Route one invocation and return the tool's raw result.
     * Throws InvocationError for unknown tools and failed calls.
     */
    async invoke(request: InvocationRequest): Promise<string> {
        const { name, arguments: args } = request;

        const localTool = this.local.get(name);
        if (localTool) {
            try {
                return await localTool.execute(args);
            } catch (err) {
                throw new InvocationError(describeError(err), name, { cause: err });
            }
        }

        if (!this._catalog.some((t) => t.name === name)) {
            throw new InvocationError(`tool "${name}" is not in the current catalog`, name);
        }

        logger.info(`Forwarding "${name}" to MCP server`, { args: Object.keys(args) });

        let result: McpToolResult;
        try {
            result = await this.remote.callTool(name, args);
        } catch (err) {
            throw new InvocationError(describeError(err), name, { cause: err });
        }

        if (result.isError) {
            throw new InvocationError(result.text || "remote tool reported an error", name);
        }
        return result.text;
    }

    /**
     * Execute a function call from an agent run and produce the tool output.
     * Invocation failures become an error payload so the run can continue.
     */
    async dispatch(name: string, rawArgs: string): Promise<string> {
        try {
            const args = parseArguments(name, rawArgs);
            return await this.invoke({ name, arguments: args });
        } catch (err) {
            if (!(err instanceof InvocationError)) throw err;
            logger.warn(`Tool "${name}" failed`, { error: err.message });
            return JSON.stringify({ error: `Failed to execute ${name}: ${err.message}` });
        }
    }
}
