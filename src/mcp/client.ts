/**
 * mcp/client.ts — Remote tool catalog client over @modelcontextprotocol/sdk
 *
 * Holds one long-lived session with the MCP server that fronts the storage
 * account. Discovery (listTools) and invocation (callTool) both go through it.
 *
 * Supports:
 *   - SSE transport (default, what the storage server exposes at /sse)
 *   - Streamable HTTP transport
 * A transport factory can be injected — tests use the SDK's in-memory pair.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { logger } from "../logger.js";
import {
    BridgeError,
    ConnectionError,
    ProtocolError,
    describeError,
} from "../errors.js";
import type {
    McpServerConfig,
    McpToolResult,
    ParameterDescriptor,
    ToolDescriptor,
} from "./types.js";

export type TransportFactory = (cfg: McpServerConfig) => Transport;

const CLIENT_INFO = { name: "agent-tool-bridge", version: "1.0.0" };

const inputSchemaShape = z
    .object({
        type: z.literal("object"),
        properties: z.record(z.record(z.unknown())).optional(),
        required: z.array(z.string()).optional(),
    })
    .passthrough();

const toolShape = z.object({
    name: z.string().min(1, "tool name must not be empty"),
    description: z.string().optional(),
    inputSchema: inputSchemaShape,
});

/**
 * Substitute ${VAR} placeholders in header values from process.env.
 * Example: "Bearer ${STORAGE_MCP_TOKEN}" → "Bearer <value>"
 */
export function resolveEnvVars(
    env: Record<string, string> | undefined
): Record<string, string> {
    if (!env) return {};
    const resolved: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        resolved[key] = value.replace(/\$\{(\w+)\}/g, (_, varName: string) => {
            return process.env[varName] ?? "";
        });
    }
    return resolved;
}

export function buildTransport(cfg: McpServerConfig): Transport {
    const requestInit = { headers: resolveEnvVars(cfg.headers) };
    const url = new URL(cfg.url);

    switch (cfg.transport) {
        case "sse":
            return new SSEClientTransport(url, { requestInit });
        case "streamable_http":
            return new StreamableHTTPClientTransport(url, { requestInit });
        default: {
            const unknown: never = cfg.transport;
            throw new ConnectionError(`Unknown MCP transport "${String(unknown)}"`);
        }
    }
}

/** Convert one advertised tool into a descriptor, or explain why it is malformed */
export function toToolDescriptor(raw: unknown): ToolDescriptor {
    const parsed = toolShape.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join(".") || "tool"}: ${issue.message}` : "invalid tool";
        throw new ProtocolError(`Malformed tool descriptor (${where})`, { cause: parsed.error });
    }

    const { name, description, inputSchema } = parsed.data;
    const required = new Set(inputSchema.required ?? []);
    const parameters: ParameterDescriptor[] = Object.entries(inputSchema.properties ?? {}).map(
        ([paramName, schema]) => {
            const param: ParameterDescriptor = {
                name: paramName,
                schema,
                required: required.has(paramName),
            };
            const paramDescription = schema["description"];
            if (typeof paramDescription === "string") {
                param.description = paramDescription;
            }
            return param;
        }
    );

    return { name, description: description ?? "", parameters, inputSchema };
}

function isTextBlock(block: unknown): block is { type: "text"; text: string } {
    return (
        typeof block === "object" &&
        block !== null &&
        "type" in block &&
        block.type === "text" &&
        "text" in block &&
        typeof block.text === "string"
    );
}

/** Failures while talking to a connected server: transport-level vs. bad answer */
function classifyFailure(err: unknown, what: string): BridgeError {
    if (err instanceof BridgeError) return err;
    if (err instanceof McpError) {
        if (err.code === ErrorCode.ConnectionClosed || err.code === ErrorCode.RequestTimeout) {
            return new ConnectionError(`${what}: ${err.message}`, { cause: err });
        }
        return new ProtocolError(`${what}: ${err.message}`, { cause: err });
    }
    if (err instanceof Error && err.name === "ZodError") {
        return new ProtocolError(`${what}: response failed validation`, { cause: err });
    }
    return new ConnectionError(`${what}: ${describeError(err)}`, { cause: err });
}

async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

export class McpCatalogClient {
    private client: Client | null = null;
    /** Bumped on every new session, for logs */
    private sessions = 0;

    constructor(
        private readonly cfg: McpServerConfig,
        private readonly transportFactory: TransportFactory = buildTransport
    ) { }

    get url(): string {
        return this.cfg.url;
    }

    get connected(): boolean {
        return this.client !== null;
    }

    /**
     * Open the session; throws ConnectionError when the server can't be reached.
     * A session the server closes is dropped, so the next call opens a new one.
     */
    async connect(): Promise<void> {
        if (this.client) return;

        const client = new Client(CLIENT_INFO, { capabilities: {} });
        try {
            const transport = this.transportFactory(this.cfg);
            await withTimeout(client.connect(transport), this.cfg.connectTimeoutMs, "MCP connect");
        } catch (err) {
            await this.closeQuietly(client);
            logger.error(`[MCP] Failed to connect to ${this.cfg.url}`, { error: describeError(err) });
            throw new ConnectionError(
                `Could not connect to MCP server at ${this.cfg.url}: ${describeError(err)}`,
                { cause: err }
            );
        }

        client.onclose = () => {
            if (this.client !== client) return;
            this.client = null;
            logger.warn("[MCP] Session closed by the server", { url: this.cfg.url });
        };
        this.client = client;
        this.sessions++;
        logger.info(`[MCP] Connected to ${this.cfg.url}`, { transport: this.cfg.transport, session: this.sessions });
    }

    /**
     * Fetch the current ordered catalog from the server.
     * Nothing is cached here: the router keeps the catalog that was registered.
     */
    async listTools(): Promise<ToolDescriptor[]> {
        const client = await this.session();

        const raw: unknown[] = [];
        try {
            let cursor: string | undefined;
            do {
                const page = await client.listTools(cursor ? { cursor } : undefined);
                raw.push(...page.tools);
                cursor = page.nextCursor;
            } while (cursor);
        } catch (err) {
            throw await this.failed(client, err, "Listing tools failed");
        }

        const descriptors = raw.map(toToolDescriptor);
        const seen = new Set<string>();
        for (const d of descriptors) {
            if (seen.has(d.name)) {
                throw new ProtocolError(`Catalog lists tool "${d.name}" more than once`);
            }
            seen.add(d.name);
        }

        logger.info(`[MCP] Discovered ${descriptors.length} tool(s)`, {
            tools: descriptors.map((d) => d.name),
        });
        return descriptors;
    }

    /** Forward one call to the server */
    async callTool(toolName: string, args: Record<string, unknown>): Promise<McpToolResult> {
        const client = await this.session();

        let result: Awaited<ReturnType<Client["callTool"]>>;
        try {
            result = await client.callTool({ name: toolName, arguments: args });
        } catch (err) {
            throw await this.failed(client, err, `Calling "${toolName}" failed`);
        }

        const content: unknown[] = Array.isArray(result.content) ? result.content : [];
        const texts = content.filter(isTextBlock).map((c) => c.text);
        const text = texts.length > 0 ? texts.join("\n") : JSON.stringify(content);

        return { text, isError: result.isError === true };
    }

    /** Disconnect cleanly; safe to call more than once */
    async disconnect(): Promise<void> {
        const client = this.client;
        this.client = null;
        if (client) {
            await this.closeQuietly(client);
            logger.info("[MCP] Connection closed", { url: this.cfg.url });
        }
    }

    // ── Private helpers ──────────────────────────────────────────────────────

    private async session(): Promise<Client> {
        await this.connect();
        if (!this.client) {
            throw new ConnectionError(`MCP server at ${this.cfg.url} is not connected`);
        }
        return this.client;
    }

    /** Classify a failed request; transport failures also drop the session */
    private async failed(client: Client, err: unknown, what: string): Promise<BridgeError> {
        const failure = classifyFailure(err, what);
        if (failure instanceof ConnectionError && this.client === client) {
            this.client = null;
            await this.closeQuietly(client);
            logger.warn("[MCP] Dropped the session after a transport failure", { error: failure.message });
        }
        return failure;
    }

    private async closeQuietly(client: Client): Promise<void> {
        try {
            await client.close();
        } catch (err) {
            logger.debug("[MCP] Error while closing client", { error: describeError(err) });
        }
    }
}
