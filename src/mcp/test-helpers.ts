/**
 * mcp/test-helpers.ts — In-process MCP server for tests
 *
 * Each call to `transportFactory` links a fresh low-level SDK Server to the
 * client through InMemoryTransport, so McpCatalogClient runs its real
 * protocol code without any network.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    type CallToolResult,
    type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type { TransportFactory } from "./client.js";
import type { McpServerConfig } from "./types.js";

export const TEST_SERVER_CONFIG: McpServerConfig = {
    url: "http://localhost:8000/sse",
    transport: "sse",
    connectTimeoutMs: 1000,
};

export const STORAGE_TOOLS: Tool[] = [
    {
        name: "list_containers",
        description: "List all containers in the storage account",
        inputSchema: { type: "object", properties: {} },
    },
    {
        name: "create_container",
        description: "Create a new container",
        inputSchema: {
            type: "object",
            properties: {
                name: { type: "string", description: "Container name" },
            },
            required: ["name"],
        },
    },
    {
        name: "upload_blob",
        description: "Upload text content as a blob",
        inputSchema: {
            type: "object",
            properties: {
                container_name: { type: "string" },
                blob_name: { type: "string" },
                content: { type: "string" },
                overwrite: { anyOf: [{ type: "boolean" }, { type: "null" }] },
            },
            required: ["container_name", "blob_name", "content"],
        },
    },
];

export interface RecordedCall {
    name: string;
    arguments: Record<string, unknown> | undefined;
}

export type CallHandler = (name: string, args: Record<string, unknown> | undefined) => CallToolResult;

export interface FakeToolServer {
    transportFactory: TransportFactory;
    calls: RecordedCall[];
    /** Replace the advertised catalog (affects the next tools/list) */
    setTools(tools: Tool[]): void;
    /** Number of list pages to split the catalog into */
    setPageSize(size: number): void;
    /** Sessions opened so far */
    readonly sessions: number;
    /** Hang up every open session from the server side */
    closeSessions(): Promise<void>;
}

const echoHandler: CallHandler = (name, args) => ({
    content: [{ type: "text", text: JSON.stringify({ tool: name, args: args ?? {} }) }],
});

export function createFakeToolServer(initialTools: Tool[], handler: CallHandler = echoHandler): FakeToolServer {
    let tools = initialTools;
    let pageSize = Number.POSITIVE_INFINITY;
    const calls: RecordedCall[] = [];
    const servers: Server[] = [];

    function transportFactory(): Transport {
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        const server = new Server(
            { name: "fake-storage-server", version: "0.0.1" },
            { capabilities: { tools: {} } }
        );

        server.setRequestHandler(ListToolsRequestSchema, async (request) => {
            const start = Number(request.params?.cursor ?? "0");
            const end = start + pageSize;
            const page = tools.slice(start, end);
            return end < tools.length ? { tools: page, nextCursor: String(end) } : { tools: page };
        });

        server.setRequestHandler(CallToolRequestSchema, async (request) => {
            calls.push({ name: request.params.name, arguments: request.params.arguments });
            return handler(request.params.name, request.params.arguments);
        });

        server.connect(serverTransport).catch(() => undefined);
        servers.push(server);
        return clientTransport;
    }

    return {
        transportFactory,
        calls,
        setTools(next) {
            tools = next;
        },
        setPageSize(size) {
            pageSize = size;
        },
        get sessions() {
            return servers.length;
        },
        async closeSessions() {
            await Promise.all(servers.map((server) => server.close()));
        },
    };
}

/** A server nobody is listening on */
export class UnreachableTransport implements Transport {
    async start(): Promise<void> {
        throw new Error("connect ECONNREFUSED 127.0.0.1:8000");
    }

    async send(): Promise<void> {
        throw new Error("not connected");
    }

    async close(): Promise<void> {
        // nothing was opened
    }
}
