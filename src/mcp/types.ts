/**
 * mcp/types.ts — Shared types for the MCP tool catalog
 */

/** How to reach the remote MCP server */
export type McpTransport = "sse" | "streamable_http";

export interface McpServerConfig {
    /** HTTP URL of the MCP endpoint, e.g. http://localhost:8000/sse */
    url: string;
    transport: McpTransport;
    /** Extra request headers (supports ${VAR} substitution from process.env) */
    headers?: Record<string, string>;
    /** Upper bound for connect + initialize */
    connectTimeoutMs: number;
}

/** One parameter of a remote tool, as advertised in its input schema */
export interface ParameterDescriptor {
    name: string;
    /** Raw JSON Schema of the property */
    schema: Record<string, unknown>;
    required: boolean;
    description?: string;
}

/** A single tool advertised by the MCP server */
export interface ToolDescriptor {
    /** Tool name, unique within the catalog */
    name: string;
    description: string;
    /** Parameters in the order the server declared them */
    parameters: ParameterDescriptor[];
    /** JSON Schema for the input, as received */
    inputSchema: Record<string, unknown>;
}

/** Outcome of one remote tool call */
export interface McpToolResult {
    text: string;
    /** The server reported the call as failed */
    isError: boolean;
}
