/**
 * errors.ts — Failure taxonomy for the tool bridge
 *
 *   ConnectionError    remote tool server unreachable
 *   ProtocolError      catalog response malformed
 *   SchemaError        parameter type the function-calling convention can't express
 *   RegistrationError  agent service rejected the registration
 *   InvocationError    unknown tool, or the remote call failed
 *
 * Setup errors (the first four) are fatal. InvocationError is caught per turn
 * and reported back to the agent as a failed tool output.
 */

export type BridgeErrorCode =
    | "CONNECTION"
    | "PROTOCOL"
    | "SCHEMA"
    | "REGISTRATION"
    | "INVOCATION";

export class BridgeError extends Error {
    constructor(
        readonly code: BridgeErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConnectionError extends BridgeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("CONNECTION", message, options);
    }
}

export class ProtocolError extends BridgeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("PROTOCOL", message, options);
    }
}

export class SchemaError extends BridgeError {
    constructor(
        message: string,
        readonly toolName: string,
        options?: { cause?: unknown }
    ) {
        super("SCHEMA", message, options);
    }
}

export class RegistrationError extends BridgeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("REGISTRATION", message, options);
    }
}

export class InvocationError extends BridgeError {
    constructor(
        message: string,
        readonly toolName: string,
        options?: { cause?: unknown }
    ) {
        super("INVOCATION", message, options);
    }
}

/** Render any thrown value for logs and tool outputs */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
