/**
 * tools/mcp-bridge.ts — Turns MCP tool descriptors into function stubs
 *
 * Each descriptor discovered on the MCP server becomes one FunctionStub: a
 * typed view of its parameters plus the `{ type: "function", function }`
 * definition the Assistants API accepts. Synthesis is pure and deterministic,
 * so the same catalog always yields the same JSON.
 *
 * Supported parameter schemas:
 *   { type: "string" | "number" | "integer" | "boolean" | "array" | "object" }
 *   { type: ["string", "null"] }                     → nullable
 *   { anyOf: [{ type: "string" }, { type: "null" }] } → nullable
 * Anything else is a SchemaError.
 */

import type OpenAI from "openai";
import { SchemaError } from "../errors.js";
import type { ParameterDescriptor, ToolDescriptor } from "../mcp/types.js";

export type ParameterType =
    | { kind: "string"; enum?: string[] }
    | { kind: "number" }
    | { kind: "integer" }
    | { kind: "boolean" }
    | { kind: "array"; items?: ParameterType }
    | { kind: "object" };

export interface StubParameter {
    name: string;
    type: ParameterType;
    required: boolean;
    nullable: boolean;
    description?: string;
}

export interface FunctionStub {
    name: string;
    description: string;
    parameters: StubParameter[];
    /** Ready to send in an assistant's `tools` list */
    definition: OpenAI.Beta.FunctionTool;
}

/** Function names the agent service accepts */
const FUNCTION_NAME = /^[a-zA-Z0-9_-]{1,64}$/;

const PRIMITIVES = new Set(["string", "number", "integer", "boolean", "array", "object"]);

type Schema = Record<string, unknown>;

function isSchema(value: unknown): value is Schema {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Collapse the "T or null" spellings into a single list of type names */
function typeAlternatives(schema: Schema, where: string, tool: string): { names: string[]; members: Schema[] } {
    const { type } = schema;

    if (typeof type === "string") return { names: [type], members: [schema] };

    if (Array.isArray(type)) {
        const names = type.filter((t): t is string => typeof t === "string");
        if (names.length !== type.length) {
            throw new SchemaError(`${where}: "type" list must contain only strings`, tool);
        }
        return { names, members: names.map(() => schema) };
    }

    const union = schema["anyOf"] ?? schema["oneOf"];
    if (Array.isArray(union)) {
        const members = union.filter(isSchema);
        if (members.length !== union.length) {
            throw new SchemaError(`${where}: union members must be schemas`, tool);
        }
        const names = members.map((m) => {
            const memberType = m["type"];
            if (typeof memberType !== "string") {
                throw new SchemaError(`${where}: union member without a single "type"`, tool);
            }
            return memberType;
        });
        return { names, members };
    }

    throw new SchemaError(`${where}: no "type" given`, tool);
}

function toParameterType(schema: Schema, where: string, tool: string): { type: ParameterType; nullable: boolean } {
    const { names, members } = typeAlternatives(schema, where, tool);

    const nullable = names.includes("null");
    const concrete = names
        .map((name, i) => ({ name, member: members[i] ?? schema }))
        .filter((alt) => alt.name !== "null");

    const alt = concrete[0];
    if (concrete.length !== 1 || !alt) {
        const shown = names.join(" | ") || "(none)";
        throw new SchemaError(`${where}: unsupported type ${shown}`, tool);
    }

    const { name, member } = alt;
    if (!PRIMITIVES.has(name)) {
        throw new SchemaError(`${where}: unsupported type "${name}"`, tool);
    }

    switch (name) {
        case "string": {
            const values = member["enum"];
            if (Array.isArray(values) && values.every((v): v is string => typeof v === "string")) {
                return { type: { kind: "string", enum: [...values] }, nullable };
            }
            return { type: { kind: "string" }, nullable };
        }
        case "array": {
            const items = member["items"];
            if (items === undefined) return { type: { kind: "array" }, nullable };
            if (!isSchema(items)) {
                throw new SchemaError(`${where}: tuple-style "items" is not supported`, tool);
            }
            const inner = toParameterType(items, `${where}[]`, tool);
            if (inner.nullable) {
                throw new SchemaError(`${where}[]: nullable array items are not supported`, tool);
            }
            return { type: { kind: "array", items: inner.type }, nullable };
        }
        case "number":
            return { type: { kind: "number" }, nullable };
        case "integer":
            return { type: { kind: "integer" }, nullable };
        case "boolean":
            return { type: { kind: "boolean" }, nullable };
        default:
            return { type: { kind: "object" }, nullable };
    }
}

/** JSON Schema for one parameter type, in the shape the function-calling API expects */
export function toJsonSchema(type: ParameterType, nullable = false): Schema {
    const typeField = nullable ? [type.kind, "null"] : type.kind;
    switch (type.kind) {
        case "string":
            return type.enum ? { type: typeField, enum: type.enum } : { type: typeField };
        case "array":
            return type.items ? { type: typeField, items: toJsonSchema(type.items) } : { type: typeField };
        default:
            return { type: typeField };
    }
}

function toStubParameter(param: ParameterDescriptor, tool: string): StubParameter {
    const { type, nullable } = toParameterType(param.schema, `${tool}.${param.name}`, tool);
    const stubParam: StubParameter = {
        name: param.name,
        type,
        required: param.required,
        nullable,
    };
    if (param.description !== undefined) stubParam.description = param.description;
    return stubParam;
}

/**
 * Build the function stub for one remote tool.
 * Throws SchemaError when the tool can't be expressed as a function definition.
 */
export function synthesizeStub(descriptor: ToolDescriptor): FunctionStub {
    if (!FUNCTION_NAME.test(descriptor.name)) {
        throw new SchemaError(
            `Tool name "${descriptor.name}" is not a valid function name (letters, digits, _ and -, at most 64)`,
            descriptor.name
        );
    }

    const parameters = descriptor.parameters.map((p) => toStubParameter(p, descriptor.name));

    // own properties, including "__proto__"
    const properties: Record<string, Schema> = Object.fromEntries(
        parameters.map((p) => {
            const schema = toJsonSchema(p.type, p.nullable);
            return [p.name, p.description !== undefined ? { ...schema, description: p.description } : schema] as const;
        })
    );

    const fn: OpenAI.FunctionDefinition = {
        name: descriptor.name,
        parameters: {
            type: "object",
            properties,
            required: parameters.filter((p) => p.required).map((p) => p.name),
        },
    };
    if (descriptor.description) fn.description = descriptor.description;

    return {
        name: descriptor.name,
        description: descriptor.description,
        parameters,
        definition: { type: "function", function: fn },
    };
}

/**
 * Build stubs for a whole catalog, one per descriptor, in catalog order.
 * `reserved` holds names already taken by built-in tools.
 */
export function synthesizeStubs(
    descriptors: readonly ToolDescriptor[],
    reserved: readonly string[] = []
): FunctionStub[] {
    const taken = new Set(reserved);
    return descriptors.map((descriptor) => {
        if (taken.has(descriptor.name)) {
            throw new SchemaError(
                `Tool "${descriptor.name}" collides with a built-in tool of the same name`,
                descriptor.name
            );
        }
        return synthesizeStub(descriptor);
    });
}
