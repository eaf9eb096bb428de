import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { ValidationError, type Logger, type Sandbox, type ToolPayload } from "@sandbox-mcp/core";

/**
 * What a tool gets for one call: the live sandbox, a logger scoped to the call,
 * and the server's default timeout.
 */
export interface ToolContext {
    sandbox: Sandbox;
    logger: Logger;
    defaultTimeoutSec: number;
}

export interface ToolDefinition<T> {
    name: string;
    description: string;
    parameters: z.ZodType<T, z.ZodTypeDef, unknown>;
    execute: (args: T, context: ToolContext) => Promise<ToolPayload>;
}

/** JSON schema of a tool's arguments as published in `tools/list`. */
export interface ToolInputSchema {
    [key: string]: unknown;
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
}

export type PreparedCall = (context: ToolContext) => Promise<ToolPayload>;

/**
 * A tool with its argument type erased. `prepare` validates the raw arguments
 * and returns the call to run once a sandbox is available.
 */
export interface RegisteredTool {
    readonly name: string;
    readonly description: string;
    readonly inputSchema: ToolInputSchema;
    prepare(raw: unknown): PreparedCall;
}

export function defineTool<T>(definition: ToolDefinition<T>): RegisteredTool {
    return {
        name: definition.name,
        description: definition.description,
        inputSchema: toInputSchema(definition.parameters),
        prepare(raw: unknown): PreparedCall {
            const parsed = definition.parameters.safeParse(raw ?? {});
            if (!parsed.success) {
                throw new ValidationError(`Invalid arguments for ${definition.name}: ${formatIssues(parsed.error)}`);
            }
            const args = parsed.data;
            return (context) => definition.execute(args, context);
        }
    };
}

export function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`).join("; ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toInputSchema(schema: z.ZodTypeAny): ToolInputSchema {
    const json: unknown = zodToJsonSchema(schema, { $refStrategy: "none" });
    const properties = isRecord(json) && isRecord(json.properties) ? json.properties : {};
    const required = isRecord(json) && Array.isArray(json.required)
        ? json.required.filter((key): key is string => typeof key === "string")
        : [];

    const result: ToolInputSchema = { type: "object", properties };
    if (required.length > 0) result.required = required;
    if (isRecord(json) && json.additionalProperties === false) result.additionalProperties = false;
    return result;
}
