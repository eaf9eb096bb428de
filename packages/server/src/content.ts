import type { CallToolResult, ImageContent, TextContent, Tool } from "@modelcontextprotocol/sdk/types.js";
import { isOk, type ResultEnvelope } from "@sandbox-mcp/core";
import type { ToolRouter } from "@sandbox-mcp/tools";

function textBlock(value: unknown): TextContent {
    return { type: "text", text: JSON.stringify(value, null, 2) };
}

/**
 * Converts an envelope to MCP tool-call content: the envelope as a JSON text
 * block, followed by one image block per plot. Image data is not repeated in
 * the JSON.
 */
export function toCallToolResult(envelope: ResultEnvelope): CallToolResult {
    if (!isOk(envelope)) {
        return { content: [textBlock(envelope)], isError: true };
    }

    const payload = envelope.payload;
    if (payload.kind !== "execution" || payload.artifacts.length === 0) {
        return { content: [textBlock(envelope)], isError: false };
    }

    const summary = {
        ...envelope,
        payload: { ...payload, artifacts: payload.artifacts.map(({ path, mimeType }) => ({ path, mimeType })) }
    };
    const images: ImageContent[] = payload.artifacts.map((artifact) => ({
        type: "image",
        data: artifact.data,
        mimeType: artifact.mimeType
    }));
    return { content: [textBlock(summary), ...images], isError: false };
}

export function listTools(router: ToolRouter): Tool[] {
    return router.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema
    }));
}
