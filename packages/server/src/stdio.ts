import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { silentLogger, type Logger } from "@sandbox-mcp/core";
import type { ToolRouter } from "@sandbox-mcp/tools";
import { listTools, toCallToolResult } from "./content.js";

export const SERVER_NAME = "sandbox-mcp";
export const SERVER_VERSION = "0.1.0";

export interface McpServerOptions {
    logger?: Logger;
    name?: string;
    version?: string;
}

export function createMcpServer(router: ToolRouter, options: McpServerOptions = {}): Server {
    const logger = (options.logger ?? silentLogger).child({ component: "mcp" });
    const server = new Server(
        { name: options.name ?? SERVER_NAME, version: options.version ?? SERVER_VERSION },
        { capabilities: { tools: {} } }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: listTools(router) }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
        const { name, arguments: args } = request.params;
        // The remote call runs to completion or its own timeout; cancelling only drops the reply.
        extra.signal.addEventListener("abort", () => logger.info({ tool: name }, "tool call cancelled by client"), { once: true });
        return toCallToolResult(await router.dispatch(name, args ?? {}));
    });

    server.onerror = (error) => logger.error({ err: error }, "mcp protocol error");
    return server;
}

export async function serveStdio(server: Server): Promise<void> {
    await server.connect(new StdioServerTransport());
}
