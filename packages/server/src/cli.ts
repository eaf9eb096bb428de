#!/usr/bin/env tsx
// Copyright 2026 Google LLC
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.


import "dotenv/config";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
    ConfigError,
    createLogger,
    HttpSandboxClient,
    loadConfig,
    LOG_LEVELS,
    SessionManager
} from "@sandbox-mcp/core";
import { createDefaultTools, ToolRouter } from "@sandbox-mcp/tools";
import { HttpMcpServer } from "./http-server.js";
import { createMcpServer, serveStdio } from "./stdio.js";

async function main() {
    const args = await yargs(hideBin(process.argv))
        .scriptName("sandbox-mcp")
        .option("transport", {
            type: "string",
            choices: ["stdio", "http"] as const,
            description: "How MCP clients connect",
            default: "stdio"
        })
        .option("port", {
            type: "number",
            description: "Port for the http transport",
            default: 3333
        })
        .option("host", {
            type: "string",
            description: "Interface for the http transport",
            default: "127.0.0.1"
        })
        .option("log-level", {
            type: "string",
            choices: LOG_LEVELS,
            description: "Overrides SANDBOX_LOG_LEVEL"
        })
        .strict()
        .help()
        .parseAsync();

    const config = loadConfig();
    const logger = createLogger({ level: args.logLevel ?? config.logLevel, file: config.logFile });

    const client = new HttpSandboxClient(config, { logger });
    const sessions = new SessionManager(client, { logger });
    sessions.registerShutdownHooks(process);
    const router = new ToolRouter(sessions, createDefaultTools(), { logger, defaultTimeoutSec: config.timeoutSec });

    if (args.transport === "http") {
        const server = new HttpMcpServer({ router, logger });
        const port = await server.listen(args.port, args.host);
        logger.info({ port, host: args.host, endpoint: `http://${args.host}:${port}/mcp` }, "http transport listening");
        return;
    }

    const server = createMcpServer(router, { logger });
    server.onclose = () => {
        logger.info("client disconnected; shutting down");
        void sessions.teardown().finally(() => process.exit(0));
    };
    await serveStdio(server);
    logger.info({ apiUrl: config.apiUrl, tools: router.list().length }, "stdio transport ready");
}

main().catch((error: unknown) => {
    if (error instanceof ConfigError) {
        console.error(`Configuration error: ${error.message}`);
    } else {
        console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
});
