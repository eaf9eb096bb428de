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


import * as http from "node:http";
import type { AddressInfo } from "node:net";
import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { silentLogger, type Logger } from "@sandbox-mcp/core";
import type { ToolRouter } from "@sandbox-mcp/tools";
import { listTools, toCallToolResult } from "./content.js";
import { SERVER_NAME, SERVER_VERSION } from "./stdio.js";

/** Uploads arrive base64-encoded inside the JSON body. */
const MAX_BODY_BYTES = 32 * 1024 * 1024;

export interface HttpMcpServerOptions {
    router: ToolRouter;
    logger?: Logger;
    serverName?: string;
    serverVersion?: string;
}

type RpcId = string | number | null;

export type JsonRpcResponse =
    | { jsonrpc: "2.0"; id: RpcId; result: unknown }
    | { jsonrpc: "2.0"; id: RpcId; error: { code: number; message: string } };

const rpcRequestSchema = z.object({
    jsonrpc: z.literal("2.0").optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    method: z.string(),
    params: z.record(z.unknown()).optional()
});

const callParamsSchema = z.object({
    name: z.string().min(1),
    arguments: z.record(z.unknown()).optional()
});

/**
 * HTTP transport: JSON-RPC 2.0 over a single endpoint.
 *
 *   - POST /mcp    → JSON-RPC dispatcher (JSON reply, or SSE when the client only reads event streams)
 *   - GET  /health → liveness probe
 *   - GET  /tools  → tool catalog
 */
export class HttpMcpServer {
    private readonly server: http.Server;
    private readonly router: ToolRouter;
    private readonly logger: Logger;
    private readonly serverName: string;
    private readonly serverVersion: string;

    constructor(options: HttpMcpServerOptions) {
        this.router = options.router;
        this.logger = (options.logger ?? silentLogger).child({ component: "http" });
        this.serverName = options.serverName ?? SERVER_NAME;
        this.serverVersion = options.serverVersion ?? SERVER_VERSION;
        this.server = http.createServer((req, res) => {
            this.handleRequest(req, res).catch((error: unknown) => {
                this.logger.error({ err: error, url: req.url }, "request handler failed");
                if (!res.headersSent) this.sendJson(res, 500, { error: "Internal Server Error" });
                else res.end();
            });
        });
    }

    private setCorsHeaders(res: http.ServerResponse) {
        res.setHeader("Access-Control-Allow-Origin", "*");
        res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
        res.setHeader("Access-Control-Allow-Headers", "Content-Type, Accept, Mcp-Session-Id");
    }

    private sendJson(res: http.ServerResponse, code: number, body: unknown) {
        res.writeHead(code, { "Content-Type": "application/json" });
        res.end(JSON.stringify(body));
    }

    /** Handles one JSON-RPC message. Notifications return null. */
    async handleRpc(body: unknown): Promise<JsonRpcResponse | null> {
        const parsed = rpcRequestSchema.safeParse(body);
        if (!parsed.success) {
            return { jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid Request" } };
        }
        const { method, params, id } = parsed.data;

        if (id === undefined) {
            if (method === "notifications/cancelled") {
                this.logger.info({ requestId: params?.requestId, reason: params?.reason }, "cancellation requested");
            }
            return null;
        }

        const rpcOk = (result: unknown): JsonRpcResponse => ({ jsonrpc: "2.0", id, result });
        const rpcErr = (code: number, message: string): JsonRpcResponse => ({ jsonrpc: "2.0", id, error: { code, message } });

        switch (method) {
            case "initialize":
                return rpcOk({
                    protocolVersion: LATEST_PROTOCOL_VERSION,
                    capabilities: { tools: { listChanged: false } },
                    serverInfo: { name: this.serverName, version: this.serverVersion }
                });
            case "ping":
                return rpcOk({});
            case "tools/list":
                return rpcOk({ tools: listTools(this.router) });
            case "tools/call": {
                const call = callParamsSchema.safeParse(params ?? {});
                if (!call.success) return rpcErr(-32602, "Invalid params: tools/call needs a tool name");
                const envelope = await this.router.dispatch(call.data.name, call.data.arguments ?? {});
                return rpcOk(toCallToolResult(envelope));
            }
            default:
                return rpcErr(-32601, `Method not found: ${method}`);
        }
    }

    private async readBody(req: http.IncomingMessage): Promise<string | undefined> {
        const chunks: Buffer[] = [];
        let size = 0;
        for await (const chunk of req) {
            const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
            size += buf.length;
            if (size > MAX_BODY_BYTES) return undefined;
            chunks.push(buf);
        }
        return Buffer.concat(chunks).toString("utf-8");
    }

    private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
        this.setCorsHeaders(res);

        if (req.method === "OPTIONS") {
            res.writeHead(204);
            res.end();
            return;
        }

        const url = new URL(req.url ?? "/", "http://localhost");

        if (req.method === "GET" && url.pathname === "/health") {
            return this.sendJson(res, 200, { status: "ok", tools: this.router.list().length });
        }

        if (req.method === "GET" && url.pathname === "/tools") {
            return this.sendJson(res, 200, { tools: listTools(this.router) });
        }

        if (req.method === "POST" && url.pathname === "/mcp") {
            const rawBody = await this.readBody(req);
            if (rawBody === undefined) {
                return this.sendJson(res, 413, {
                    jsonrpc: "2.0", id: null,
                    error: { code: -32600, message: `Request body exceeds ${MAX_BODY_BYTES} bytes` }
                });
            }

            let body: unknown;
            try {
                body = JSON.parse(rawBody);
            } catch {
                return this.sendJson(res, 400, {
                    jsonrpc: "2.0", id: null,
                    error: { code: -32700, message: "Parse error" }
                });
            }

            const isBatch = Array.isArray(body);
            const requests: unknown[] = Array.isArray(body) ? body : [body];
            const accept = req.headers["accept"] ?? "";
            const wantsSse = accept.includes("text/event-stream") && !accept.includes("application/json");

            if (wantsSse) {
                res.writeHead(200, {
                    "Content-Type": "text/event-stream",
                    "Cache-Control": "no-cache",
                    "Connection": "keep-alive"
                });
                for (const rpc of requests) {
                    const result = await this.handleRpc(rpc);
                    if (result !== null) res.write(`data: ${JSON.stringify(result)}\n\n`);
                }
                res.end();
                return;
            }

            const results = await Promise.all(requests.map((rpc) => this.handleRpc(rpc)));
            const replies = results.filter((result): result is JsonRpcResponse => result !== null);
            if (replies.length === 0) {
                res.writeHead(202);
                res.end();
                return;
            }
            return this.sendJson(res, 200, isBatch ? replies : replies[0]);
        }

        this.sendJson(res, 404, { error: "Not Found" });
    }

    /** Resolves with the bound port, which differs from `port` when it is 0. */
    listen(port: number = 3333, host: string = "127.0.0.1"): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once("error", reject);
            this.server.listen(port, host, () => {
                this.server.off("error", reject);
                const address = this.server.address();
                resolve(isAddressInfo(address) ? address.port : port);
            });
        });
    }

    close(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => (err ? reject(err) : resolve()));
        });
    }
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
    return typeof value === "object" && value !== null;
}
