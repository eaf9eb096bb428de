/**
 * Client for the remote sandbox REST API.
 *
 * Workspaces are created and deleted at the top level; everything else goes
 * through the per-workspace toolbox endpoints.
 */

import { randomBytes } from "node:crypto";
import { Agent, fetch as undiciFetch } from "undici";
import { z } from "zod";
import type { ServerConfig } from "../config.js";
import { NotFoundError, RemoteError, SandboxError, TimeoutError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type {
    ExecOptions,
    FileStat,
    ReadOptions,
    SandboxClient,
    SandboxExecutionResult,
    SandboxHandle,
    WriteOptions
} from "./sandbox.js";

export interface HttpResponse {
    readonly status: number;
    readonly ok: boolean;
    text(): Promise<string>;
    arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequest {
    method: "GET" | "POST" | "PUT" | "DELETE";
    headers: Record<string, string>;
    body?: string | Uint8Array;
    signal: AbortSignal;
}

export type HttpFetch = (url: string, request: HttpRequest) => Promise<HttpResponse>;

export type HttpSandboxClientConfig = Pick<ServerConfig, "apiKey" | "apiUrl" | "timeoutSec" | "target" | "verifySsl" | "image" | "previewDomain">;

export interface HttpSandboxClientOptions {
    logger?: Logger;
    /** Replaces the network layer. Tests use this. */
    fetch?: HttpFetch;
    project?: string;
}

/** Extra time the HTTP request gets beyond the command's own timeout. */
const EXEC_GRACE_MS = 5_000;
const HEALTH_TIMEOUT_MS = 5_000;

function createFetch(verifySsl: boolean): HttpFetch {
    const dispatcher = new Agent({ connect: { rejectUnauthorized: verifySsl } });
    return (url, request) => undiciFetch(url, { ...request, dispatcher, redirect: "follow" });
}

function isAbort(error: unknown): boolean {
    if (typeof error !== "object" || error === null || !("name" in error)) return false;
    return error.name === "TimeoutError" || error.name === "AbortError";
}

const createResponseSchema = z.object({ id: z.string().optional() }).passthrough();

const executeResponseSchema = z.object({
    code: z.number().int().optional(),
    exitCode: z.number().int().optional(),
    result: z.string().optional(),
    stdout: z.string().optional(),
    stderr: z.string().optional(),
    error: z.string().nullish()
}).passthrough();

const fileInfoResponseSchema = z.object({
    size: z.number().nonnegative(),
    isDir: z.boolean().optional()
}).passthrough();

export class HttpSandboxClient implements SandboxClient {
    private readonly config: HttpSandboxClientConfig;
    private readonly logger: Logger;
    private readonly fetch: HttpFetch;
    private readonly project: string;

    constructor(config: HttpSandboxClientConfig, options: HttpSandboxClientOptions = {}) {
        this.config = config;
        this.logger = (options.logger ?? silentLogger).child({ component: "sandbox-client" });
        this.fetch = options.fetch ?? createFetch(config.verifySsl);
        this.project = options.project ?? "python";
    }

    /** Check if the sandbox API is reachable. */
    async health(): Promise<boolean> {
        try {
            const res = await this.fetch(`${this.config.apiUrl}/health`, {
                method: "GET",
                headers: this.headers(),
                signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS)
            });
            return res.ok;
        } catch (error) {
            this.logger.debug({ err: error }, "health probe failed");
            return false;
        }
    }

    async create(): Promise<SandboxHandle> {
        if (!(await this.health())) {
            throw new RemoteError(`Sandbox API at ${this.config.apiUrl} is not reachable`, { retryable: true });
        }

        const name = `mcp-${randomBytes(4).toString("hex")}`;
        const body = {
            name,
            id: name,
            target: this.config.target,
            projects: [{
                name: this.project,
                image: this.config.image,
                user: "root",
                envVars: { PYTHONUNBUFFERED: "1" }
            }]
        };
        const created = await this.requestJson("POST", "/workspace", createResponseSchema, {
            body: JSON.stringify(body),
            contentType: "application/json",
            operation: "create workspace"
        });
        const id = created.id ?? name;

        // A workspace that cannot run a command is not worth handing out.
        try {
            const probe = await this.exec(id, "echo ready", { timeoutSec: 10 });
            if (probe.exitCode !== 0 || probe.stdout.trim() !== "ready") {
                throw new RemoteError(`Sandbox ${id} failed its smoke test: ${probe.stderr || probe.stdout}`, { retryable: true });
            }
        } catch (error) {
            await this.delete(id).catch((deleteError: unknown) => {
                this.logger.error({ sandboxId: id, err: deleteError }, "failed to delete unhealthy sandbox");
            });
            throw error;
        }

        return { id, createdAt: new Date() };
    }

    async exec(sandboxId: string, command: string, options: ExecOptions = {}): Promise<SandboxExecutionResult> {
        const timeoutSec = options.timeoutSec ?? this.config.timeoutSec;
        const payload = await this.requestJson("POST", this.toolbox(sandboxId, "process/execute"), executeResponseSchema, {
            body: JSON.stringify({
                command,
                cwd: options.cwd,
                env: options.env,
                timeout: Math.ceil(timeoutSec)
            }),
            contentType: "application/json",
            timeoutMs: timeoutSec * 1000 + EXEC_GRACE_MS,
            commandTimeoutMs: timeoutSec * 1000,
            operation: "exec",
            sandboxId
        });
        return {
            stdout: payload.stdout ?? payload.result ?? "",
            stderr: payload.stderr ?? payload.error ?? "",
            exitCode: payload.exitCode ?? payload.code ?? 0
        };
    }

    async stat(sandboxId: string, path: string): Promise<FileStat> {
        const info = await this.requestJson("GET", this.toolbox(sandboxId, "files/info", { path }), fileInfoResponseSchema, {
            operation: "stat",
            sandboxId,
            path
        });
        return { size: info.size, isDir: info.isDir ?? false };
    }

    async readFile(sandboxId: string, path: string, options: ReadOptions = {}): Promise<Buffer> {
        const offset = options.offset ?? 0;
        const ranged = offset > 0 || options.length !== undefined;
        const headers: Record<string, string> = {};
        if (ranged) {
            const end = options.length === undefined ? "" : String(offset + options.length - 1);
            headers.Range = `bytes=${offset}-${end}`;
        }

        const res = await this.send("GET", this.toolbox(sandboxId, "files/download", { path }), {
            headers,
            operation: "read file",
            sandboxId,
            path
        });
        const bytes = Buffer.from(await res.arrayBuffer());

        // 206 means the server applied the range; 200 means we got the whole file.
        if (!ranged || res.status === 206) return bytes;
        const end = options.length === undefined ? bytes.length : offset + options.length;
        return bytes.subarray(offset, end);
    }

    async writeFile(sandboxId: string, path: string, data: Buffer, options: WriteOptions): Promise<void> {
        const query = { path, overwrite: String(options.overwrite) };
        await this.send("PUT", this.toolbox(sandboxId, "files/upload", query), {
            body: data,
            contentType: "application/octet-stream",
            operation: "write file",
            sandboxId,
            path
        });
    }

    previewUrl(sandboxId: string, port: number): string {
        return `https://${port}-${sandboxId}.${this.config.previewDomain}`;
    }

    async delete(sandboxId: string): Promise<void> {
        await this.send("DELETE", `/workspace/${encodeURIComponent(sandboxId)}?force=true`, {
            operation: "delete workspace",
            sandboxId
        });
    }

    private headers(extra: Record<string, string> = {}): Record<string, string> {
        return { Authorization: `Bearer ${this.config.apiKey}`, ...extra };
    }

    private toolbox(sandboxId: string, endpoint: string, query?: Record<string, string>): string {
        const base = `/workspace/${encodeURIComponent(sandboxId)}/${this.project}/toolbox/${endpoint}`;
        return query ? `${base}?${new URLSearchParams(query).toString()}` : base;
    }

    private async requestJson<T>(
        method: HttpRequest["method"],
        route: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        options: SendOptions
    ): Promise<T> {
        const res = await this.send(method, route, options);
        const text = await res.text();
        let raw: unknown = {};
        if (text) {
            try {
                raw = JSON.parse(text);
            } catch (error) {
                throw new RemoteError(`Malformed response from ${options.operation}: ${text.slice(0, 200)}`, { cause: error });
            }
        }
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new RemoteError(`Unexpected response from ${options.operation}: ${issue.path.join(".") || "body"} ${issue.message}`);
        }
        return parsed.data;
    }

    private async send(method: HttpRequest["method"], route: string, options: SendOptions): Promise<HttpResponse> {
        const timeoutMs = options.timeoutMs ?? this.config.timeoutSec * 1000;
        const headers = this.headers(options.headers);
        if (options.contentType) headers["Content-Type"] = options.contentType;

        this.logger.debug({ method, route, sandboxId: options.sandboxId }, options.operation);
        const t0 = Date.now();
        let res: HttpResponse;
        try {
            res = await this.fetch(`${this.config.apiUrl}${route}`, {
                method,
                headers,
                body: options.body,
                signal: AbortSignal.timeout(timeoutMs)
            });
        } catch (error) {
            if (isAbort(error)) throw new TimeoutError(options.operation, timeoutMs, { cause: error });
            const message = error instanceof Error ? error.message : String(error);
            throw new RemoteError(`${options.operation} failed: ${message}`, { cause: error, retryable: true });
        }

        const durationMs = Date.now() - t0;
        if (res.ok) {
            this.logger.debug({ method, route, status: res.status, durationMs }, `${options.operation} done`);
            return res;
        }

        const detail = (await res.text().catch(() => "")).slice(0, 500);
        this.logger.warn({ method, route, status: res.status, durationMs, detail }, `${options.operation} failed`);
        throw this.toError(res.status, detail, options, timeoutMs);
    }

    private toError(status: number, detail: string, options: SendOptions, timeoutMs: number): SandboxError {
        const suffix = detail ? `: ${detail}` : "";
        // 408 is the toolbox giving up on a command; 504 is a gateway giving up on the toolbox.
        if (status === 408 || status === 504) {
            return new TimeoutError(options.operation, options.commandTimeoutMs ?? timeoutMs, {
                cause: new RemoteError(`${options.operation} failed with HTTP ${status}${suffix}`, { status })
            });
        }
        if (status === 404 && options.path !== undefined && options.sandboxId !== undefined && !/workspace/i.test(detail)) {
            return new NotFoundError(options.path);
        }
        if ((status === 404 || status === 410) && options.sandboxId !== undefined) {
            return new RemoteError(`Sandbox ${options.sandboxId} is gone (HTTP ${status})${suffix}`, { status, fatal: true });
        }
        if (status === 409) {
            return new RemoteError(`${options.operation} conflict (HTTP 409)${suffix}`, { status });
        }
        return new RemoteError(`${options.operation} failed with HTTP ${status}${suffix}`, {
            status,
            retryable: status >= 500 || status === 429
        });
    }
}

interface SendOptions {
    operation: string;
    body?: string | Uint8Array;
    contentType?: string;
    headers?: Record<string, string>;
    timeoutMs?: number;
    /** The limit the remote side enforces, when it differs from the request's. */
    commandTimeoutMs?: number;
    sandboxId?: string;
    path?: string;
}
