import {
    DEFAULT_TIMEOUT_SEC,
    errorEnvelope,
    okEnvelope,
    silentLogger,
    ValidationError,
    type Logger,
    type ResultEnvelope,
    type SessionManager
} from "@sandbox-mcp/core";
import type { RegisteredTool } from "./tool-registry.js";

export interface ToolRouterOptions {
    logger?: Logger;
    defaultTimeoutSec?: number;
}

/**
 * The single boundary between callers and the sandbox. Arguments are
 * validated before a session is touched, and every outcome, including
 * thrown errors, comes back as a ResultEnvelope.
 */
export class ToolRouter {
    private readonly tools = new Map<string, RegisteredTool>();
    private readonly sessions: SessionManager;
    private readonly logger: Logger;
    private readonly defaultTimeoutSec: number;

    constructor(sessions: SessionManager, tools: readonly RegisteredTool[], options: ToolRouterOptions = {}) {
        this.sessions = sessions;
        this.logger = (options.logger ?? silentLogger).child({ component: "router" });
        this.defaultTimeoutSec = options.defaultTimeoutSec ?? DEFAULT_TIMEOUT_SEC;
        for (const tool of tools) {
            if (this.tools.has(tool.name)) {
                throw new Error(`Duplicate tool name: ${tool.name}`);
            }
            this.tools.set(tool.name, tool);
        }
    }

    list(): RegisteredTool[] {
        return Array.from(this.tools.values());
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    async dispatch(name: string, args: unknown): Promise<ResultEnvelope> {
        const t0 = Date.now();
        const log = this.logger.child({ tool: name });

        try {
            const tool = this.tools.get(name);
            if (!tool) throw new ValidationError(`Unknown tool: ${name}`);

            const run = tool.prepare(args);
            const payload = await this.sessions.withSandbox((sandbox) =>
                run({ sandbox, logger: log, defaultTimeoutSec: this.defaultTimeoutSec })
            );
            const envelope = okEnvelope(name, payload, Date.now() - t0);
            log.info({ durationMs: envelope.durationMs, status: envelope.status }, "tool call finished");
            return envelope;
        } catch (error) {
            const envelope = errorEnvelope(name, error, Date.now() - t0);
            log.warn(
                { durationMs: envelope.durationMs, status: envelope.status, errorKind: envelope.error.kind, err: error },
                "tool call failed"
            );
            return envelope;
        }
    }
}
