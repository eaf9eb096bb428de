import { randomBytes } from "node:crypto";
import { SandboxError, TransferError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import { removeRemotePaths } from "../sandbox/cleanup.js";
import type { Sandbox } from "../sandbox/sandbox.js";
import { buildCommand, quoteArg } from "../utils/shell.js";
import type { TransferPlan, TransferPlanKind } from "./policy.js";

export type TransferEncoding = "base64" | "utf-8";

export interface TransferPayload {
    kind: "transfer";
    path: string;
    strategyUsed: Exclude<TransferPlanKind, "rejected">;
    encoding: TransferEncoding;
    data: string;
    /** Raw bytes moved across the boundary, before encoding. */
    byteLength: number;
    /** Logical size of the file in the sandbox. */
    fileSize: number;
    truncated: boolean;
    offset?: number;
    nextOffset?: number;
    compression?: "gzip";
}

export interface TransferExecutorOptions {
    /** Where converted and compressed copies are written inside the sandbox. */
    scratchDir?: string;
}

export interface TransferRunOptions {
    /** Seconds the remote conversion may take. Falls back to the client's timeout. */
    timeoutSec?: number;
    logger?: Logger;
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/** Text as utf-8 when the bytes decode cleanly, otherwise base64 so nothing is lost. */
function encodeText(bytes: Buffer): { encoding: TransferEncoding; data: string } {
    try {
        return { encoding: "utf-8", data: strictUtf8.decode(bytes) };
    } catch {
        return { encoding: "base64", data: bytes.toString("base64") };
    }
}

/**
 * Executes a transfer plan against a bound sandbox.
 * Either the whole payload is assembled or a TransferError is thrown.
 */
export class TransferExecutor {
    private readonly scratchDir: string;

    constructor(options: TransferExecutorOptions = {}) {
        this.scratchDir = options.scratchDir ?? "/tmp/sandbox-mcp";
    }

    async execute(sandbox: Sandbox, plan: TransferPlan, run: TransferRunOptions = {}): Promise<TransferPayload> {
        if (plan.kind === "rejected") {
            throw new TransferError(`Transfer of ${plan.path} rejected: ${plan.reason}`, plan.strategy, { retryable: false });
        }

        try {
            switch (plan.kind) {
                case "full":
                case "forced": {
                    const bytes = await sandbox.readFile(plan.path);
                    const body = plan.mimeClass === "text"
                        ? encodeText(bytes)
                        : { encoding: "base64" as const, data: bytes.toString("base64") };
                    return {
                        kind: "transfer", path: plan.path, strategyUsed: plan.kind, ...body,
                        byteLength: bytes.length, fileSize: plan.size, truncated: false
                    };
                }
                case "chunked": {
                    const bytes = await sandbox.readFile(plan.path, { offset: plan.offset, length: plan.length });
                    if (bytes.length !== plan.length) {
                        throw new TransferError(
                            `Short read on ${plan.path}: expected ${plan.length} bytes at offset ${plan.offset}, got ${bytes.length}`,
                            plan.kind
                        );
                    }
                    const end = plan.offset + plan.length;
                    const truncated = end < plan.size;
                    return {
                        kind: "transfer", path: plan.path, strategyUsed: plan.kind, encoding: "base64",
                        data: bytes.toString("base64"), byteLength: bytes.length, fileSize: plan.size,
                        truncated, offset: plan.offset, ...(truncated ? { nextOffset: end } : {})
                    };
                }
                case "text": {
                    const target = this.scratchPath(".txt");
                    const command = plan.mimeClass === "document"
                        ? buildCommand("pdftotext", ["-layout", plan.path, target])
                        : `${buildCommand("iconv", ["-f", "utf-8", "-t", "utf-8", "-c", plan.path])} > ${quoteArg(target)}`;
                    const bytes = await this.convertAndRead(sandbox, command, target, plan.kind, run);
                    return {
                        kind: "transfer", path: plan.path, strategyUsed: plan.kind, ...encodeText(bytes),
                        byteLength: bytes.length, fileSize: plan.size, truncated: false
                    };
                }
                case "compressed": {
                    const target = this.scratchPath(".gz");
                    const command = `${buildCommand("gzip", ["-c", plan.path])} > ${quoteArg(target)}`;
                    const bytes = await this.convertAndRead(sandbox, command, target, plan.kind, run);
                    return {
                        kind: "transfer", path: plan.path, strategyUsed: plan.kind, encoding: "base64",
                        data: bytes.toString("base64"), byteLength: bytes.length, fileSize: plan.size,
                        truncated: false, compression: "gzip"
                    };
                }
            }
        } catch (error) {
            if (error instanceof TransferError) throw error;
            const message = error instanceof Error ? error.message : String(error);
            throw new TransferError(`${plan.kind} transfer of ${plan.path} failed: ${message}`, plan.kind, {
                cause: error,
                retryable: error instanceof SandboxError ? error.retryable : false
            });
        }
    }

    private scratchPath(extension: string): string {
        return `${this.scratchDir}/${randomBytes(6).toString("hex")}${extension}`;
    }

    /** Runs the converter, reads its output, then removes the scratch copy whatever happened. */
    private async convertAndRead(
        sandbox: Sandbox,
        command: string,
        target: string,
        strategy: string,
        run: TransferRunOptions
    ): Promise<Buffer> {
        try {
            const result = await sandbox.exec(`mkdir -p ${quoteArg(this.scratchDir)} && ${command}`, { timeoutSec: run.timeoutSec });
            if (result.exitCode !== 0) {
                const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
                throw new TransferError(`Remote ${strategy} conversion failed: ${detail}`, strategy);
            }
            return await sandbox.readFile(target);
        } finally {
            await removeRemotePaths(sandbox, [target], run.logger ?? silentLogger);
        }
    }
}

