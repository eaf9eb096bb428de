import { ErrorDescriptor, toErrorDescriptor } from "./errors.js";
import type { TransferPayload } from "./transfer/executor.js";

export interface ImageArtifact {
    path: string;
    mimeType: string;
    /** base64 */
    data: string;
}

export interface ExecutionPayload {
    kind: "execution";
    stdout: string;
    stderr: string;
    exitCode: number;
    artifacts: ImageArtifact[];
}

export interface UploadPayload {
    kind: "upload";
    path: string;
    bytesWritten: number;
    overwrite: boolean;
}

export interface ClonePayload {
    kind: "clone";
    repoUrl: string;
    targetPath: string;
    branch?: string;
    commit?: string;
    lfs: boolean;
}

export interface PreviewPayload {
    kind: "preview";
    url: string;
    port: number;
    reachable: boolean | null;
    httpStatus?: number;
    description?: string;
    note?: string;
}

export type ToolPayload = ExecutionPayload | UploadPayload | ClonePayload | PreviewPayload | TransferPayload;

export interface OkEnvelope {
    readonly status: "ok";
    readonly tool: string;
    readonly durationMs: number;
    readonly payload: ToolPayload;
}

export interface ErrorEnvelope {
    readonly status: "error";
    readonly tool: string;
    readonly durationMs: number;
    readonly error: ErrorDescriptor;
}

export type ResultEnvelope = OkEnvelope | ErrorEnvelope;

export function okEnvelope(tool: string, payload: ToolPayload, durationMs: number): OkEnvelope {
    return Object.freeze({ status: "ok", tool, durationMs, payload: Object.freeze(payload) });
}

export function errorEnvelope(tool: string, error: unknown, durationMs: number): ErrorEnvelope {
    return Object.freeze({ status: "error", tool, durationMs, error: Object.freeze(toErrorDescriptor(error)) });
}

export function isOk(envelope: ResultEnvelope): envelope is OkEnvelope {
    return envelope.status === "ok";
}
