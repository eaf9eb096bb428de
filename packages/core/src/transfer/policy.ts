import { MimeClass, supportsTextExtraction } from "./mime.js";
import { formatSize } from "../utils/shell.js";

export const DEFAULT_SIZE_CEILING_MB = 5;
export const DEFAULT_CHUNK_SIZE_KB = 64;
const MB = 1024 * 1024;
const KB = 1024;

export type TransferStrategy = "auto" | "partial" | "convert_to_text" | "compress" | "force";

/** Option names as the `file_download` tool spells them. */
export const DOWNLOAD_OPTIONS = {
    auto: "auto",
    download_partial: "partial",
    convert_to_text: "convert_to_text",
    compress_file: "compress",
    force_download: "force"
} as const satisfies Record<string, TransferStrategy>;

export type DownloadOption = keyof typeof DOWNLOAD_OPTIONS;

export interface FileMetadata {
    readonly path: string;
    readonly size: number;
    readonly mimeClass: MimeClass;
}

export interface TransferRequest {
    readonly path: string;
    /** Bytes. Files at or under this size always transfer in full. */
    readonly sizeCeiling: number;
    readonly strategy: TransferStrategy;
    readonly chunkLength: number;
    readonly offset: number;
}

export interface TransferRequestInput {
    path: string;
    maxSizeMb?: number;
    strategy?: TransferStrategy;
    chunkSizeKb?: number;
    offset?: number;
}

export function createTransferRequest(input: TransferRequestInput): TransferRequest {
    return Object.freeze({
        path: input.path,
        sizeCeiling: Math.floor((input.maxSizeMb ?? DEFAULT_SIZE_CEILING_MB) * MB),
        strategy: input.strategy ?? "auto",
        chunkLength: Math.floor((input.chunkSizeKb ?? DEFAULT_CHUNK_SIZE_KB) * KB),
        offset: input.offset ?? 0
    });
}

export type TransferPlan =
    | { readonly kind: "full"; readonly path: string; readonly size: number; readonly mimeClass: MimeClass }
    | { readonly kind: "forced"; readonly path: string; readonly size: number; readonly mimeClass: MimeClass }
    | { readonly kind: "chunked"; readonly path: string; readonly size: number; readonly offset: number; readonly length: number }
    | { readonly kind: "text"; readonly path: string; readonly size: number; readonly mimeClass: MimeClass }
    | { readonly kind: "compressed"; readonly path: string; readonly size: number }
    | { readonly kind: "rejected"; readonly path: string; readonly size: number; readonly strategy: TransferStrategy; readonly reason: string };

export type TransferPlanKind = TransferPlan["kind"];

/**
 * Picks how a file leaves the sandbox. Pure: no I/O, same input gives the same plan.
 *
 * Under the ceiling everything is a full transfer. Over it, only an explicit
 * strategy moves bytes; `auto` is always rejected.
 */
export function decide(metadata: FileMetadata, request: TransferRequest): TransferPlan {
    const { path, size, mimeClass } = metadata;

    if (size <= request.sizeCeiling) {
        return { kind: "full", path, size, mimeClass };
    }

    switch (request.strategy) {
        case "force":
            return { kind: "forced", path, size, mimeClass };
        case "partial": {
            if (request.chunkLength < 1) {
                return {
                    kind: "rejected", path, size, strategy: request.strategy,
                    reason: `chunk size must be at least 1 byte (got ${request.chunkLength})`
                };
            }
            if (request.offset >= size) {
                return {
                    kind: "rejected", path, size, strategy: request.strategy,
                    reason: `offset ${request.offset} is beyond end of file (${size} bytes)`
                };
            }
            const length = Math.min(request.chunkLength, size - request.offset);
            return { kind: "chunked", path, size, offset: request.offset, length };
        }
        case "convert_to_text":
            if (!supportsTextExtraction(mimeClass)) {
                return {
                    kind: "rejected", path, size, strategy: request.strategy,
                    reason: `unsupported for text conversion: ${mimeClass} file`
                };
            }
            return { kind: "text", path, size, mimeClass };
        case "compress":
            return { kind: "compressed", path, size };
        case "auto":
            return {
                kind: "rejected", path, size, strategy: request.strategy,
                reason: `exceeds size limit; specify a strategy (file is ${formatSize(size)}, limit ${formatSize(request.sizeCeiling)}; ` +
                    "use download_partial, convert_to_text, compress_file or force_download)"
            };
    }
}
