import { z } from "zod";
import {
    createTransferRequest,
    decide,
    DEFAULT_CHUNK_SIZE_KB,
    DEFAULT_SIZE_CEILING_MB,
    DOWNLOAD_OPTIONS,
    inferMimeClass,
    TransferError,
    TransferExecutor,
    type DownloadOption,
    type FileMetadata,
    type TransferExecutorOptions,
    type UploadPayload
} from "@sandbox-mcp/core";
import { timeoutParam } from "./exec.js";
import { defineTool, type RegisteredTool } from "./tool-registry.js";

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function isValidBase64(value: string): boolean {
    const compact = value.replace(/\s+/g, "");
    return compact.length % 4 === 0 && BASE64.test(compact);
}

const filePath = z.string().min(1).refine((value) => !value.includes("\0"), "Path contains invalid null byte");

export function fileUploadTool(): RegisteredTool {
    return defineTool({
        name: "file_upload",
        description:
            "Write a file into the sandbox. Content is plain text, or base64 for binary files. " +
            "With overwrite=false an existing file is left untouched and the call fails.",
        parameters: z
            .object({
                file_path: filePath.describe("Destination path inside the sandbox"),
                content: z.string().describe("File content"),
                encoding: z.enum(["text", "base64"]).default("text").describe("How `content` is encoded"),
                overwrite: z.boolean().default(true).describe("Replace the file if it exists")
            })
            .superRefine((args, ctx) => {
                if (args.encoding === "base64" && !isValidBase64(args.content)) {
                    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["content"], message: "content is not valid base64" });
                }
            }),
        execute: async ({ file_path, content, encoding, overwrite }, { sandbox, logger }) => {
            const data = encoding === "base64" ? Buffer.from(content, "base64") : Buffer.from(content, "utf-8");
            await sandbox.writeFile(file_path, data, { overwrite });
            logger.debug({ path: file_path, bytes: data.length }, "file uploaded");

            const payload: UploadPayload = { kind: "upload", path: file_path, bytesWritten: data.length, overwrite };
            return payload;
        }
    });
}

const DOWNLOAD_OPTION_NAMES = ["auto", "download_partial", "convert_to_text", "compress_file", "force_download"] as const satisfies readonly DownloadOption[];

export function fileDownloadTool(options: TransferExecutorOptions = {}): RegisteredTool {
    const executor = new TransferExecutor(options);

    return defineTool({
        name: "file_download",
        description:
            `Download a file from the sandbox. Files up to max_size_mb (default ${DEFAULT_SIZE_CEILING_MB}) are returned whole. ` +
            "Larger files need an explicit download_option: download_partial pages through the file by offset, " +
            "convert_to_text extracts text from documents, compress_file gzips first, force_download sends everything.",
        parameters: z.object({
            file_path: filePath.describe("Path of the file inside the sandbox"),
            max_size_mb: z.number().positive().default(DEFAULT_SIZE_CEILING_MB).describe("Size ceiling in megabytes"),
            download_option: z.enum(DOWNLOAD_OPTION_NAMES).default("auto").describe("Strategy for files over the ceiling"),
            chunk_size_kb: z
                .number()
                .min(1 / 1024, "chunk_size_kb must cover at least one byte")
                .default(DEFAULT_CHUNK_SIZE_KB)
                .describe("Chunk size for download_partial"),
            offset: z.number().int().nonnegative().default(0).describe("Byte offset for download_partial"),
            timeout: timeoutParam.describe("Timeout in seconds for convert_to_text and compress_file. Defaults to the server's configured timeout")
        }),
        execute: async (args, { sandbox, logger, defaultTimeoutSec }) => {
            const stat = await sandbox.stat(args.file_path);
            const strategy = DOWNLOAD_OPTIONS[args.download_option];
            if (stat.isDir) {
                throw new TransferError(`${args.file_path} is a directory`, strategy, { retryable: false });
            }

            const metadata: FileMetadata = { path: args.file_path, size: stat.size, mimeClass: inferMimeClass(args.file_path) };
            const request = createTransferRequest({
                path: args.file_path,
                maxSizeMb: args.max_size_mb,
                strategy,
                chunkSizeKb: args.chunk_size_kb,
                offset: args.offset
            });
            const plan = decide(metadata, request);
            logger.debug({ path: args.file_path, size: stat.size, mimeClass: metadata.mimeClass, plan: plan.kind }, "transfer planned");
            return executor.execute(sandbox, plan, { timeoutSec: args.timeout ?? defaultTimeoutSec, logger });
        }
    });
}
