import type { TransferExecutorOptions } from "@sandbox-mcp/core";
import { pythonInterpreterTool, shellExecTool } from "./exec.js";
import { fileDownloadTool, fileUploadTool } from "./files.js";
import { gitCloneTool } from "./git.js";
import { webPreviewTool } from "./preview.js";
import type { RegisteredTool } from "./tool-registry.js";

export * from "./tool-registry.js";
export * from "./router.js";
export * from "./exec.js";
export * from "./files.js";
export * from "./git.js";
export * from "./preview.js";

export interface DefaultToolsOptions {
    transfer?: TransferExecutorOptions;
}

export function createDefaultTools(options: DefaultToolsOptions = {}): RegisteredTool[] {
    return [
        pythonInterpreterTool(),
        shellExecTool(),
        fileUploadTool(),
        fileDownloadTool(options.transfer),
        gitCloneTool(),
        webPreviewTool()
    ];
}
