import { randomBytes } from "node:crypto";
import { z } from "zod";
import { imageMimeType, quoteArg, removeRemotePaths, type ExecutionPayload, type ImageArtifact, type Sandbox } from "@sandbox-mcp/core";
import { defineTool, type RegisteredTool } from "./tool-registry.js";

const MAX_COMMAND_LENGTH = 8000;

export const timeoutParam = z
    .number()
    .positive()
    .max(3600)
    .optional()
    .describe("Timeout in seconds. Defaults to the server's configured timeout");

/**
 * Prepended to every interpreter script. Forces a headless matplotlib backend
 * and saves each open figure when the interpreter exits.
 */
export function plotPreamble(plotDir: string): string {
    return [
        "import atexit as _sbx_atexit, os as _sbx_os",
        "try:",
        "    import matplotlib as _sbx_mpl",
        "    _sbx_mpl.use('Agg')",
        "    def _sbx_save_figures():",
        "        import matplotlib.pyplot as _sbx_plt",
        "        if not _sbx_plt.get_fignums():",
        "            return",
        `        _sbx_os.makedirs(${JSON.stringify(plotDir)}, exist_ok=True)`,
        "        for _sbx_n in _sbx_plt.get_fignums():",
        `            _sbx_plt.figure(_sbx_n).savefig(_sbx_os.path.join(${JSON.stringify(plotDir)}, 'figure_%d.png' % _sbx_n), bbox_inches='tight')`,
        "    _sbx_atexit.register(_sbx_save_figures)",
        "except ImportError:",
        "    pass",
        ""
    ].join("\n");
}

async function collectPlots(sandbox: Sandbox, plotDir: string): Promise<ImageArtifact[]> {
    const listing = await sandbox.exec(`find ${quoteArg(plotDir)} -maxdepth 1 -type f -name '*.png' 2>/dev/null | sort`);
    if (listing.exitCode !== 0) return [];

    const artifacts: ImageArtifact[] = [];
    for (const path of listing.stdout.split("\n").map((line) => line.trim()).filter(Boolean)) {
        const bytes = await sandbox.readFile(path);
        artifacts.push({ path, mimeType: imageMimeType(path) ?? "image/png", data: bytes.toString("base64") });
    }
    return artifacts;
}

export function pythonInterpreterTool(): RegisteredTool {
    return defineTool({
        name: "python_interpreter",
        description:
            "Run Python 3 code in the sandbox and return stdout, stderr and the exit code. " +
            "Figures created with matplotlib are returned as PNG images.",
        parameters: z.object({
            code: z.string().min(1).describe("Python source to run"),
            timeout: timeoutParam
        }),
        execute: async ({ code, timeout }, { sandbox, logger, defaultTimeoutSec }) => {
            const runId = randomBytes(4).toString("hex");
            const scriptPath = `/tmp/sandbox-mcp-run-${runId}.py`;
            const plotDir = `/tmp/sandbox-mcp-plots-${runId}`;

            try {
                // Uploaded rather than inlined, so user code never passes through the shell.
                await sandbox.writeFile(scriptPath, Buffer.from(plotPreamble(plotDir) + code, "utf-8"), { overwrite: true });
                const result = await sandbox.exec(`python3 ${quoteArg(scriptPath)}`, { timeoutSec: timeout ?? defaultTimeoutSec });

                const payload: ExecutionPayload = {
                    kind: "execution",
                    stdout: result.stdout,
                    stderr: result.stderr,
                    exitCode: result.exitCode,
                    artifacts: await collectPlots(sandbox, plotDir)
                };
                return payload;
            } finally {
                await removeRemotePaths(sandbox, [scriptPath, plotDir], logger);
            }
        }
    });
}

export function shellExecTool(): RegisteredTool {
    return defineTool({
        name: "shell_exec",
        description:
            "Execute a shell command in the sandbox. A non-zero exit code is reported in the result, not as an error.",
        parameters: z.object({
            command: z
                .string()
                .min(1)
                .max(MAX_COMMAND_LENGTH, `Command exceeds max length of ${MAX_COMMAND_LENGTH} characters`)
                .refine((value) => !value.includes("\0"), "Command contains invalid null byte")
                .describe("The shell command to execute"),
            cwd: z.string().min(1).optional().describe("Working directory inside the sandbox"),
            timeout: timeoutParam
        }),
        execute: async ({ command, cwd, timeout }, { sandbox, defaultTimeoutSec }) => {
            const result = await sandbox.exec(command, { cwd, timeoutSec: timeout ?? defaultTimeoutSec });
            const payload: ExecutionPayload = {
                kind: "execution",
                stdout: result.stdout,
                stderr: result.stderr,
                exitCode: result.exitCode,
                artifacts: []
            };
            return payload;
        }
    });
}
