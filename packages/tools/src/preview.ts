import { z } from "zod";
import { buildCommand, type PreviewPayload } from "@sandbox-mcp/core";
import { defineTool, type RegisteredTool } from "./tool-registry.js";

const CHECK_TIMEOUT_SEC = 5;
const COMMAND_NOT_FOUND = 127;

/**
 * Prints the HTTP status served on the port, or 0 when nothing answers.
 * Needs only python3, which the default image ships.
 */
export function checkScript(port: number): string {
    return [
        "import urllib.error, urllib.request",
        "try:",
        `    print(urllib.request.urlopen("http://localhost:${port}", timeout=${CHECK_TIMEOUT_SEC}).status)`,
        "except urllib.error.HTTPError as e:",
        "    print(e.code)",
        "except Exception:",
        "    print(0)"
    ].join("\n");
}

export function webPreviewTool(): RegisteredTool {
    return defineTool({
        name: "web_preview",
        description:
            "Get a public preview link for a web server listening on a port inside the sandbox. " +
            "By default checks that something answers on the port first.",
        parameters: z.object({
            port: z.number().int().min(1).max(65535).describe("Port the server listens on"),
            description: z.string().optional().describe("What the preview shows"),
            check_server: z.boolean().default(true).describe("Check the port before returning the link")
        }),
        execute: async ({ port, description, check_server }, { sandbox }) => {
            const payload: PreviewPayload = { kind: "preview", url: sandbox.previewUrl(port), port, reachable: null };
            if (description) payload.description = description;
            if (!check_server) return payload;

            const check = await sandbox.exec(buildCommand("python3", ["-c", checkScript(port)]), {
                timeoutSec: CHECK_TIMEOUT_SEC + 10
            });
            if (check.exitCode === COMMAND_NOT_FOUND) {
                payload.note = `Could not check port ${port}: python3 is not installed in the sandbox. The link may still work.`;
                return payload;
            }
            const status = Number.parseInt(check.stdout.trim(), 10);
            if (check.exitCode === 0 && status > 0) {
                payload.reachable = true;
                payload.httpStatus = status;
            } else {
                payload.reachable = false;
                payload.note = `Nothing is answering on port ${port} inside the sandbox yet. Start the server, then open the link.`;
            }
            return payload;
        }
    });
}
