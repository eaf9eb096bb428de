import type { Logger } from "../logger.js";
import { buildCommand } from "../utils/shell.js";
import type { Sandbox } from "./sandbox.js";

/**
 * Best-effort `rm -rf` of scratch paths inside the sandbox. Failures are logged, never thrown.
 */
export async function removeRemotePaths(sandbox: Sandbox, paths: readonly string[], logger: Logger): Promise<void> {
    try {
        const result = await sandbox.exec(buildCommand("rm", ["-rf", ...paths]));
        if (result.exitCode !== 0) logger.warn({ paths, stderr: result.stderr }, "scratch files not removed");
    } catch (error) {
        logger.warn({ paths, err: error }, "scratch files not removed");
    }
}
