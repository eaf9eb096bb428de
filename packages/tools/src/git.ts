import { z } from "zod";
import { buildCommand, RemoteError, type ClonePayload } from "@sandbox-mcp/core";
import { timeoutParam } from "./exec.js";
import { defineTool, type RegisteredTool } from "./tool-registry.js";

/** Clones routinely outlast the default request timeout. */
const CLONE_TIMEOUT_SEC = 300;

const REPO_URL = /^(https?:\/\/|ssh:\/\/|git:\/\/|git@[^:]+:)/;

/**
 * Directory name `git clone` would pick: the last path segment without `.git`.
 */
export function repoDirName(repoUrl: string): string {
    const segment = repoUrl.replace(/\/+$/, "").split(/[/:]/).pop() ?? "";
    return segment.replace(/\.git$/, "") || "repo";
}

function commandFailed(step: string, result: { stdout: string; stderr: string; exitCode: number }): RemoteError {
    const detail = (result.stderr || result.stdout).trim() || `exit code ${result.exitCode}`;
    return new RemoteError(`${step} failed (exit ${result.exitCode}): ${detail}`);
}

export function gitCloneTool(): RegisteredTool {
    return defineTool({
        name: "git_clone",
        description:
            "Clone a git repository into the sandbox. Shallow by default (depth=1; depth=0 clones full history). " +
            "Set lfs=true to fetch Git LFS objects after cloning.",
        parameters: z.object({
            repo_url: z.string().regex(REPO_URL, "repo_url must be an http(s), ssh, git or scp-style URL").describe("Repository URL"),
            branch: z.string().min(1).optional().describe("Branch or tag to check out"),
            target_path: z.string().min(1).optional().describe("Destination directory. Defaults to the repository name"),
            depth: z.number().int().nonnegative().default(1).describe("History depth; 0 for full history"),
            lfs: z.boolean().default(false).describe("Run `git lfs pull` after cloning"),
            timeout: timeoutParam.describe(`Timeout in seconds for the clone and the LFS pull. Defaults to ${CLONE_TIMEOUT_SEC}`)
        }),
        execute: async ({ repo_url, branch, target_path, depth, lfs, timeout }, { sandbox, logger }) => {
            const timeoutSec = timeout ?? CLONE_TIMEOUT_SEC;
            const targetPath = target_path ?? repoDirName(repo_url);
            const args = ["clone"];
            if (depth > 0) args.push("--depth", String(depth));
            if (branch) args.push("--branch", branch);
            args.push("--", repo_url, targetPath);

            const clone = await sandbox.exec(buildCommand("git", args), { timeoutSec });
            if (clone.exitCode !== 0) throw commandFailed("git clone", clone);

            if (lfs) {
                const pull = await sandbox.exec(buildCommand("git", ["-C", targetPath, "lfs", "pull"]), { timeoutSec });
                if (pull.exitCode !== 0) throw commandFailed("git lfs pull", pull);
            }

            const head = await sandbox.exec(buildCommand("git", ["-C", targetPath, "rev-parse", "HEAD"]));
            const commit = head.exitCode === 0 ? head.stdout.trim() : "";
            logger.debug({ repoUrl: repo_url, targetPath, commit }, "repository cloned");

            const payload: ClonePayload = { kind: "clone", repoUrl: repo_url, targetPath, lfs };
            if (branch) payload.branch = branch;
            if (commit) payload.commit = commit;
            return payload;
        }
    });
}
