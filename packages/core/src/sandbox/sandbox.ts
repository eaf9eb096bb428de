/**
 * Sandbox Interface
 * The remote sandbox API as the rest of the server sees it.
 */

export interface SandboxExecutionResult {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface ExecOptions {
    cwd?: string;
    env?: Record<string, string>;
    /** Seconds. Falls back to the client's configured timeout. */
    timeoutSec?: number;
}

export interface FileStat {
    size: number;
    isDir: boolean;
}

export interface ReadOptions {
    offset?: number;
    /** Bytes to read from `offset`. Reads to end of file when omitted. */
    length?: number;
}

export interface WriteOptions {
    overwrite: boolean;
}

export interface SandboxHandle {
    id: string;
    createdAt: Date;
}

/**
 * Remote sandbox provider. Every call except `create` addresses a sandbox by id.
 * Only the SessionManager talks to this directly.
 */
export interface SandboxClient {
    create(): Promise<SandboxHandle>;

    exec(sandboxId: string, command: string, options?: ExecOptions): Promise<SandboxExecutionResult>;

    stat(sandboxId: string, path: string): Promise<FileStat>;

    readFile(sandboxId: string, path: string, options?: ReadOptions): Promise<Buffer>;

    writeFile(sandboxId: string, path: string, data: Buffer, options: WriteOptions): Promise<void>;

    previewUrl(sandboxId: string, port: number): string;

    delete(sandboxId: string): Promise<void>;
}

/**
 * A sandbox bound to the live session. Handed to tools for the duration of one call.
 */
export interface Sandbox {
    readonly id: string;

    /**
     * Executes a command inside the sandbox.
     */
    exec(command: string, options?: ExecOptions): Promise<SandboxExecutionResult>;

    stat(path: string): Promise<FileStat>;

    /**
     * Reads a file from the sandbox.
     */
    readFile(path: string, options?: ReadOptions): Promise<Buffer>;

    /**
     * Writes a file to the sandbox.
     */
    writeFile(path: string, data: Buffer, options: WriteOptions): Promise<void>;

    previewUrl(port: number): string;
}
