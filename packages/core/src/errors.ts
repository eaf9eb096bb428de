export type ErrorKind =
    | "validation"
    | "provisioning"
    | "remote"
    | "not_found"
    | "timeout"
    | "transfer"
    | "config"
    | "internal";

export interface SandboxErrorOptions {
    retryable?: boolean;
    cause?: unknown;
}

/**
 * Base class for every failure the server reports to a caller.
 * `kind` is stable and is what callers branch on; messages may change.
 */
export class SandboxError extends Error {
    public readonly kind: ErrorKind;
    public readonly retryable: boolean;

    constructor(kind: ErrorKind, message: string, options: SandboxErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = "SandboxError";
        this.kind = kind;
        this.retryable = options.retryable ?? false;

        // Fix prototype chain for subclassing built-ins in TS
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Malformed tool arguments. Raised before any sandbox is touched. */
export class ValidationError extends SandboxError {
    constructor(message: string, options: SandboxErrorOptions = {}) {
        super("validation", message, options);
        this.name = "ValidationError";
    }
}

export class ProvisioningError extends SandboxError {
    public readonly attempts: number;

    constructor(message: string, options: SandboxErrorOptions & { attempts?: number } = {}) {
        super("provisioning", message, { retryable: true, ...options });
        this.name = "ProvisioningError";
        this.attempts = options.attempts ?? 1;
    }
}

export interface RemoteErrorOptions extends SandboxErrorOptions {
    status?: number;
    /** The sandbox itself is gone; the session must be replaced. */
    fatal?: boolean;
}

export class RemoteError extends SandboxError {
    public readonly status?: number;
    public readonly fatal: boolean;

    constructor(message: string, options: RemoteErrorOptions = {}, kind: ErrorKind = "remote") {
        super(kind, message, options);
        this.name = "RemoteError";
        this.status = options.status;
        this.fatal = options.fatal ?? false;
    }
}

export class NotFoundError extends RemoteError {
    public readonly path: string;

    constructor(path: string, options: RemoteErrorOptions = {}) {
        super(`No such file or directory: ${path}`, { status: 404, ...options }, "not_found");
        this.name = "NotFoundError";
        this.path = path;
    }
}

export class TimeoutError extends SandboxError {
    public readonly timeoutMs: number;

    constructor(operation: string, timeoutMs: number, options: SandboxErrorOptions = {}) {
        super("timeout", `${operation} timed out after ${timeoutMs}ms`, { retryable: true, ...options });
        this.name = "TimeoutError";
        this.timeoutMs = timeoutMs;
    }
}

export class TransferError extends SandboxError {
    /** The strategy that was attempted or rejected. */
    public readonly strategy: string;

    constructor(message: string, strategy: string, options: SandboxErrorOptions = {}) {
        super("transfer", message, { retryable: true, ...options });
        this.name = "TransferError";
        this.strategy = strategy;
    }
}

export class ConfigError extends SandboxError {
    constructor(message: string, options: SandboxErrorOptions = {}) {
        super("config", message, options);
        this.name = "ConfigError";
    }
}

export interface ErrorDescriptor {
    kind: ErrorKind;
    message: string;
    retryable: boolean;
    strategy?: string;
    status?: number;
}

export function toErrorDescriptor(error: unknown): ErrorDescriptor {
    if (error instanceof SandboxError) {
        const descriptor: ErrorDescriptor = {
            kind: error.kind,
            message: error.message,
            retryable: error.retryable
        };
        if (error instanceof TransferError) descriptor.strategy = error.strategy;
        if (error instanceof RemoteError && error.status !== undefined) descriptor.status = error.status;
        return descriptor;
    }
    if (error instanceof Error) {
        return { kind: "internal", message: error.message, retryable: false };
    }
    return { kind: "internal", message: String(error), retryable: false };
}

/**
 * Walks the `cause` chain looking for a RemoteError flagged as fatal.
 * Transfer failures wrap the remote error, so the top-level error alone is not enough.
 */
export function isFatalRemoteError(error: unknown): boolean {
    let current: unknown = error;
    for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
        if (current instanceof RemoteError && current.fatal) return true;
        current = current.cause;
    }
    return false;
}
