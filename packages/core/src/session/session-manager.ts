import { isFatalRemoteError, ProvisioningError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type { Sandbox, SandboxClient } from "../sandbox/sandbox.js";

export interface SandboxSession {
    readonly id: string;
    readonly createdAt: Date;
    alive: boolean;
}

export interface SessionManagerOptions {
    logger?: Logger;
    /** Total create attempts before giving up. */
    maxAttempts?: number;
    initialRetryDelayMs?: number;
    maxRetryDelayMs?: number;
}

/** The part of `process` the shutdown hooks need. */
export interface ShutdownHost {
    on(event: string, listener: (...args: unknown[]) => void): unknown;
    off(event: string, listener: (...args: unknown[]) => void): unknown;
    exit(code?: number): void;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Owns the one sandbox this process uses.
 *
 * Creation is lazy and single-flight: concurrent callers that find no live
 * session all wait on the same create. Teardown is idempotent, waits for
 * in-flight calls to finish, and never throws.
 */
export class SessionManager {
    private readonly client: SandboxClient;
    private readonly logger: Logger;
    private readonly maxAttempts: number;
    private readonly initialRetryDelayMs: number;
    private readonly maxRetryDelayMs: number;

    private session?: SandboxSession;
    private creating?: Promise<SandboxSession>;
    private teardownPromise?: Promise<void>;
    private inFlight = 0;
    private idleWaiters: Array<() => void> = [];
    private uninstallHooks?: () => void;

    constructor(client: SandboxClient, options: SessionManagerOptions = {}) {
        this.client = client;
        this.logger = (options.logger ?? silentLogger).child({ component: "session" });
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
        this.initialRetryDelayMs = options.initialRetryDelayMs ?? 500;
        this.maxRetryDelayMs = options.maxRetryDelayMs ?? 5000;
    }

    get current(): SandboxSession | undefined {
        return this.session?.alive ? this.session : undefined;
    }

    get closed(): boolean {
        return this.teardownPromise !== undefined;
    }

    async ensureSession(): Promise<SandboxSession> {
        if (this.closed) {
            throw new ProvisioningError("Session manager is shut down", { retryable: false });
        }
        if (this.session?.alive) return this.session;
        if (!this.creating) {
            this.creating = this.provision().finally(() => {
                this.creating = undefined;
            });
        }
        return this.creating;
    }

    /**
     * Runs `fn` against the live sandbox, creating it first if needed.
     * The call counts as in flight until `fn` settles, so teardown waits for it.
     */
    async withSandbox<T>(fn: (sandbox: Sandbox) => Promise<T>): Promise<T> {
        const session = await this.ensureSession();
        if (this.closed) {
            throw new ProvisioningError("Session manager is shut down", { retryable: false });
        }
        this.inFlight += 1;
        try {
            return await fn(this.bind(session));
        } catch (error) {
            if (isFatalRemoteError(error)) {
                await this.invalidate(session, error);
            }
            throw error;
        } finally {
            this.inFlight -= 1;
            if (this.inFlight === 0) this.notifyIdle();
        }
    }

    /**
     * Drops a session whose sandbox is gone. The next call provisions a new one.
     */
    async invalidate(session: SandboxSession, reason: unknown): Promise<void> {
        if (this.session !== session || !session.alive) return;
        session.alive = false;
        this.session = undefined;
        this.logger.warn({ sandboxId: session.id, err: reason }, "sandbox lost; session invalidated");
        await this.deleteQuietly(session);
    }

    teardown(): Promise<void> {
        if (!this.teardownPromise) {
            this.teardownPromise = this.runTeardown();
        }
        return this.teardownPromise;
    }

    /**
     * Installs signal and crash handlers that tear the sandbox down before the
     * process exits. Returns a function that removes them.
     */
    registerShutdownHooks(host: ShutdownHost): () => void {
        if (this.uninstallHooks) return this.uninstallHooks;

        const shutdown = (code: number) => {
            void this.teardown().finally(() => host.exit(code));
        };
        const onSigint = () => shutdown(130);
        const onSigterm = () => shutdown(143);
        const onBeforeExit = () => {
            if (!this.closed) shutdown(0);
        };
        const onFatal = (error: unknown) => {
            this.logger.fatal({ err: error }, "unrecoverable error; tearing down sandbox");
            shutdown(1);
        };

        host.on("SIGINT", onSigint);
        host.on("SIGTERM", onSigterm);
        host.on("beforeExit", onBeforeExit);
        host.on("uncaughtException", onFatal);
        host.on("unhandledRejection", onFatal);

        this.uninstallHooks = () => {
            host.off("SIGINT", onSigint);
            host.off("SIGTERM", onSigterm);
            host.off("beforeExit", onBeforeExit);
            host.off("uncaughtException", onFatal);
            host.off("unhandledRejection", onFatal);
            this.uninstallHooks = undefined;
        };
        return this.uninstallHooks;
    }

    private async provision(): Promise<SandboxSession> {
        let delay = this.initialRetryDelayMs;
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            const t0 = Date.now();
            try {
                const handle = await this.client.create();
                const session: SandboxSession = { id: handle.id, createdAt: handle.createdAt, alive: true };
                this.logger.info({ sandboxId: session.id, attempt, durationMs: Date.now() - t0 }, "sandbox created");

                if (this.closed) {
                    // Shut down while we were waiting on the provider.
                    session.alive = false;
                    await this.deleteQuietly(session);
                    throw new ProvisioningError("Session manager shut down during provisioning", { retryable: false });
                }
                this.session = session;
                return session;
            } catch (error) {
                if (error instanceof ProvisioningError) throw error;
                lastError = error;
                this.logger.warn({ attempt, maxAttempts: this.maxAttempts, err: error }, "sandbox creation failed");
                if (attempt < this.maxAttempts) {
                    await sleep(delay);
                    delay = Math.min(delay * 2, this.maxRetryDelayMs);
                }
            }
        }

        const message = lastError instanceof Error ? lastError.message : String(lastError);
        throw new ProvisioningError(`Failed to create sandbox after ${this.maxAttempts} attempt(s): ${message}`, {
            cause: lastError,
            attempts: this.maxAttempts
        });
    }

    private async runTeardown(): Promise<void> {
        await this.waitForIdle();
        if (this.creating) {
            // provision() sees `closed` and deletes what it created.
            await this.creating.then(
                () => undefined,
                () => undefined
            );
        }

        const session = this.session;
        this.session = undefined;
        this.uninstallHooks?.();
        if (!session?.alive) return;

        session.alive = false;
        await this.deleteQuietly(session);
    }

    private async deleteQuietly(session: SandboxSession): Promise<void> {
        try {
            await this.client.delete(session.id);
            this.logger.info({ sandboxId: session.id }, "sandbox deleted");
        } catch (error) {
            this.logger.error({ sandboxId: session.id, err: error }, "failed to delete sandbox");
        }
    }

    private waitForIdle(): Promise<void> {
        if (this.inFlight === 0) return Promise.resolve();
        return new Promise((resolve) => this.idleWaiters.push(resolve));
    }

    private notifyIdle(): void {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }

    private bind(session: SandboxSession): Sandbox {
        const client = this.client;
        const id = session.id;
        return {
            id,
            exec: (command, options) => client.exec(id, command, options),
            stat: (path) => client.stat(id, path),
            readFile: (path, options) => client.readFile(id, path, options),
            writeFile: (path, data, options) => client.writeFile(id, path, data, options),
            previewUrl: (port) => client.previewUrl(id, port)
        };
    }
}
