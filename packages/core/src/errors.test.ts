import test from "node:test";
import assert from "node:assert/strict";
import {
    ConfigError,
    isFatalRemoteError,
    NotFoundError,
    ProvisioningError,
    RemoteError,
    SandboxError,
    TimeoutError,
    toErrorDescriptor,
    TransferError,
    ValidationError
} from "./errors.js";

test("subclasses keep their prototype chain and kind", () => {
    const error = new NotFoundError("/tmp/missing.txt");
    assert.ok(error instanceof NotFoundError);
    assert.ok(error instanceof RemoteError);
    assert.ok(error instanceof SandboxError);
    assert.ok(error instanceof Error);
    assert.equal(error.kind, "not_found");
    assert.equal(error.name, "NotFoundError");
    assert.equal(error.status, 404);
    assert.equal(error.message, "No such file or directory: /tmp/missing.txt");
});

test("retryable defaults follow the failure class", () => {
    assert.equal(new ValidationError("bad").retryable, false);
    assert.equal(new ConfigError("bad").retryable, false);
    assert.equal(new ProvisioningError("down").retryable, true);
    assert.equal(new TimeoutError("exec", 1000).retryable, true);
    assert.equal(new TransferError("boom", "chunked").retryable, true);
    assert.equal(new TransferError("no", "auto", { retryable: false }).retryable, false);
    assert.equal(new RemoteError("x").retryable, false);
});

test("timeout messages name the operation and budget", () => {
    const error = new TimeoutError("exec", 35_000);
    assert.equal(error.message, "exec timed out after 35000ms");
    assert.equal(error.timeoutMs, 35_000);
});

test("descriptors carry strategy and status when present", () => {
    assert.deepEqual(toErrorDescriptor(new TransferError("rejected", "auto", { retryable: false })), {
        kind: "transfer",
        message: "rejected",
        retryable: false,
        strategy: "auto"
    });
    assert.deepEqual(toErrorDescriptor(new RemoteError("conflict", { status: 409 })), {
        kind: "remote",
        message: "conflict",
        retryable: false,
        status: 409
    });
    assert.deepEqual(toErrorDescriptor(new ValidationError("command: Required")), {
        kind: "validation",
        message: "command: Required",
        retryable: false
    });
});

test("unknown throwables become internal", () => {
    assert.deepEqual(toErrorDescriptor(new TypeError("oops")), { kind: "internal", message: "oops", retryable: false });
    assert.deepEqual(toErrorDescriptor("plain string"), { kind: "internal", message: "plain string", retryable: false });
});

test("fatal remote errors are found through the cause chain", () => {
    const gone = new RemoteError("Sandbox sbx-1 is gone", { status: 404, fatal: true });
    assert.equal(isFatalRemoteError(gone), true);
    assert.equal(isFatalRemoteError(new TransferError("full transfer failed", "full", { cause: gone })), true);
    assert.equal(isFatalRemoteError(new RemoteError("busy", { status: 503 })), false);
    assert.equal(isFatalRemoteError(new NotFoundError("/x")), false);
    assert.equal(isFatalRemoteError("gone"), false);
});
