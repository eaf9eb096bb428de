import test from "node:test";
import assert from "node:assert/strict";
import { errorEnvelope, isOk, okEnvelope } from "./envelope.js";
import { TimeoutError } from "./errors.js";

test("ok envelopes are frozen and keep the payload", () => {
    const envelope = okEnvelope("shell_exec", { kind: "execution", stdout: "hi\n", stderr: "", exitCode: 3, artifacts: [] }, 12);
    assert.equal(envelope.status, "ok");
    assert.equal(envelope.tool, "shell_exec");
    assert.equal(envelope.durationMs, 12);
    assert.ok(isOk(envelope));
    assert.ok(Object.isFrozen(envelope));
    assert.ok(Object.isFrozen(envelope.payload));
    assert.deepEqual(envelope.payload, { kind: "execution", stdout: "hi\n", stderr: "", exitCode: 3, artifacts: [] });
});

test("error envelopes describe the failure", () => {
    const envelope = errorEnvelope("shell_exec", new TimeoutError("exec", 6000), 6001);
    assert.equal(envelope.status, "error");
    assert.equal(isOk(envelope), false);
    assert.ok(Object.isFrozen(envelope.error));
    assert.deepEqual(envelope.error, { kind: "timeout", message: "exec timed out after 6000ms", retryable: true });
});
