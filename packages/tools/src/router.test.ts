import test from "node:test";
import assert from "node:assert/strict";
import { TimeoutError } from "@sandbox-mcp/core";
import { shellExecTool } from "./exec.js";
import { ToolRouter } from "./router.js";
import { createHarness, expectOk } from "./testing/harness.js";

test("a non-zero exit code is an ok envelope", async () => {
    const { client, router } = createHarness([shellExecTool()]);
    client.onExec(/^exit (\d+)$/, (_command, match) => ({ stdout: "", stderr: "", exitCode: Number(match[1]) }));

    const envelope = await router.dispatch("shell_exec", { command: "exit 3" });
    assert.equal(envelope.status, "ok");
    assert.equal(envelope.tool, "shell_exec");
    assert.deepEqual(expectOk(envelope), { kind: "execution", stdout: "", stderr: "", exitCode: 3, artifacts: [] });
});

test("malformed arguments never provision a sandbox", async () => {
    const { client, router } = createHarness([shellExecTool()]);

    const envelope = await router.dispatch("shell_exec", {});
    assert.equal(envelope.status, "error");
    assert.equal(client.createCalls, 0);
    if (envelope.status === "error") {
        assert.deepEqual(envelope.error, {
            kind: "validation",
            message: "Invalid arguments for shell_exec: command: Required",
            retryable: false
        });
    }
});

test("unknown tools are validation errors", async () => {
    const { client, router } = createHarness([shellExecTool()]);

    const envelope = await router.dispatch("rm_rf", { path: "/" });
    assert.equal(envelope.status, "error");
    assert.equal(envelope.tool, "rm_rf");
    if (envelope.status === "error") assert.equal(envelope.error.message, "Unknown tool: rm_rf");
    assert.equal(client.createCalls, 0);
});

test("provisioning failures come back as error envelopes", async () => {
    const { client, router } = createHarness([shellExecTool()]);
    client.failCreates = 3;

    const envelope = await router.dispatch("shell_exec", { command: "ls" });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") {
        assert.equal(envelope.error.kind, "provisioning");
        assert.equal(envelope.error.message, "Failed to create sandbox after 3 attempt(s): workspace quota exceeded");
    }
    assert.equal(client.createCalls, 3);
});

test("timeouts are reported and the session survives", async () => {
    const { client, sessions, router } = createHarness([shellExecTool()]);
    client.onExec(/^sleep/, () => {
        throw new TimeoutError("exec", 6000);
    });

    const envelope = await router.dispatch("shell_exec", { command: "sleep 100", timeout: 1 });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") {
        assert.deepEqual(envelope.error, { kind: "timeout", message: "exec timed out after 6000ms", retryable: true });
    }
    assert.equal(sessions.current?.id, "sbx-1");
});

test("a lost sandbox is replaced on the next call", async () => {
    const { client, router } = createHarness([shellExecTool()]);
    expectOk(await router.dispatch("shell_exec", { command: "true" }));
    client.kill("sbx-1");

    const failed = await router.dispatch("shell_exec", { command: "true" });
    assert.equal(failed.status, "error");
    if (failed.status === "error") assert.equal(failed.error.kind, "remote");

    expectOk(await router.dispatch("shell_exec", { command: "true" }));
    assert.equal(client.createCalls, 2);
    assert.deepEqual(client.execCalls.map((call) => call.sandboxId), ["sbx-1", "sbx-2"]);
});

test("concurrent calls share one sandbox", async () => {
    const { client, router } = createHarness([shellExecTool()]);
    client.createDelayMs = 10;

    const envelopes = await Promise.all(Array.from({ length: 5 }, (_, i) => router.dispatch("shell_exec", { command: `echo ${i}` })));
    assert.ok(envelopes.every((envelope) => envelope.status === "ok"));
    assert.equal(client.createCalls, 1);
});

test("per-call timeouts and cwd reach the sandbox", async () => {
    const { client, router } = createHarness([shellExecTool()]);
    expectOk(await router.dispatch("shell_exec", { command: "ls", cwd: "/srv", timeout: 12 }));
    expectOk(await router.dispatch("shell_exec", { command: "pwd" }));
    assert.deepEqual(client.execCalls.map((call) => call.options), [
        { cwd: "/srv", timeoutSec: 12 },
        { cwd: undefined, timeoutSec: 30 }
    ]);
});

test("duplicate tool names are refused", () => {
    const { sessions } = createHarness([]);
    assert.throws(() => new ToolRouter(sessions, [shellExecTool(), shellExecTool()]), {
        message: "Duplicate tool name: shell_exec"
    });
});
