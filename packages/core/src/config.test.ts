import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_LOG_FILE, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

test("defaults apply when only the key is set", () => {
    const config = loadConfig({ SANDBOX_API_KEY: "test-secret" });
    assert.deepEqual(config, {
        apiKey: "test-secret",
        apiUrl: "http://localhost:3986",
        timeoutSec: 30,
        target: "local",
        verifySsl: false,
        image: "python:3.10-slim",
        previewDomain: "localhost",
        logFile: DEFAULT_LOG_FILE,
        logLevel: "info"
    });
    assert.ok(Object.isFrozen(config));
});

test("values are parsed and the url normalised", () => {
    const config = loadConfig({
        SANDBOX_API_KEY: "test-secret",
        SANDBOX_API_URL: "https://api.sandbox.test/",
        SANDBOX_TIMEOUT: "90",
        SANDBOX_TARGET: "eu",
        SANDBOX_VERIFY_SSL: "TRUE",
        SANDBOX_LOG_LEVEL: "debug"
    });
    assert.equal(config.apiUrl, "https://api.sandbox.test");
    assert.equal(config.previewDomain, "api.sandbox.test");
    assert.equal(config.timeoutSec, 90);
    assert.equal(config.target, "eu");
    assert.equal(config.verifySsl, true);
    assert.equal(config.logLevel, "debug");
});

test("an explicit preview domain wins", () => {
    const config = loadConfig({ SANDBOX_API_KEY: "test-secret", SANDBOX_PREVIEW_DOMAIN: "preview.test" });
    assert.equal(config.previewDomain, "preview.test");
});

test("an empty log file setting disables the file", () => {
    const config = loadConfig({ SANDBOX_API_KEY: "test-secret", SANDBOX_LOG_FILE: "" });
    assert.equal(config.logFile, undefined);
});

test("a missing key is a config error", () => {
    assert.throws(() => loadConfig({}), (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.equal(error.message, "SANDBOX_API_KEY environment variable is required");
        return true;
    });
    assert.throws(() => loadConfig({ SANDBOX_API_KEY: "" }), ConfigError);
});

test("an unparsable timeout names the variable", () => {
    assert.throws(() => loadConfig({ SANDBOX_API_KEY: "test-secret", SANDBOX_TIMEOUT: "soon" }), {
        name: "ConfigError",
        message: /^SANDBOX_TIMEOUT: /
    });
});
