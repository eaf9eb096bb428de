import test from "node:test";
import assert from "node:assert/strict";
import { fileDownloadTool, fileUploadTool, isValidBase64 } from "./files.js";
import { createHarness, expectOk } from "./testing/harness.js";

function csv(size: number): Buffer {
    const buf = Buffer.alloc(size);
    for (let i = 0; i < size; i++) buf[i] = 97 + (i % 26);
    return buf;
}

test("text uploads are written as utf-8", async () => {
    const { client, router } = createHarness([fileUploadTool()]);

    const payload = expectOk(await router.dispatch("file_upload", { file_path: "/work/notes.md", content: "héllo" }));
    assert.deepEqual(payload, { kind: "upload", path: "/work/notes.md", bytesWritten: 6, overwrite: true });
    assert.equal(client.files.get("/work/notes.md")?.toString("utf-8"), "héllo");
});

test("base64 uploads are decoded", async () => {
    const { client, router } = createHarness([fileUploadTool()]);

    expectOk(await router.dispatch("file_upload", { file_path: "/work/blob.bin", content: "AP8QIA==", encoding: "base64" }));
    assert.deepEqual([...(client.files.get("/work/blob.bin") ?? [])], [0, 255, 16, 32]);
});

test("invalid base64 is rejected before provisioning", async () => {
    const { client, router } = createHarness([fileUploadTool()]);

    const envelope = await router.dispatch("file_upload", { file_path: "/x", content: "not base64!", encoding: "base64" });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") {
        assert.equal(envelope.error.kind, "validation");
        assert.equal(envelope.error.message, "Invalid arguments for file_upload: content: content is not valid base64");
    }
    assert.equal(client.createCalls, 0);
});

test("overwrite=false keeps an existing file and reports a conflict", async () => {
    const { client, router } = createHarness([fileUploadTool()]);
    expectOk(await router.dispatch("file_upload", { file_path: "/work/a.txt", content: "first" }));

    const envelope = await router.dispatch("file_upload", { file_path: "/work/a.txt", content: "second", overwrite: false });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") {
        assert.deepEqual(envelope.error, {
            kind: "remote",
            message: "File already exists: /work/a.txt",
            retryable: false,
            status: 409
        });
    }
    assert.equal(client.files.get("/work/a.txt")?.toString("utf-8"), "first");
});

test("base64 validation", () => {
    assert.equal(isValidBase64("aGVsbG8="), true);
    assert.equal(isValidBase64("aGVs\nbG8="), true);
    assert.equal(isValidBase64(""), true);
    assert.equal(isValidBase64("aGVsbG8"), false);
    assert.equal(isValidBase64("aGV$bG8="), false);
});

test("small files download whole", async () => {
    const { client, router } = createHarness([fileDownloadTool()]);
    client.files.set("/work/config.json", Buffer.from('{"a":1}'));

    const payload = expectOk(await router.dispatch("file_download", { file_path: "/work/config.json" }));
    assert.deepEqual(payload, {
        kind: "transfer",
        path: "/work/config.json",
        strategyUsed: "full",
        encoding: "utf-8",
        data: '{"a":1}',
        byteLength: 7,
        fileSize: 7,
        truncated: false
    });
});

test("an oversized file with auto is rejected without reading it", async () => {
    const { client, router } = createHarness([fileDownloadTool()]);
    client.files.set("/work/big.csv", csv(12_000_000));

    const envelope = await router.dispatch("file_download", { file_path: "/work/big.csv" });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") {
        assert.equal(envelope.error.kind, "transfer");
        assert.equal(envelope.error.strategy, "auto");
        assert.equal(envelope.error.retryable, false);
        assert.match(envelope.error.message, /^Transfer of \/work\/big\.csv rejected: exceeds size limit; specify a strategy/);
    }
    assert.equal(client.readCalls.length, 0);
});

test("download_partial pages through an oversized file", async () => {
    const { client, router } = createHarness([fileDownloadTool()]);
    const content = csv(12_000_000);
    client.files.set("/work/big.csv", content);

    const first = expectOk(await router.dispatch("file_download", {
        file_path: "/work/big.csv",
        download_option: "download_partial",
        chunk_size_kb: 200
    }));
    assert.ok(first.kind === "transfer");
    assert.equal(first.strategyUsed, "chunked");
    assert.equal(first.byteLength, 204800);
    assert.equal(first.truncated, true);
    assert.equal(first.nextOffset, 204800);
    assert.deepEqual(Buffer.from(first.data, "base64"), content.subarray(0, 204800));

    const second = expectOk(await router.dispatch("file_download", {
        file_path: "/work/big.csv",
        download_option: "download_partial",
        chunk_size_kb: 200,
        offset: 204800
    }));
    assert.ok(second.kind === "transfer");
    assert.equal(second.offset, 204800);
    assert.deepEqual(Buffer.from(second.data, "base64"), content.subarray(204800, 409600));
});

test("text conversion of an archive is rejected with its strategy", async () => {
    const { client, router } = createHarness([fileDownloadTool()]);
    client.files.set("/work/data.zip", Buffer.alloc(6 * 1024 * 1024));

    const envelope = await router.dispatch("file_download", { file_path: "/work/data.zip", download_option: "convert_to_text" });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") {
        assert.equal(envelope.error.strategy, "convert_to_text");
        assert.equal(envelope.error.message, "Transfer of /work/data.zip rejected: unsupported for text conversion: archive file");
    }
    assert.equal(client.execCalls.length, 0);
});

test("a raised ceiling lets a large file through whole", async () => {
    const { client, router } = createHarness([fileDownloadTool()]);
    client.files.set("/work/big.csv", csv(6_000_000));

    const payload = expectOk(await router.dispatch("file_download", { file_path: "/work/big.csv", max_size_mb: 10 }));
    assert.ok(payload.kind === "transfer");
    assert.equal(payload.strategyUsed, "full");
    assert.equal(payload.byteLength, 6_000_000);
});

test("missing files are not_found errors", async () => {
    const { router } = createHarness([fileDownloadTool()]);

    const envelope = await router.dispatch("file_download", { file_path: "/work/missing.txt" });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") {
        assert.deepEqual(envelope.error, {
            kind: "not_found",
            message: "No such file or directory: /work/missing.txt",
            retryable: false,
            status: 404
        });
    }
});

test("unknown download options are validation errors", async () => {
    const { client, router } = createHarness([fileDownloadTool()]);
    const envelope = await router.dispatch("file_download", { file_path: "/x", download_option: "stream" });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") assert.equal(envelope.error.kind, "validation");
    assert.equal(client.createCalls, 0);
});

test("a chunk size below one byte is rejected before provisioning", async () => {
    const { client, router } = createHarness([fileDownloadTool()]);

    const envelope = await router.dispatch("file_download", {
        file_path: "/work/big.csv",
        download_option: "download_partial",
        chunk_size_kb: 0.0005,
        offset: 100
    });
    assert.equal(envelope.status, "error");
    if (envelope.status === "error") {
        assert.equal(envelope.error.kind, "validation");
        assert.equal(envelope.error.message, "Invalid arguments for file_download: chunk_size_kb: chunk_size_kb must cover at least one byte");
    }
    assert.equal(client.createCalls, 0);
});

test("latin-1 text downloads as base64 so the bytes survive", async () => {
    const { client, router } = createHarness([fileDownloadTool()]);
    client.files.set("/data/names.csv", Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));

    const payload = expectOk(await router.dispatch("file_download", { file_path: "/data/names.csv" }));
    assert.ok(payload.kind === "transfer");
    assert.equal(payload.encoding, "base64");
    assert.equal(payload.data, "Y2Fm6Qo=");
    assert.equal(payload.byteLength, 5);
});

test("compress_file runs gzip with the caller's timeout and cleans up", async () => {
    const { client, router } = createHarness([fileDownloadTool({ scratchDir: "/tmp/scratch" })]);
    client.files.set("/work/big.log", csv(6_000_000));
    client.onExec(/gzip -c (\S+) > (\S+)$/, (_command, match, fake) => {
        fake.files.set(match[2], Buffer.from("gz"));
        return { stdout: "", stderr: "", exitCode: 0 };
    });

    const payload = expectOk(await router.dispatch("file_download", {
        file_path: "/work/big.log",
        download_option: "compress_file",
        timeout: 120
    }));
    assert.ok(payload.kind === "transfer");
    assert.equal(payload.data, Buffer.from("gz").toString("base64"));
    assert.equal(client.execCalls[0].options?.timeoutSec, 120);
    assert.deepEqual([...client.files.keys()], ["/work/big.log"]);
});
