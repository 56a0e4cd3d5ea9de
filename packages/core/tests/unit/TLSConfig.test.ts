/**
 * TLS Configuration tests
 */

import assert from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve } from "node:path";
import { cwd } from "node:process";
import { afterEach, beforeEach, describe, it } from "node:test";
import { ConfigError } from "../../src/errors.ts";
import { getTLSPath, loadSecureContext, readTLSCertificates } from "../../src/TLSConfig.ts";

describe("TLSConfig", () => {
    let testDir: string;
    let originalTLSDir: string | undefined;

    beforeEach(() => {
        originalTLSDir = process.env.TLS_DIR_PATH;
        delete process.env.TLS_DIR_PATH;

        testDir = resolve(tmpdir(), `portico-tls-${process.pid}-${Date.now()}`);
        mkdirSync(testDir, { recursive: true });
    });

    afterEach(() => {
        if (originalTLSDir === undefined) {
            delete process.env.TLS_DIR_PATH;
        } else {
            process.env.TLS_DIR_PATH = originalTLSDir;
        }
        rmSync(testDir, { recursive: true, force: true });
    });

    describe("getTLSPath", () => {
        it("should default to the working directory", () => {
            assert.strictEqual(getTLSPath(), cwd());
        });

        it("should read TLS_DIR_PATH", () => {
            process.env.TLS_DIR_PATH = testDir;

            assert.strictEqual(getTLSPath(), testDir);
        });
    });

    describe("readTLSCertificates", () => {
        it("should read certificates from explicit paths", () => {
            const keyPath = resolve(testDir, "test.key");
            const certPath = resolve(testDir, "test.crt");
            writeFileSync(keyPath, "test-key-content");
            writeFileSync(certPath, "test-cert-content");

            const result = readTLSCertificates({ keyPath, certPath });

            assert.strictEqual(result.key.toString(), "test-key-content");
            assert.strictEqual(result.cert.toString(), "test-cert-content");
        });

        it("should read server.key and server.crt from a directory", () => {
            writeFileSync(resolve(testDir, "server.key"), "server-key-content");
            writeFileSync(resolve(testDir, "server.crt"), "server-cert-content");

            const result = readTLSCertificates({ dirPath: testDir });

            assert.strictEqual(result.key.toString(), "server-key-content");
            assert.strictEqual(result.cert.toString(), "server-cert-content");
        });

        it("should fall back to TLS_DIR_PATH", () => {
            writeFileSync(resolve(testDir, "server.key"), "env-key-content");
            writeFileSync(resolve(testDir, "server.crt"), "env-cert-content");
            process.env.TLS_DIR_PATH = testDir;

            const result = readTLSCertificates();

            assert.strictEqual(result.key.toString(), "env-key-content");
        });

        it("should prioritize explicit paths over dirPath", () => {
            writeFileSync(resolve(testDir, "server.key"), "dir-key-content");
            writeFileSync(resolve(testDir, "server.crt"), "dir-cert-content");
            const keyPath = resolve(testDir, "explicit.key");
            const certPath = resolve(testDir, "explicit.crt");
            writeFileSync(keyPath, "explicit-key-content");
            writeFileSync(certPath, "explicit-cert-content");

            const result = readTLSCertificates({ keyPath, certPath, dirPath: testDir });

            assert.strictEqual(result.key.toString(), "explicit-key-content");
            assert.strictEqual(result.cert.toString(), "explicit-cert-content");
        });

        it("should throw if server.crt is missing from the directory", () => {
            writeFileSync(resolve(testDir, "server.key"), "server-key-content");

            assert.throws(() => readTLSCertificates({ dirPath: testDir }), { code: "ENOENT" });
        });
    });

    describe("loadSecureContext", () => {
        it("should wrap missing files in a ConfigError", () => {
            assert.throws(
                () => loadSecureContext({ dirPath: resolve(testDir, "missing") }),
                (error: unknown) => {
                    assert.ok(error instanceof ConfigError);
                    assert.ok(error.message.startsWith("Invalid TLS configuration: "));
                    assert.ok(error.cause instanceof Error);
                    return true;
                },
            );
        });

        it("should reject material that is not PEM", () => {
            writeFileSync(resolve(testDir, "server.key"), "not-a-key");
            writeFileSync(resolve(testDir, "server.crt"), "not-a-cert");

            assert.throws(() => loadSecureContext({ dirPath: testDir }), ConfigError);
        });
    });
});
