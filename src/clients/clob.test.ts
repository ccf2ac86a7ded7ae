import { describe, expect, it, vi } from "vitest";

import { createSilentLogger } from "../lib/logger.js";
import { resolveApiCreds } from "./clob.js";

const creds = { key: "test-key", secret: "test-secret", passphrase: "test-passphrase" };

describe("resolveApiCreds", () => {
    it("derives the existing key", async () => {
        const source = {
            deriveApiKey: vi.fn(async () => creds),
            createApiKey: vi.fn(async () => ({ ...creds, key: "other" }))
        };
        expect(await resolveApiCreds(source, createSilentLogger())).toEqual(creds);
        expect(source.createApiKey).not.toHaveBeenCalled();
    });

    it("creates a key when none can be derived", async () => {
        const source = {
            deriveApiKey: vi.fn(async () => {
                throw new Error("Could not derive api key!");
            }),
            createApiKey: vi.fn(async () => creds)
        };
        expect(await resolveApiCreds(source, createSilentLogger())).toEqual(creds);
        expect(source.createApiKey).toHaveBeenCalledTimes(1);
    });

    it("fails when the key can be neither derived nor created", async () => {
        const source = {
            deriveApiKey: vi.fn(async () => {
                throw new Error("Could not derive api key!");
            }),
            createApiKey: vi.fn(async () => {
                throw new Error("invalid signature");
            })
        };
        await expect(resolveApiCreds(source, createSilentLogger())).rejects.toThrow("invalid signature");
    });
});
