import { describe, expect, it, vi } from "vitest";
import { createSecretStore, secretEnvName, type SecretReader } from "./secrets.js";

describe("secretEnvName", () => {
    it("maps secret names onto environment variable names", () => {
        expect(secretEnvName("app-insights-connection-string")).toBe("APP_INSIGHTS_CONNECTION_STRING");
    });
});

describe("createSecretStore", () => {
    const env = { APP_INSIGHTS_CONNECTION_STRING: "InstrumentationKey=test-env" };

    it("reads the environment when no vault is configured", async () => {
        const store = createSecretStore("", undefined, env);

        expect(await store.getSecret("app-insights-connection-string")).toBe("InstrumentationKey=test-env");
        expect(await store.getSecret("missing-secret")).toBeUndefined();
    });

    it("prefers the vault value", async () => {
        const reader: SecretReader = { getSecret: vi.fn(async () => ({ value: "InstrumentationKey=test-vault" })) };
        const store = createSecretStore("https://test.vault.azure.net/", reader, env);

        expect(await store.getSecret("app-insights-connection-string")).toBe("InstrumentationKey=test-vault");
        expect(reader.getSecret).toHaveBeenCalledWith("app-insights-connection-string");
    });

    it("falls back to the environment when the vault fails", async () => {
        const reader: SecretReader = {
            getSecret: async () => {
                throw new Error("CredentialUnavailableError");
            },
        };
        const store = createSecretStore("https://test.vault.azure.net/", reader, env);

        expect(await store.getSecret("app-insights-connection-string")).toBe("InstrumentationKey=test-env");
    });

    it("falls back to the environment when the vault value is empty", async () => {
        const store = createSecretStore("https://test.vault.azure.net/", { getSecret: async () => ({}) }, env);

        expect(await store.getSecret("app-insights-connection-string")).toBe("InstrumentationKey=test-env");
    });

    it("treats an empty environment value as missing", async () => {
        const store = createSecretStore("", undefined, { APP_INSIGHTS_CONNECTION_STRING: "" });

        expect(await store.getSecret("app-insights-connection-string")).toBeUndefined();
    });
});
