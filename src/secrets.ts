/**
 * secrets.ts — Secret lookup: Azure Key Vault first, environment second
 *
 * With KEY_VAULT_URL set, secrets are read through DefaultAzureCredential
 * (managed identity in Azure, `az login` locally). When the vault isn't
 * configured, can't be reached, or has no value, the environment variable
 * named after the secret is used instead:
 *   "app-insights-connection-string" → APP_INSIGHTS_CONNECTION_STRING
 */

import { SecretClient } from "@azure/keyvault-secrets";
import { DefaultAzureCredential } from "@azure/identity";
import { logger } from "./logger.js";
import { describeError } from "./errors.js";

/** What we need from SecretClient */
export interface SecretReader {
    getSecret(name: string): Promise<{ value?: string }>;
}

export interface SecretStore {
    getSecret(name: string): Promise<string | undefined>;
}

export function secretEnvName(secretName: string): string {
    return secretName.replace(/-/g, "_").toUpperCase();
}

export function createSecretStore(
    vaultUrl: string,
    reader?: SecretReader,
    env: NodeJS.ProcessEnv = process.env
): SecretStore {
    const vault: SecretReader | null =
        reader ?? (vaultUrl ? new SecretClient(vaultUrl, new DefaultAzureCredential()) : null);

    function fromEnv(name: string): string | undefined {
        const value = env[secretEnvName(name)];
        return value ? value : undefined;
    }

    return {
        async getSecret(name) {
            if (!vault) return fromEnv(name);

            try {
                const secret = await vault.getSecret(name);
                if (secret.value) return secret.value;
                logger.warn(`Secret "${name}" has no value in Key Vault — falling back to environment`);
            } catch (err) {
                logger.warn(`Could not retrieve secret "${name}" from Key Vault — falling back to environment`, {
                    error: describeError(err),
                });
            }
            return fromEnv(name);
        },
    };
}
