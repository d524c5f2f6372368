import { createLogger } from "@tabfeed/core";
import type { EnvConfig } from "@tabfeed/core";
import type { DataProviderLogger } from "../types";

export const PLACEHOLDER_API_KEY = "your_api_key";

/**
 * Holds the vendor API key used when rendering source URLs.
 * Blank input is ignored, so a configured key is never cleared.
 */
export class CredentialRegistry {
	private code = PLACEHOLDER_API_KEY;
	private configured = false;

	constructor(
		private readonly logger: DataProviderLogger = createLogger("credentials")
	) {}

	get apiKey(): string {
		return this.code;
	}

	get isConfigured(): boolean {
		return this.configured;
	}

	set(code: string | undefined | null): void {
		if (!code || !code.trim()) {
			this.logger.debug?.("credential_blank_ignored", {
				configured: this.configured,
			});
			return;
		}
		this.code = code;
		this.configured = true;
		this.logger.info?.("credential_configured", {});
	}
}

export const defaultCredentialRegistry = new CredentialRegistry();

export const configureCredentials = (
	env: Pick<EnvConfig, "nasdaqApiKey">,
	registry: CredentialRegistry = defaultCredentialRegistry
): CredentialRegistry => {
	registry.set(env.nasdaqApiKey);
	return registry;
};
