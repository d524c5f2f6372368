import { describe, expect, it, vi } from "vitest";
import {
	CredentialRegistry,
	PLACEHOLDER_API_KEY,
	configureCredentials,
} from "./credentials";

const createSilentLogger = () => ({
	debug: vi.fn(),
	info: vi.fn(),
});

describe("CredentialRegistry", () => {
	it("starts with the placeholder and unconfigured", () => {
		const registry = new CredentialRegistry(createSilentLogger());
		expect(registry.apiKey).toBe(PLACEHOLDER_API_KEY);
		expect(registry.apiKey).toBe("your_api_key");
		expect(registry.isConfigured).toBe(false);
	});

	it("ignores blank codes before a key is set", () => {
		const registry = new CredentialRegistry(createSilentLogger());
		registry.set("");
		registry.set("   \t");
		expect(registry.apiKey).toBe("your_api_key");
		expect(registry.isConfigured).toBe(false);
	});

	it("never clears a configured key with a blank code", () => {
		const logger = createSilentLogger();
		const registry = new CredentialRegistry(logger);
		registry.set("test-secret");
		registry.set("  ");
		registry.set("");

		expect(registry.apiKey).toBe("test-secret");
		expect(registry.isConfigured).toBe(true);
		expect(logger.info).toHaveBeenCalledTimes(1);
		expect(logger.info).toHaveBeenCalledWith("credential_configured", {});
		expect(logger.debug).toHaveBeenCalledTimes(2);
	});

	it("replaces the key with a later non-blank code", () => {
		const registry = new CredentialRegistry(createSilentLogger());
		registry.set("test-secret");
		registry.set("test-secret-2");
		expect(registry.apiKey).toBe("test-secret-2");
	});
});

describe("configureCredentials", () => {
	it("feeds the configured key into the registry", () => {
		const registry = new CredentialRegistry(createSilentLogger());
		const result = configureCredentials({ nasdaqApiKey: "test-secret" }, registry);
		expect(result).toBe(registry);
		expect(registry.apiKey).toBe("test-secret");
		expect(registry.isConfigured).toBe(true);
	});

	it("leaves the registry alone when no key is configured", () => {
		const registry = new CredentialRegistry(createSilentLogger());
		configureCredentials({ nasdaqApiKey: undefined }, registry);
		expect(registry.isConfigured).toBe(false);
	});
});
