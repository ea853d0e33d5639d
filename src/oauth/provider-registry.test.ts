import { describe, expect, it } from "vitest";
import { loadConfig } from "../config/index.js";
import { UnsupportedProvider } from "./errors.js";
import { TokenEndpointClient } from "./http.js";
import { createDefaultRegistry, ProviderRegistry } from "./provider-registry.js";
import { stubCapability } from "../test/providers.js";

const http = new TokenEndpointClient({ timeoutMs: 1000 });

describe("ProviderRegistry", () => {
  it("registers the built-in OAuth providers", () => {
    const registry = createDefaultRegistry(loadConfig({}).providers, http);
    expect(registry.list().map((p) => p.providerType)).toEqual(["claude-official", "codex-cli"]);
    expect(registry.typesByTokenLifetime(true)).toEqual(["claude-official"]);
    expect(registry.typesByTokenLifetime(false)).toEqual(["codex-cli"]);
  });

  it("throws UnsupportedProvider for API-key and unknown providers", () => {
    const registry = createDefaultRegistry(loadConfig({}).providers, http);
    expect(() => registry.get("claude-console")).toThrow(UnsupportedProvider);
    expect(() => registry.get("nope")).toThrow("No OAuth capability registered for provider: nope");
    expect(registry.has("openai-responses")).toBe(false);
  });

  it("accepts a new provider without touching the engine", () => {
    const capability = stubCapability();
    const registry = new ProviderRegistry().register(capability);
    expect(registry.get("codex-cli")).toBe(capability);
  });

  it("refuses a duplicate registration", () => {
    const registry = new ProviderRegistry().register(stubCapability());
    expect(() => registry.register(stubCapability())).toThrow("Provider already registered: codex-cli");
  });
});
