import type { Config } from "../config/index.js";
import { UnsupportedProvider } from "./errors.js";
import type { TokenEndpointClient } from "./http.js";
import { ClaudeProvider } from "./providers/claude.js";
import { CodexProvider } from "./providers/codex.js";
import type { OAuthProviderType, ProviderCapability } from "./types.js";

/** Lookup table from provider type to its OAuth capability. */
export class ProviderRegistry {
  private readonly providers = new Map<string, ProviderCapability>();

  register(capability: ProviderCapability): this {
    if (this.providers.has(capability.providerType)) {
      throw new Error(`Provider already registered: ${capability.providerType}`);
    }
    this.providers.set(capability.providerType, capability);
    return this;
  }

  /** Throws UnsupportedProvider for unknown and API-key provider types. */
  get(providerType: string): ProviderCapability {
    const capability = this.providers.get(providerType);
    if (!capability) throw new UnsupportedProvider(providerType);
    return capability;
  }

  has(providerType: string): boolean {
    return this.providers.has(providerType);
  }

  list(): ProviderCapability[] {
    return [...this.providers.values()];
  }

  /** Provider types refreshed on the short (or long) cadence. */
  typesByTokenLifetime(shortLived: boolean): OAuthProviderType[] {
    return this.list()
      .filter((p) => p.shortLivedTokens === shortLived)
      .map((p) => p.providerType);
  }
}

export function createDefaultRegistry(providers: Config["providers"], http: TokenEndpointClient): ProviderRegistry {
  return new ProviderRegistry()
    .register(new ClaudeProvider(providers.claude, http))
    .register(new CodexProvider(providers.codex, http));
}
