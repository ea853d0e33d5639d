import { socksDispatcher } from "fetch-socks";
import { type Dispatcher, ProxyAgent } from "undici";
import { InvalidProxyError } from "./errors.js";
import type { ProxyConfig } from "./types.js";

const DEFAULT_SOCKS_PORT = 1080;

export type ProxyKind = "http" | "socks5";

export interface ParsedProxy {
  kind: ProxyKind;
  url: URL;
}

export function parseProxyUrl(raw: string): ParsedProxy {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InvalidProxyError(`not a URL: ${raw}`);
  }
  if (!url.hostname) throw new InvalidProxyError(`missing host in ${url.protocol}// proxy`);
  switch (url.protocol) {
    case "http:":
    case "https:":
      return { kind: "http", url };
    case "socks5:":
    case "socks5h:":
      return { kind: "socks5", url };
    default:
      throw new InvalidProxyError(`unsupported scheme ${url.protocol.replace(/:$/, "")}`);
  }
}

/** Host and port only, credentials dropped. Safe to log. */
export function describeProxy(proxy: ProxyConfig | null): string | null {
  if (!proxy) return null;
  try {
    const url = new URL(proxy.url);
    return `${url.protocol}//${url.host}`;
  } catch {
    return "<invalid>";
  }
}

function createDispatcher(parsed: ParsedProxy): Dispatcher {
  const { url } = parsed;
  if (parsed.kind === "http") {
    return new ProxyAgent(url.toString());
  }
  return socksDispatcher({
    type: 5,
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_SOCKS_PORT,
    ...(url.username && { userId: decodeURIComponent(url.username) }),
    ...(url.password && { password: decodeURIComponent(url.password) }),
  });
}

/**
 * Keeps one dispatcher per distinct proxy URL so connections to the same
 * proxy are pooled across refreshes.
 */
export class ProxyDispatcherPool {
  private readonly dispatchers = new Map<string, Dispatcher>();

  /** Undefined means a direct connection. Throws InvalidProxyError on a bad URL. */
  get(proxy: ProxyConfig | null): Dispatcher | undefined {
    if (!proxy) return undefined;
    const existing = this.dispatchers.get(proxy.url);
    if (existing) return existing;
    const dispatcher = createDispatcher(parseProxyUrl(proxy.url));
    this.dispatchers.set(proxy.url, dispatcher);
    return dispatcher;
  }

  get size(): number {
    return this.dispatchers.size;
  }

  async close(): Promise<void> {
    const all = [...this.dispatchers.values()];
    this.dispatchers.clear();
    await Promise.all(all.map((d) => d.close()));
  }
}
