import { afterEach, describe, expect, it } from "vitest";
import { InvalidProxyError } from "./errors.js";
import { describeProxy, parseProxyUrl, ProxyDispatcherPool } from "./proxy.js";

describe("parseProxyUrl", () => {
  it("accepts http, https, socks5 and socks5h", () => {
    expect(parseProxyUrl("http://proxy.local:3128").kind).toBe("http");
    expect(parseProxyUrl("https://proxy.local").kind).toBe("http");
    expect(parseProxyUrl("socks5://h:1080").kind).toBe("socks5");
    expect(parseProxyUrl("socks5h://user:pw@h:1081").kind).toBe("socks5");
  });

  it("rejects other schemes", () => {
    expect(() => parseProxyUrl("ftp://h:21")).toThrow("Invalid proxy configuration: unsupported scheme ftp");
  });

  it("rejects garbage", () => {
    expect(() => parseProxyUrl("not a url")).toThrow(InvalidProxyError);
  });
});

describe("describeProxy", () => {
  it("drops credentials", () => {
    expect(describeProxy({ url: "socks5://user:pw@h:1080" })).toBe("socks5://h:1080");
  });

  it("returns null for a direct connection", () => {
    expect(describeProxy(null)).toBeNull();
  });
});

describe("ProxyDispatcherPool", () => {
  const pool = new ProxyDispatcherPool();

  afterEach(async () => {
    await pool.close();
  });

  it("returns undefined without a proxy", () => {
    expect(pool.get(null)).toBeUndefined();
  });

  it("reuses one dispatcher per proxy URL", () => {
    const a = pool.get({ url: "socks5://h:1080" });
    const b = pool.get({ url: "socks5://h:1080" });
    const c = pool.get({ url: "http://proxy.local:3128" });
    expect(a).toBe(b);
    expect(c).not.toBe(a);
    expect(pool.size).toBe(2);
  });

  it("throws on an unsupported scheme without caching", () => {
    expect(() => pool.get({ url: "ftp://h:21" })).toThrow(InvalidProxyError);
    expect(pool.size).toBe(0);
  });
});
