import { describe, expect, it } from "vitest";
import { isValidHostname, normalizeHost, normalizeHosts, parseHostList, toHttpUrl } from "./hosts";

describe("parseHostList", () => {
  it("skips blank lines and comments", () => {
    const text = "a.example.com\n\n  # staging\n b.example.com \r\nc.example.com";
    expect(parseHostList(text)).toEqual(["a.example.com", "b.example.com", "c.example.com"]);
  });
});

describe("isValidHostname", () => {
  it("accepts domains, service labels and IP addresses", () => {
    expect(isValidHostname("www.example.com")).toBe(true);
    expect(isValidHostname("_dmarc.example.com")).toBe(true);
    expect(isValidHostname("10.0.0.1")).toBe(true);
    expect(isValidHostname("[::1]")).toBe(true);
  });

  it("rejects single labels and malformed labels", () => {
    expect(isValidHostname("localhost")).toBe(false);
    expect(isValidHostname("-edge.example.com")).toBe(false);
    expect(isValidHostname("a..example.com")).toBe(false);
    expect(isValidHostname("")).toBe(false);
  });
});

describe("normalizeHost", () => {
  it("infers https and lower-cases the hostname", () => {
    const host = normalizeHost("A.Example.COM.", 4);
    expect(host).toEqual({
      index: 4,
      input: "A.Example.COM.",
      hostname: "a.example.com",
      url: "https://a.example.com/",
      schemeInferred: true,
    });
    expect(Object.isFrozen(host)).toBe(true);
  });

  it("keeps an explicit scheme, port and path but drops the fragment", () => {
    const host = normalizeHost("http://api.example.com:8080/health#top", 0);
    expect(host?.url).toBe("http://api.example.com:8080/health");
    expect(host?.schemeInferred).toBe(false);
    expect(host?.hostname).toBe("api.example.com");
  });

  it("returns null for non-http targets and junk", () => {
    expect(normalizeHost("ftp://files.example.com", 0)).toBeNull();
    expect(normalizeHost("not a host", 0)).toBeNull();
    expect(normalizeHost("   ", 0)).toBeNull();
    expect(normalizeHost("intranet", 0)).toBeNull();
  });
});

describe("normalizeHosts", () => {
  it("indexes valid hosts densely and reports the rest", () => {
    const { hosts, invalid } = normalizeHosts(["a.example.com", "nope", "b.example.com"]);
    expect(hosts.map((host) => [host.index, host.hostname])).toEqual([
      [0, "a.example.com"],
      [1, "b.example.com"],
    ]);
    expect(invalid).toEqual(["nope"]);
  });
});

describe("toHttpUrl", () => {
  it("swaps the scheme only", () => {
    const host = normalizeHost("shop.example.com/cart", 0);
    expect(host).not.toBeNull();
    if (host) {
      expect(toHttpUrl(host)).toBe("http://shop.example.com/cart");
    }
  });
});
