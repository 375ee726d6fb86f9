import { describe, expect, it } from "vitest";
import { encodeBase64Lines, faviconHash, md5Hex, murmurhash3 } from "./hash";

describe("murmurhash3", () => {
  it("matches reference values", () => {
    expect(murmurhash3("hello")).toBe(613153351);
    expect(murmurhash3("abc")).toBe(-1277324294);
    expect(murmurhash3("")).toBe(0);
    expect(murmurhash3("hello", 42)).toBe(-488910111);
  });
});

describe("favicon fingerprints", () => {
  const icon = Buffer.from("fake-icon-bytes");

  it("wraps base64 with a trailing newline", () => {
    expect(encodeBase64Lines(icon)).toBe("ZmFrZS1pY29uLWJ5dGVz\n");
  });

  it("wraps long bodies every 76 characters", () => {
    const lines = encodeBase64Lines(Buffer.from(Array.from({ length: 256 }, (_, index) => index))).split("\n");
    expect(lines).toHaveLength(6);
    expect(lines.slice(0, 4).every((line) => line.length === 76)).toBe(true);
    expect(lines[4]).toHaveLength(40);
    expect(lines[5]).toBe("");
  });

  it("hashes the wrapped base64", () => {
    expect(faviconHash(icon)).toBe(-1876585155);
    expect(faviconHash(Buffer.from(Array.from({ length: 256 }, (_, index) => index)))).toBe(-757223386);
    expect(md5Hex(icon)).toBe("1665bc85974568a4a8c784dee901eea8");
  });
});
