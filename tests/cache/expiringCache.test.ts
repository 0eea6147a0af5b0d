import { describe, expect, it } from "vitest";
import { ExpiringCache } from "../../src/cache/expiringCache.js";

describe("ExpiringCache", () => {
  it("returns a value until its TTL elapses", () => {
    let t = 0;
    const cache = new ExpiringCache<{ n: number }>(1000, () => t);
    const value = { n: 1 };
    cache.set("k", value);

    t = 999;
    expect(cache.get("k")).toBe(value);
    t = 1000;
    expect(cache.get("k")).toBeUndefined();
    expect(cache.has("k")).toBe(false);
  });

  it("keeps expired entries in storage until the key is written again", () => {
    let t = 0;
    const cache = new ExpiringCache<string>(10, () => t);
    cache.set("a", "first");
    t = 50;
    expect(cache.get("a")).toBeUndefined();
    expect(cache.storedSize).toBe(1);

    cache.set("a", "second");
    expect(cache.storedSize).toBe(1);
    expect(cache.get("a")).toBe("second");
  });

  it("reports absent keys as undefined", () => {
    expect(new ExpiringCache<number>(10).get("missing")).toBeUndefined();
  });
});
