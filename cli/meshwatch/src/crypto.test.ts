import { describe, expect, it } from "vitest";
import { channelCipher, DEFAULT_CHANNEL_KEY, parseChannelKey } from "./crypto.js";

describe("parseChannelKey", () => {
  it("expands PSK index 1 to the default key", () => {
    expect(parseChannelKey("AQ==")).toEqual(Buffer.from(DEFAULT_CHANNEL_KEY, "base64"));
  });

  it("bumps the last byte for higher indexes", () => {
    const key = parseChannelKey("Ag==");
    expect(key?.[15]).toBe(0x02);
    expect(key?.subarray(0, 15)).toEqual(Buffer.from(DEFAULT_CHANNEL_KEY, "base64").subarray(0, 15));
  });

  it("treats index 0 as no encryption", () => {
    expect(parseChannelKey("AA==")).toBeNull();
  });

  it("accepts 32-byte keys and rejects odd lengths", () => {
    expect(parseChannelKey(Buffer.alloc(32, 7).toString("base64"))?.length).toBe(32);
    expect(() => parseChannelKey(Buffer.alloc(3).toString("base64"))).toThrow("got 3");
  });
});

describe("channelCipher", () => {
  const key = Buffer.from(DEFAULT_CHANNEL_KEY, "base64");
  const plain = new TextEncoder().encode("hello mesh");

  it("is its own inverse for the same packet and sender", () => {
    const sealed = channelCipher(plain, key, 77, 42);
    expect(Buffer.from(sealed)).not.toEqual(Buffer.from(plain));
    expect(Buffer.from(channelCipher(sealed, key, 77, 42))).toEqual(Buffer.from(plain));
  });

  it("depends on the packet id", () => {
    const a = channelCipher(plain, key, 77, 42);
    const b = channelCipher(plain, key, 78, 42);
    expect(Buffer.from(a)).not.toEqual(Buffer.from(b));
  });
});
