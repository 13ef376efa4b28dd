import { createDecipheriv } from "node:crypto";

// The firmware's published default channel key (PSK index 1).
export const DEFAULT_CHANNEL_KEY = "1PG7OiApB1nwvP+rz05pAQ==";

/**
 * Expands a base64 channel key. A single byte is the firmware's PSK index
 * shorthand: 1 is the default key, n bumps its last byte by n-1. Zero means
 * the channel is unencrypted and yields no key.
 */
export function parseChannelKey(base64: string): Buffer | null {
  const raw = Buffer.from(base64, "base64");
  if (raw.length === 1) {
    const index = raw[0];
    if (index === 0) return null;
    const key = Buffer.from(DEFAULT_CHANNEL_KEY, "base64");
    key[key.length - 1] = (key[key.length - 1] + index - 1) & 0xff;
    return key;
  }
  if (raw.length === 16 || raw.length === 32) return raw;
  throw new Error(`channel key must be 1, 16 or 32 bytes, got ${raw.length}`);
}

function nonceFor(packetId: number, fromNodeId: number): Buffer {
  const nonce = Buffer.alloc(16);
  nonce.writeBigUInt64LE(BigInt(packetId >>> 0), 0);
  nonce.writeBigUInt64LE(BigInt(fromNodeId >>> 0), 8);
  return nonce;
}

/** AES-CTR keystream over the payload. The same call encrypts and decrypts. */
export function channelCipher(bytes: Uint8Array, key: Buffer, packetId: number, fromNodeId: number): Uint8Array {
  const algorithm = key.length === 32 ? "aes-256-ctr" : "aes-128-ctr";
  const decipher = createDecipheriv(algorithm, key, nonceFor(packetId, fromNodeId));
  return Buffer.concat([decipher.update(bytes), decipher.final()]);
}
