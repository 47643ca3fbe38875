import { randomBytes, randomUUID } from "node:crypto";

const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

/**
 * Generate a compact, time-sortable event ID.
 * Format: base36(timestamp) + "-" + 8 hex chars of randomness.
 */
export function generateEventId(): string {
  const timePart = Date.now().toString(36);
  const randomPart = randomBytes(4).toString("hex");
  return `${timePart}-${randomPart}`;
}

/**
 * Generate an unguessable confirmation request id.
 * 80 bits of entropy rendered as 16 base32 characters.
 */
export function generateRequestId(): string {
  return base32Encode(randomBytes(10));
}

export function generateSessionId(): string {
  return randomUUID();
}

/** RFC 4648 base32 encoding (no padding) */
function base32Encode(buffer: Buffer): string {
  let bits = 0;
  let value = 0;
  let output = "";

  for (const byte of buffer) {
    value = (value << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      output += BASE32_ALPHABET.charAt((value >>> bits) & 31);
    }
  }

  if (bits > 0) {
    output += BASE32_ALPHABET.charAt((value << (5 - bits)) & 31);
  }

  return output;
}
