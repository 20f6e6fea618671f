/**
 * Secret redaction for log output.
 *
 * Keys that look like secret material are replaced with "[REDACTED]"; KeyPair instances
 * collapse to their public JSON form. Byte arrays are summarized rather than dumped.
 */

import { KeyPair } from "../keys/keypair";

export const REDACTED = "[REDACTED]";

const SECRET_KEY_PATTERN = /(secret|private|seed|mnemonic|password|passphrase|token|api[_-]?key)/i;

function redactValue(value: unknown, depth: number): unknown {
  if (depth > 8) return "[Truncated]";
  if (value instanceof KeyPair) return value.toJSON();
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  if (Array.isArray(value)) return value.map((item) => redactValue(item, depth + 1));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : redactValue(inner, depth + 1);
    }
    return out;
  }
  return value;
}

export function redactSecrets(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : redactValue(value, 1);
  }
  return out;
}
