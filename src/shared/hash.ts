import { createHash } from "node:crypto";

export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/** Digest of the JSON text of `value`; key order is part of the input. */
export function jsonChecksum(value: unknown): string {
  return sha256(JSON.stringify(value));
}
