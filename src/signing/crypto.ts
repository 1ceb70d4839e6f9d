/**
 * SHA-256 and HMAC-SHA256 over strings (UTF-8) or bytes
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 as sha256Noble } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';

const encoder = new TextEncoder();

function toBytes(data: string | Uint8Array): Uint8Array {
  return typeof data === 'string' ? encoder.encode(data) : data;
}

/**
 * Compute HMAC-SHA256, raw bytes out
 */
export function hmacSha256(key: string | Uint8Array, data: string | Uint8Array): Uint8Array {
  return hmac(sha256Noble, toBytes(key), toBytes(data));
}

/**
 * Compute SHA-256 hash
 */
export function sha256Hash(data: string | Uint8Array): Uint8Array {
  return sha256Noble(toBytes(data));
}

/**
 * Lower-case hex SHA-256 digest
 */
export function sha256Hex(data: string | Uint8Array): string {
  return toHex(sha256Hash(data));
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}
