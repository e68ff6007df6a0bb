/**
 * Signature badge helpers
 *
 * Radix represents "signed by key K" as a virtual non-fungible of the network's
 * signature badge resource. Its local id is the last 29 bytes of blake2b-256(K).
 */

import { blake2b } from '@noble/hashes/blake2b';
import { bytesToHex } from '@noble/hashes/utils';

/** Bytes of the key hash kept in the badge's local id */
export const PUBLIC_KEY_HASH_BYTES = 29;

/**
 * Hash a public key into a signature badge local id (hex)
 */
export function publicKeyHash(publicKey: Uint8Array): string {
  const hash = blake2b(publicKey, { dkLen: 32 });
  return bytesToHex(hash.slice(hash.length - PUBLIC_KEY_HASH_BYTES));
}

/**
 * Global id of the signature badge for a public key
 */
export function signatureBadgeId(badgeResource: string, publicKey: Uint8Array): string {
  return `${badgeResource}:[${publicKeyHash(publicKey)}]`;
}
