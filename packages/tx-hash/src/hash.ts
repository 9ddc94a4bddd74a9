/**
 * Canonical Transaction Hash
 *
 * keccak256(rlp([nonce, gasPrice, gasLimit, to, value, input, v, r, s, from?]))
 */

import { bytesToHex, keccak256, type Hex } from 'viem';
import { buildCanonicalNodes } from './builder.js';
import { encodeRlpList } from './rlp.js';
import type { TransactionRecord } from './schema.js';

/** Hash function applied to the encoded record */
export type Hasher = (bytes: Uint8Array) => Uint8Array;

export const DIGEST_LENGTH = 32;

/**
 * Legacy Keccak-256 (pre-NIST padding), as used by the chain.
 * Fixed for chain compatibility; other hashers are for tests only.
 */
export const keccak256Hasher: Hasher = (bytes) => keccak256(bytes, 'bytes');

/**
 * RLP encoding of the canonical node sequence.
 */
export function encodeTransaction(record: TransactionRecord): Uint8Array {
    return encodeRlpList(buildCanonicalNodes(record));
}

/**
 * Compute the 32-byte canonical hash of a transaction record.
 */
export function canonicalTxHash(record: TransactionRecord, hasher: Hasher = keccak256Hasher): Uint8Array {
    const digest = hasher(encodeTransaction(record));
    if (digest.length !== DIGEST_LENGTH) {
        throw new Error(`Hasher returned ${digest.length} bytes, expected ${DIGEST_LENGTH}`);
    }
    return digest;
}

/**
 * Canonical hash as 0x-prefixed lowercase hex (0x + 64 hex chars).
 */
export function canonicalTxHashHex(record: TransactionRecord, hasher: Hasher = keccak256Hasher): Hex {
    return bytesToHex(canonicalTxHash(record, hasher));
}
