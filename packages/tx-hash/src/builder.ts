/**
 * Canonical Record Builder
 *
 * Turns a normalized transaction record into the ordered node sequence that
 * is RLP-encoded and hashed. Field order:
 *
 *   nonce, gasPrice, gasLimit, to, value, input, v, r, s [, from]
 *
 * `from` is appended only for state transactions. Reordering any field breaks
 * hash compatibility with the chain.
 */

import { rlpBigInt, rlpHex, rlpNull, rlpUint, type RlpNode } from './rlp.js';
import type { TransactionRecord } from './schema.js';

/**
 * Fields hashed after the common signature fields, per kind.
 * New kinds extend this switch; the `never` branch keeps it total.
 */
function kindTrailer(record: TransactionRecord): RlpNode[] {
    switch (record.txType) {
        case 'legacy':
            return [];
        case 'state':
            return [rlpHex(record.from)];
        default: {
            const unreachable: never = record;
            throw new Error(`Unknown transaction kind: ${JSON.stringify(unreachable)}`);
        }
    }
}

/**
 * Build the canonical node sequence for a record.
 *
 * Assumes a well-formed record (see createTransactionRecord); no validation
 * is done here beyond the kind dispatch.
 *
 * @returns 9 nodes for legacy transactions, 10 for state transactions
 */
export function buildCanonicalNodes(record: TransactionRecord): RlpNode[] {
    return [
        rlpUint(record.nonce),
        rlpBigInt(record.gasPrice),
        rlpUint(record.gasLimit),
        // Contract creation encodes as the empty string, never as a zero address
        record.to === null ? rlpNull() : rlpHex(record.to),
        rlpBigInt(record.value),
        rlpHex(record.input),
        rlpBigInt(record.v),
        rlpBigInt(record.r),
        rlpBigInt(record.s),
        ...kindTrailer(record),
    ];
}
