/**
 * JSON-RPC Transaction Adapter
 *
 * Parses a transaction object as returned by eth_getTransactionByHash or
 * eth_getBlockByNumber(..., true) and converts it into a TransactionRecord.
 */

import { z } from 'zod';
import { requireField } from './fields.js';
import {
    AddressSchema,
    Hash32Schema,
    HexDataSchema,
    createTransactionRecord,
    txKindFromTag,
    type TransactionRecord,
} from './schema.js';

/**
 * Hex-encoded quantity ("0x0", "0x5208", ...)
 */
export const HexQuantitySchema = z
    .string()
    .regex(/^0x[0-9a-fA-F]+$/, 'Must be a 0x-prefixed hex quantity')
    .transform((s) => BigInt(s));

export const RpcTransactionSchema = z.object({
    hash: Hash32Schema.optional(),
    nonce: HexQuantitySchema,
    gasPrice: HexQuantitySchema,
    gas: HexQuantitySchema,
    /** Must be present; null for contract creation */
    to: AddressSchema.nullable(),
    value: HexQuantitySchema,
    input: HexDataSchema,
    v: HexQuantitySchema.optional(),
    r: HexQuantitySchema.optional(),
    s: HexQuantitySchema.optional(),
    from: AddressSchema.optional(),
    /** Absent on nodes that only serve legacy transactions */
    type: HexQuantitySchema.optional(),
});

export type RpcTransaction = z.output<typeof RpcTransactionSchema>;

const SOURCE = 'RPC';

/**
 * Convert an already-parsed RPC transaction.
 *
 * @throws Error if signature components are missing, or `from` is missing on a state transaction
 */
export function recordFromRpcTransaction(tx: RpcTransaction): TransactionRecord {
    const txType = txKindFromTag(Number(tx.type ?? 0n));
    const common = {
        nonce: tx.nonce,
        gasPrice: tx.gasPrice,
        gasLimit: tx.gas,
        to: tx.to,
        value: tx.value,
        input: tx.input,
        v: requireField(SOURCE, 'v', tx.v),
        r: requireField(SOURCE, 'r', tx.r),
        s: requireField(SOURCE, 's', tx.s),
    };

    if (txType === 'state') {
        return createTransactionRecord({ ...common, txType, from: requireField(SOURCE, 'from', tx.from) });
    }
    return createTransactionRecord({ ...common, txType, from: tx.from });
}

/**
 * Parse a raw JSON-RPC transaction object into a TransactionRecord.
 *
 * @throws ZodError on missing or malformed fields
 */
export function recordFromRpc(json: unknown): TransactionRecord {
    return recordFromRpcTransaction(RpcTransactionSchema.parse(json));
}
