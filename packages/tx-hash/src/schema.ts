/**
 * Transaction Record Schema
 *
 * Zod schemas for the normalized transaction record that both source
 * representations (JSON-RPC objects, viem transactions) are converted into.
 */

import { z } from 'zod';
import type { Address, Hex } from 'viem';
import { UINT64_MAX } from './rlp.js';

const ADDRESS_REGEX = /^0x[0-9a-fA-F]{40}$/;
const HEX_DATA_REGEX = /^0x(?:[0-9a-fA-F]{2})*$/;
const HASH_REGEX = /^0x[0-9a-fA-F]{64}$/;

function lowerHex(value: string): Hex {
    return `0x${value.slice(2).toLowerCase()}`;
}

/**
 * 20-byte address, any case accepted, normalized to lowercase
 */
export const AddressSchema = z
    .custom<Address>(
        (v) => typeof v === 'string' && ADDRESS_REGEX.test(v),
        'Must be a 20-byte address (0x + 40 hex chars)',
    )
    .transform((a): Address => lowerHex(a));

/**
 * Even-length hex byte string (0x allowed), normalized to lowercase
 */
export const HexDataSchema = z
    .custom<Hex>(
        (v) => typeof v === 'string' && HEX_DATA_REGEX.test(v),
        'Must be an even-length 0x-prefixed hex byte string',
    )
    .transform((h) => lowerHex(h));

/**
 * 32-byte hash, normalized to lowercase
 */
export const Hash32Schema = z
    .custom<Hex>(
        (v) => typeof v === 'string' && HASH_REGEX.test(v),
        'Must be a 32-byte hash (0x + 64 hex chars)',
    )
    .transform((h) => lowerHex(h));

export const NonNegativeBigIntSchema = z.bigint().nonnegative();

export const Uint64Schema = z.bigint().nonnegative().lte(UINT64_MAX, 'Must fit in an unsigned 64-bit integer');

/**
 * Transaction kinds the canonical hash knows about, with their wire tags.
 */
export const TX_KINDS = ['legacy', 'state'] as const;

export type TxKind = (typeof TX_KINDS)[number];

export const TX_KIND_TAGS: Readonly<Record<TxKind, number>> = {
    legacy: 0x00,
    state: 0x7f,
};

/**
 * Resolve a wire type tag to its kind.
 *
 * @throws Error for tags outside the known set
 */
export function txKindFromTag(tag: number): TxKind {
    const kind = TX_KINDS.find((k) => TX_KIND_TAGS[k] === tag);
    if (kind === undefined) {
        throw new Error(`Unsupported transaction type tag 0x${tag.toString(16)}`);
    }
    return kind;
}

const BaseRecordSchema = z.object({
    nonce: Uint64Schema,
    gasPrice: NonNegativeBigIntSchema,
    gasLimit: Uint64Schema,
    /** Recipient; null for contract creation */
    to: AddressSchema.nullable(),
    value: NonNegativeBigIntSchema,
    /** Call data or contract bytecode */
    input: HexDataSchema,
    v: NonNegativeBigIntSchema,
    r: NonNegativeBigIntSchema,
    s: NonNegativeBigIntSchema,
});

export const LegacyRecordSchema = BaseRecordSchema.extend({
    txType: z.literal('legacy'),
    /** Not hashed for legacy transactions */
    from: AddressSchema.optional(),
});

export const StateRecordSchema = BaseRecordSchema.extend({
    txType: z.literal('state'),
    from: AddressSchema,
});

export const TransactionRecordSchema = z.discriminatedUnion('txType', [
    LegacyRecordSchema,
    StateRecordSchema,
]);

/**
 * Normalized transaction record, immutable once built
 */
export type TransactionRecord = Readonly<z.output<typeof TransactionRecordSchema>>;

export type TransactionRecordInput = z.input<typeof TransactionRecordSchema>;

/**
 * Validate and freeze a transaction record.
 *
 * @throws ZodError if any field is out of range or malformed
 */
export function createTransactionRecord(input: TransactionRecordInput): TransactionRecord {
    return Object.freeze(TransactionRecordSchema.parse(input));
}
