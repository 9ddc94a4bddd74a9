/**
 * Client Transaction Adapter
 *
 * Converts a viem transaction object (getTransaction, getBlock with
 * includeTransactions) into a TransactionRecord.
 */

import { hexToNumber, type Address, type Hex } from 'viem';
import { hexQuantity, requireField } from './fields.js';
import { createTransactionRecord, txKindFromTag, type TransactionRecord, type TxKind } from './schema.js';

/**
 * The viem Transaction fields the canonical hash reads.
 * viem leaves `type` undefined for tags it does not know (e.g. state
 * transactions, 0x7f) but keeps the raw tag in `typeHex`.
 */
export interface ClientTransaction {
    nonce: number;
    gasPrice?: bigint | undefined;
    gas: bigint;
    to: Address | null;
    value: bigint;
    input: Hex;
    v?: bigint | undefined;
    r?: Hex | undefined;
    s?: Hex | undefined;
    from: Address;
    type?: string | undefined;
    typeHex?: Hex | null | undefined;
}

const SOURCE = 'Client';

function clientKind(tx: ClientTransaction): TxKind {
    if (tx.typeHex !== undefined && tx.typeHex !== null) {
        return txKindFromTag(hexToNumber(tx.typeHex));
    }
    if (tx.type === undefined || tx.type === 'legacy') {
        return 'legacy';
    }
    throw new Error(`Unsupported transaction type ${tx.type}`);
}

/**
 * Convert a viem transaction into a TransactionRecord.
 *
 * @throws Error if gasPrice or signature components are missing, or the kind is unsupported
 */
export function recordFromClient(tx: ClientTransaction): TransactionRecord {
    const txType = clientKind(tx);
    const common = {
        nonce: BigInt(tx.nonce),
        gasPrice: requireField(SOURCE, 'gasPrice', tx.gasPrice),
        gasLimit: tx.gas,
        to: tx.to,
        value: tx.value,
        input: tx.input,
        v: requireField(SOURCE, 'v', tx.v),
        r: hexQuantity(requireField(SOURCE, 'r', tx.r)),
        s: hexQuantity(requireField(SOURCE, 's', tx.s)),
    };

    return createTransactionRecord({ ...common, txType, from: tx.from });
}
