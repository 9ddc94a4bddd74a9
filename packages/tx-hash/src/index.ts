/**
 * @edgeprobe/tx-hash
 *
 * Canonical transaction hash: record model, RLP encoding and Keccak-256
 * digest, computed independently of any node client library.
 */

// Record model
export {
    AddressSchema,
    HexDataSchema,
    Hash32Schema,
    Uint64Schema,
    NonNegativeBigIntSchema,
    TransactionRecordSchema,
    LegacyRecordSchema,
    StateRecordSchema,
    TX_KINDS,
    TX_KIND_TAGS,
    txKindFromTag,
    createTransactionRecord,
    type TxKind,
    type TransactionRecord,
    type TransactionRecordInput,
} from './schema.js';

// RLP encoding
export {
    encodeRlp,
    encodeRlpList,
    minimalBigEndian,
    rlpUint,
    rlpBigInt,
    rlpBytes,
    rlpHex,
    rlpNull,
    rlpList,
    UINT64_MAX,
    type RlpNode,
} from './rlp.js';

// Canonical builder and digest
export { buildCanonicalNodes } from './builder.js';
export {
    encodeTransaction,
    canonicalTxHash,
    canonicalTxHashHex,
    keccak256Hasher,
    DIGEST_LENGTH,
    type Hasher,
} from './hash.js';

// Source adapters
export {
    RpcTransactionSchema,
    HexQuantitySchema,
    recordFromRpc,
    recordFromRpcTransaction,
    type RpcTransaction,
} from './fromRpc.js';
export { recordFromClient, type ClientTransaction } from './fromClient.js';
