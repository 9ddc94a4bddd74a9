/**
 * Chain Access
 *
 * Two read paths against the same node: viem's typed client and raw
 * JSON-RPC calls whose payloads are parsed with zod. Checks depend on the
 * ChainReader interface so tests can supply an in-process stand-in.
 */

import {
  createPublicClient,
  createWalletClient,
  toHex,
  type Address,
  type Hex,
  type Transport,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { z } from 'zod';
import {
  Hash32Schema,
  HexQuantitySchema,
  RpcTransactionSchema,
  type ClientTransaction,
  type RpcTransaction,
} from '@edgeprobe/tx-hash';

export const RpcBlockTransactionSchema = RpcTransactionSchema.extend({ hash: Hash32Schema });

/**
 * eth_getBlockByNumber(number, true) result
 */
export const RpcBlockSchema = z.object({
  number: HexQuantitySchema,
  hash: Hash32Schema,
  parentHash: Hash32Schema,
  transactions: z.array(RpcBlockTransactionSchema),
});

export type RpcBlock = z.output<typeof RpcBlockSchema>;

/** viem transaction plus the fields the node reports about it */
export type ReportedTransaction = ClientTransaction & {
  hash: Hex;
  blockNumber: bigint | null;
};

export interface ClientBlock {
  number: bigint;
  hash: Hex;
  parentHash: Hex;
  transactions: ReportedTransaction[];
}

export interface ReceiptSummary {
  blockNumber: bigint;
  status: 'success' | 'reverted';
}

export interface ChainReader {
  getBlockNumber(): Promise<bigint>;
  /** Block with full transaction objects, via viem */
  getBlock(blockNumber: bigint): Promise<ClientBlock>;
  /** Block with full transaction objects, via raw JSON-RPC */
  getRpcBlock(blockNumber: bigint): Promise<RpcBlock>;
  getTransaction(hash: Hex): Promise<ReportedTransaction>;
  getRpcTransaction(hash: Hex): Promise<RpcTransaction>;
  getTransactionReceipt(hash: Hex): Promise<ReceiptSummary>;
  getPendingNonce(address: Address): Promise<number>;
  getGasPrice(): Promise<bigint>;
  getBalance(address: Address, blockNumber: bigint): Promise<bigint>;
}

export interface LegacyTransfer {
  to: Address;
  value: bigint;
  gas: bigint;
  gasPrice: bigint;
  nonce: number;
}

/** Signs and submits a legacy transfer, resolving to its hash */
export type TransferSender = (transfer: LegacyTransfer) => Promise<Hex>;

export interface ChainClients {
  reader: ChainReader;
  send?: TransferSender;
  senderAddress?: Address;
}

/**
 * Build the reader (and, given a key, the sender) over one transport,
 * `http(url)` against a node.
 */
export function createClients(transport: Transport, privateKey?: Hex): ChainClients {
  const publicClient = createPublicClient({ transport });

  const reader: ChainReader = {
    getBlockNumber: () => publicClient.getBlockNumber(),

    async getBlock(blockNumber) {
      const block = await publicClient.getBlock({ blockNumber, includeTransactions: true });
      if (block.hash === null || block.number === null) {
        throw new Error(`Client: block ${blockNumber} is still pending`);
      }
      return {
        number: block.number,
        hash: block.hash,
        parentHash: block.parentHash,
        transactions: block.transactions,
      };
    },

    async getRpcBlock(blockNumber) {
      const raw = await publicClient.request({
        method: 'eth_getBlockByNumber',
        params: [toHex(blockNumber), true],
      });
      if (raw === null) {
        throw new Error(`RPC: block ${blockNumber} not found`);
      }
      return RpcBlockSchema.parse(raw);
    },

    getTransaction: (hash) => publicClient.getTransaction({ hash }),

    async getRpcTransaction(hash) {
      const raw = await publicClient.request({
        method: 'eth_getTransactionByHash',
        params: [hash],
      });
      if (raw === null) {
        throw new Error(`RPC: transaction ${hash} not found`);
      }
      return RpcTransactionSchema.parse(raw);
    },

    async getTransactionReceipt(hash) {
      const receipt = await publicClient.getTransactionReceipt({ hash });
      return { blockNumber: receipt.blockNumber, status: receipt.status };
    },

    getPendingNonce: (address) => publicClient.getTransactionCount({ address, blockTag: 'pending' }),

    getGasPrice: () => publicClient.getGasPrice(),

    getBalance: (address, blockNumber) => publicClient.getBalance({ address, blockNumber }),
  };

  if (!privateKey) {
    return { reader };
  }

  const account = privateKeyToAccount(privateKey);
  const walletClient = createWalletClient({ account, transport });

  // chain: null lets viem read the chain id from the node for EIP-155 signing
  const send: TransferSender = ({ to, value, gas, gasPrice, nonce }) =>
    walletClient.sendTransaction({
      account,
      chain: null,
      type: 'legacy',
      to,
      value,
      gas,
      gasPrice,
      nonce,
    });

  return { reader, send, senderAddress: account.address };
}
