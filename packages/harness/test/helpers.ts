/**
 * Test helpers: signed transaction fixtures and an in-process ChainReader.
 */

import { vi } from 'vitest';
import { custom, fromRlp, keccak256, toHex, zeroHash, type Address, type Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { RpcTransactionSchema } from '@edgeprobe/tx-hash';
import {
  createClients,
  RpcBlockSchema,
  type ChainReader,
  type ClientBlock,
  type ReceiptSummary,
  type ReportedTransaction,
} from '../src/chain.js';

export const TEST_PRIVATE_KEY: Hex = `0x${'01'.repeat(32)}`;
export const RECIPIENT: Address = '0x2222222222222222222222222222222222222222';
export const CHAIN_ID = 100;

export const account = privateKeyToAccount(TEST_PRIVATE_KEY);

export interface SignedFixture {
  hash: Hex;
  /** Transaction object as a node returns it over JSON-RPC */
  rpc: Record<string, unknown>;
  /** Same transaction as viem formats it */
  client: ReportedTransaction;
}

export type RpcJson = Record<string, unknown>;

/**
 * EIP-1193 transport answering eth_getTransactionByHash from a fixed set of
 * JSON-RPC transaction objects, so viem's own formatting runs in tests.
 */
export function nodeTransport(transactions: RpcJson[]) {
  return custom({
    async request({ method, params }: { method: string; params?: readonly unknown[] }) {
      if (method !== 'eth_getTransactionByHash') {
        throw new Error(`unexpected request ${method}`);
      }
      const hash = params?.[0];
      return transactions.find((tx) => tx.hash === hash) ?? null;
    },
  });
}

/** The RPC object as viem's getTransaction formats it */
export function formatWithViem(rpc: RpcJson & { hash: Hex }): Promise<ReportedTransaction> {
  return createClients(nodeTransport([rpc])).reader.getTransaction(rpc.hash);
}

export interface TransferFields {
  nonce: number;
  value?: bigint;
  gasPrice?: bigint;
  blockNumber?: bigint | null;
}

/**
 * Sign a legacy transfer with the test key and describe it both ways.
 */
export async function signedTransfer(fields: TransferFields): Promise<SignedFixture> {
  const { nonce, value = 1n, gasPrice = 1_000_000_000n, blockNumber = null } = fields;
  const gas = 21000n;

  const serialized = await account.signTransaction({
    type: 'legacy',
    chainId: CHAIN_ID,
    nonce,
    gasPrice,
    gas,
    to: RECIPIENT,
    value,
  });
  const hash = keccak256(serialized);

  const items = fromRlp(serialized, 'hex');
  if (typeof items === 'string') throw new Error('expected an RLP list');
  const [v, r, s] = items.slice(6);
  if (typeof v !== 'string' || typeof r !== 'string' || typeof s !== 'string') {
    throw new Error('expected signature items');
  }

  const rpc = {
    hash,
    blockNumber: blockNumber === null ? null : toHex(blockNumber),
    nonce: toHex(nonce),
    gasPrice: toHex(gasPrice),
    gas: toHex(gas),
    to: RECIPIENT,
    value: toHex(value),
    input: '0x',
    v,
    r,
    s,
    from: account.address,
    type: '0x0',
  };

  return { hash, rpc, client: await formatWithViem(rpc) };
}

export function blockHash(n: number): Hex {
  return `0x${(n + 1).toString(16).padStart(64, 'b')}`;
}

export interface FakeBlock {
  number: bigint;
  hash: Hex;
  parentHash: Hex;
  transactions: SignedFixture[];
  /** Overrides for the RPC view of the block */
  rpcHash?: Hex;
  rpcParentHash?: Hex;
}

/**
 * Blocks 0..count-1 linked by parentHash, without transactions.
 */
export function linkedBlocks(count: number): FakeBlock[] {
  return Array.from({ length: count }, (_, i) => ({
    number: BigInt(i),
    hash: blockHash(i),
    parentHash: i === 0 ? zeroHash : blockHash(i - 1),
    transactions: [],
  }));
}

/**
 * In-process ChainReader over a fixed set of blocks. Methods are vi.fn()
 * so tests can override or inspect them.
 */
export function fakeChain(blocks: FakeBlock[]) {
  const find = (blockNumber: bigint): FakeBlock => {
    const block = blocks.find((b) => b.number === blockNumber);
    if (!block) throw new Error(`no fake block ${blockNumber}`);
    return block;
  };

  const getBlock = vi.fn(async (blockNumber: bigint): Promise<ClientBlock> => {
    const block = find(blockNumber);
    return {
      number: block.number,
      hash: block.hash,
      parentHash: block.parentHash,
      transactions: block.transactions.map((t) => t.client),
    };
  });

  const getRpcBlock = vi.fn(async (blockNumber: bigint) => {
    const block = find(blockNumber);
    return RpcBlockSchema.parse({
      number: toHex(block.number),
      hash: block.rpcHash ?? block.hash,
      parentHash: block.rpcParentHash ?? block.parentHash,
      transactions: block.transactions.map((t) => t.rpc),
    });
  });

  const transactions = blocks.flatMap((b) => b.transactions);
  const findTx = (hash: Hex): SignedFixture => {
    const tx = transactions.find((t) => t.hash === hash);
    if (!tx) throw new Error(`no fake transaction ${hash}`);
    return tx;
  };

  const reader = {
    getBlockNumber: vi.fn(async () => BigInt(blocks.length)),
    getBlock,
    getRpcBlock,
    getTransaction: vi.fn(async (hash: Hex) => findTx(hash).client),
    getRpcTransaction: vi.fn(async (hash: Hex) => RpcTransactionSchema.parse(findTx(hash).rpc)),
    getTransactionReceipt: vi.fn(async (_hash: Hex): Promise<ReceiptSummary> => ({ blockNumber: 0n, status: 'success' })),
    getPendingNonce: vi.fn(async (_address: Address) => 0),
    getGasPrice: vi.fn(async () => 1_000_000_000n),
    getBalance: vi.fn(async (_address: Address, _blockNumber: bigint) => 10n ** 18n),
  } satisfies ChainReader;

  return reader;
}

/** Logger that records lines without timestamps */
export function captureLog() {
  const lines: string[] = [];
  const log = vi.fn((message: string) => {
    lines.push(message);
  });
  return { log, lines };
}
