/**
 * Block Transaction Checks
 *
 * For a block, the viem client and raw RPC must list the same transactions in
 * the same order, and every transaction's canonical hash (recomputed through
 * both paths) must equal the hash the node reports.
 */

import type { ChainReader } from './chain.js';
import type { Logger } from './log.js';
import { mergeReports, type CheckReport } from './report.js';
import { compareTransactionHashes } from './transactionHash.js';

export interface BlockTransactionsArgs {
  reader: Pick<ChainReader, 'getBlock' | 'getRpcBlock'>;
  blockNumber: bigint;
  log: Logger;
  verbose?: boolean;
  /** Treat an empty block as a failure */
  requireTransactions?: boolean;
}

export interface BlockTransactionsReport extends CheckReport {
  /** Reported hashes in block order (lowercase) */
  transactionHashes: string[];
}

export async function checkBlockTransactions(args: BlockTransactionsArgs): Promise<BlockTransactionsReport> {
  const { reader, blockNumber, log, verbose = false, requireTransactions = false } = args;
  const name = `block-${blockNumber}-transactions`;
  const failures: string[] = [];

  const [clientBlock, rpcBlock] = await Promise.all([
    reader.getBlock(blockNumber),
    reader.getRpcBlock(blockNumber),
  ]);

  const clientTxs = clientBlock.transactions;
  const rpcTxs = rpcBlock.transactions;
  const transactionHashes = rpcTxs.map((tx) => tx.hash);

  log(`EVM: BlockNumber ${blockNumber} has ${clientTxs.length} transactions`);
  log(`RPC: BlockNumber ${blockNumber} has ${rpcTxs.length} transactions`);

  if (requireTransactions && rpcTxs.length === 0) {
    failures.push(`RPC: block ${blockNumber} has no transactions`);
  }
  if (requireTransactions && clientTxs.length === 0) {
    failures.push(`Client: block ${blockNumber} has no transactions`);
  }

  if (clientTxs.length !== rpcTxs.length) {
    failures.push(`block ${blockNumber}: RPC lists ${rpcTxs.length} transactions, client lists ${clientTxs.length}`);
    return { name, checked: 0, failures, transactionHashes };
  }

  for (let i = 0; i < rpcTxs.length; i++) {
    const rpcTx = rpcTxs[i];
    const comparison = compareTransactionHashes(`block ${blockNumber} txn #${i}`, rpcTx.hash, rpcTx, clientTxs[i]);

    if (verbose) {
      log(`RPC hash (txn #${i}): ${comparison.reported}`);
      log(`EVM hash (txn #${i}): ${clientTxs[i].hash}`);
      log(`Canonical hash (txn #${i}): ${comparison.fromRpc ?? '(not computed)'}`);
    }

    failures.push(...comparison.failures);
  }

  return { name, checked: rpcTxs.length, failures, transactionHashes };
}

export interface AllBlocksArgs {
  reader: Pick<ChainReader, 'getBlockNumber' | 'getBlock' | 'getRpcBlock'>;
  log: Logger;
  verbose?: boolean;
}

/**
 * Run checkBlockTransactions on every block below the current head.
 */
export async function checkAllBlocks(args: AllBlocksArgs): Promise<CheckReport> {
  const { reader, log, verbose } = args;

  const head = await reader.getBlockNumber();
  log(`Current Block Number: ${head}`);
  log(`Checking all blocks from 0 to ${head}`);

  const reports: CheckReport[] = [];
  for (let blockNumber = 0n; blockNumber < head; blockNumber++) {
    reports.push(await checkBlockTransactions({ reader, blockNumber, log, verbose }));
  }

  return mergeReports('all-blocks', reports);
}
