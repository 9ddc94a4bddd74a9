/**
 * Cross-path transaction hash comparison.
 *
 * The canonical hash is recomputed from the raw RPC fields and from the viem
 * transaction object, and both are compared with the hash the node reports.
 */

import type { Hex } from 'viem';
import {
  canonicalTxHashHex,
  recordFromClient,
  recordFromRpcTransaction,
  type RpcTransaction,
  type TransactionRecord,
} from '@edgeprobe/tx-hash';
import type { ChainReader, ReportedTransaction } from './chain.js';
import type { Logger } from './log.js';
import type { CheckReport } from './report.js';

export interface HashComparison {
  reported: string;
  fromRpc: Hex | null;
  fromClient: Hex | null;
  failures: string[];
}

function recompute(
  label: string,
  source: string,
  toRecord: () => TransactionRecord,
  failures: string[],
): Hex | null {
  try {
    return canonicalTxHashHex(toRecord());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    failures.push(`${label}: cannot normalize ${source} transaction: ${reason}`);
    return null;
  }
}

/**
 * Compare the node-reported hash of one transaction against both recomputed hashes.
 *
 * @param label - Prefix for failure messages (e.g. "txn #0")
 * @param reported - Hash reported by the RPC path
 */
export function compareTransactionHashes(
  label: string,
  reported: string,
  rpcTx: RpcTransaction,
  clientTx: ReportedTransaction,
): HashComparison {
  const failures: string[] = [];
  const expected = reported.toLowerCase();
  const clientReported = clientTx.hash.toLowerCase();

  if (clientReported !== expected) {
    failures.push(`${label}: RPC hash ${expected} differs from client hash ${clientReported}`);
  }

  const fromRpc = recompute(label, 'RPC', () => recordFromRpcTransaction(rpcTx), failures);
  const fromClient = recompute(label, 'client', () => recordFromClient(clientTx), failures);

  if (fromRpc !== null && fromRpc !== expected) {
    failures.push(`${label}: canonical hash from RPC fields ${fromRpc} differs from reported ${expected}`);
  }
  if (fromClient !== null && fromClient !== expected) {
    failures.push(`${label}: canonical hash from client fields ${fromClient} differs from reported ${expected}`);
  }

  return { reported: expected, fromRpc, fromClient, failures };
}

export interface TransactionHashArgs {
  reader: Pick<ChainReader, 'getTransaction' | 'getRpcTransaction'>;
  txHash: Hex;
  log: Logger;
}

/**
 * Recompute one transaction's canonical hash through both read paths.
 */
export async function checkTransactionHash(args: TransactionHashArgs): Promise<CheckReport> {
  const { reader, txHash, log } = args;

  const [rpcTx, clientTx] = await Promise.all([
    reader.getRpcTransaction(txHash),
    reader.getTransaction(txHash),
  ]);

  const label = `tx ${txHash}`;
  const comparison = compareTransactionHashes(label, txHash, rpcTx, clientTx);

  const failures: string[] = [];
  if (rpcTx.hash === undefined) {
    failures.push(`${label}: RPC transaction does not report a hash`);
  } else if (rpcTx.hash !== comparison.reported) {
    failures.push(`${label}: RPC hash ${rpcTx.hash} differs from requested hash ${comparison.reported}`);
  }
  failures.push(...comparison.failures);

  log(`Reported hash:      ${comparison.reported}`);
  log(`Canonical (RPC):    ${comparison.fromRpc ?? '(not computed)'}`);
  log(`Canonical (client): ${comparison.fromClient ?? '(not computed)'}`);

  return { name: 'transaction-hash', checked: 1, failures };
}
