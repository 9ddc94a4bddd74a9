import {
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  type Hex,
} from 'viem';
import type { ChainReader, ReceiptSummary } from './chain.js';
import type { Logger } from './log.js';

export interface WaitForConfirmationArgs {
  reader: Pick<ChainReader, 'getTransaction' | 'getTransactionReceipt'>;
  txHash: Hex;
  pollMs?: number;
  timeoutMs?: number;
  log?: Logger;
}

function isNotFound(error: unknown): boolean {
  return error instanceof TransactionNotFoundError || error instanceof TransactionReceiptNotFoundError;
}

/**
 * Poll until the transaction is no longer pending, then read its receipt.
 *
 * "Not found" errors are retried (the node may not have indexed the tx yet);
 * anything else propagates.
 *
 * @returns Block number the transaction was confirmed in, and receipt status
 */
export async function waitForConfirmation(args: WaitForConfirmationArgs): Promise<ReceiptSummary> {
  const { reader, txHash, pollMs = 1000, timeoutMs = 120_000, log } = args;

  const startTime = Date.now();

  while (true) {
    if (Date.now() - startTime > timeoutMs) {
      throw new Error(`Timeout waiting for tx ${txHash} after ${timeoutMs}ms`);
    }

    try {
      const tx = await reader.getTransaction(txHash);

      if (tx.blockNumber !== null) {
        const receipt = await reader.getTransactionReceipt(txHash);
        log?.(`tx confirmed: ${txHash} at blocknumber ${receipt.blockNumber}`);
        return receipt;
      }
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }

    await new Promise((resolve) => setTimeout(resolve, pollMs));
  }
}
