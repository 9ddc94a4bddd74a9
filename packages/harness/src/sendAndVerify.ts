/**
 * Send and Verify
 *
 * Submits a signed legacy transfer, waits for it to be mined and then checks
 * the confirming block's transaction hashes.
 */

import { formatEther, type Address } from 'viem';
import { checkBlockTransactions } from './blockTransactions.js';
import type { ChainReader, TransferSender } from './chain.js';
import type { Logger } from './log.js';
import type { CheckReport } from './report.js';
import { waitForConfirmation } from './watchTx.js';

export interface SendAndVerifyArgs {
  reader: ChainReader;
  send: TransferSender;
  from: Address;
  to: Address;
  /** Default 1 wei */
  valueWei?: bigint;
  /** Default 21000 */
  gasLimit?: bigint;
  pollMs?: number;
  timeoutMs?: number;
  log: Logger;
  verbose?: boolean;
}

export async function sendAndVerify(args: SendAndVerifyArgs): Promise<CheckReport> {
  const {
    reader,
    send,
    from,
    to,
    valueWei = 1n,
    gasLimit = 21000n,
    pollMs,
    timeoutMs,
    log,
    verbose = false,
  } = args;
  const failures: string[] = [];

  const nonce = await reader.getPendingNonce(from);
  log(`From Address: ${from}`);
  log(`To   Address: ${to}`);
  log(`Nonce: ${nonce}`);

  const head = await reader.getBlockNumber();
  log(`Current Block Number: ${head}`);

  const [fromBalance, toBalance] = await Promise.all([
    reader.getBalance(from, head),
    reader.getBalance(to, head),
  ]);
  log(`From: Available Balance: ${formatEther(fromBalance)} ETH`);
  log(`To:   Available Balance: ${formatEther(toBalance)} ETH`);

  const gasPrice = await reader.getGasPrice();
  const txHash = await send({ to, value: valueWei, gas: gasLimit, gasPrice, nonce });

  const submitted = await reader.getTransaction(txHash);
  if (submitted.blockNumber !== null) {
    failures.push(`tx ${txHash} was not pending after submission (already in block ${submitted.blockNumber})`);
  }
  log(`tx sent: ${txHash} at blocknumber ${head}`);

  const confirmation = await waitForConfirmation({ reader, txHash, pollMs, timeoutMs, log });
  if (confirmation.status !== 'success') {
    failures.push(`tx ${txHash} reverted in block ${confirmation.blockNumber}`);
  }

  const blockReport = await checkBlockTransactions({
    reader,
    blockNumber: confirmation.blockNumber,
    log,
    verbose,
    requireTransactions: true,
  });

  if (!blockReport.transactionHashes.includes(txHash.toLowerCase())) {
    failures.push(`tx ${txHash} is not listed in block ${confirmation.blockNumber}`);
  }

  return {
    name: 'send-and-verify',
    checked: blockReport.checked,
    failures: [...failures, ...blockReport.failures],
  };
}
