import type { ChainClients } from './chain.js';
import { checkBlockLinkage } from './blockLinkage.js';
import { checkAllBlocks, checkBlockTransactions } from './blockTransactions.js';
import type { CliArgs } from './cli.js';
import type { HarnessConfig } from './config.js';
import type { Logger } from './log.js';
import type { CheckReport } from './report.js';
import { sendAndVerify } from './sendAndVerify.js';
import { checkTransactionHash } from './transactionHash.js';

/**
 * Dispatch a parsed command to its check.
 *
 * @throws Error if the send command lacks a sender key or recipient
 */
export async function runCommand(
  args: CliArgs,
  config: HarnessConfig,
  clients: ChainClients,
  log: Logger,
): Promise<CheckReport> {
  const { reader } = clients;

  switch (args.command) {
    case 'linkage':
      return checkBlockLinkage({ reader, numBlocks: config.numBlocks, log });
    case 'block':
      return checkBlockTransactions({ reader, blockNumber: args.block, log, verbose: args.verbose });
    case 'scan':
      return checkAllBlocks({ reader, log, verbose: args.verbose });
    case 'hash':
      return checkTransactionHash({ reader, txHash: args.txHash, log });
    case 'send': {
      if (!clients.send || !clients.senderAddress) {
        throw new Error('send requires PRIVATE_KEY');
      }
      if (!config.toAddress) {
        throw new Error('send requires TO_ADDRESS');
      }
      return sendAndVerify({
        reader,
        send: clients.send,
        from: clients.senderAddress,
        to: config.toAddress,
        pollMs: config.pollMs,
        timeoutMs: config.timeoutMs,
        log,
        verbose: args.verbose,
      });
    }
    default: {
      const unreachable: never = args;
      throw new Error(`Unknown command: ${JSON.stringify(unreachable)}`);
    }
  }
}
