import { zeroHash } from 'viem';
import type { ChainReader } from './chain.js';
import type { Logger } from './log.js';
import type { CheckReport } from './report.js';

export interface BlockLinkageArgs {
  reader: Pick<ChainReader, 'getBlock' | 'getRpcBlock'>;
  numBlocks: number;
  log: Logger;
}

/**
 * Walk blocks 0..numBlocks-1 and check that each block's parentHash, as seen
 * by both the viem client and raw RPC, equals the previous block's hash.
 * The genesis parent is the zero hash.
 */
export async function checkBlockLinkage(args: BlockLinkageArgs): Promise<CheckReport> {
  const { reader, numBlocks, log } = args;
  const failures: string[] = [];

  let expectedParent: string = zeroHash;

  for (let i = 0; i < numBlocks; i++) {
    log(`Testing block #${i}...`);
    const blockNumber = BigInt(i);

    const [clientBlock, rpcBlock] = await Promise.all([
      reader.getBlock(blockNumber),
      reader.getRpcBlock(blockNumber),
    ]);

    const clientParent = clientBlock.parentHash.toLowerCase();
    const clientHash = clientBlock.hash.toLowerCase();

    if (rpcBlock.parentHash !== expectedParent) {
      failures.push(`block ${i}: RPC parentHash ${rpcBlock.parentHash} does not match previous block hash ${expectedParent}`);
    }
    if (clientParent !== expectedParent) {
      failures.push(`block ${i}: client parentHash ${clientParent} does not match previous block hash ${expectedParent}`);
    }
    if (rpcBlock.hash !== clientHash) {
      failures.push(`block ${i}: RPC hash ${rpcBlock.hash} differs from client hash ${clientHash}`);
    }

    // The client's view is the source of truth for the next link
    expectedParent = clientHash;
  }

  return { name: 'block-linkage', checked: numBlocks, failures };
}
