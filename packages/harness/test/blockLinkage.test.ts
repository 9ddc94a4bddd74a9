import { test, expect, describe } from 'vitest';
import { zeroHash } from 'viem';
import { checkBlockLinkage } from '../src/blockLinkage.js';
import { blockHash, captureLog, fakeChain, linkedBlocks } from './helpers.js';

describe('checkBlockLinkage', () => {
  test('passes on a consistently linked chain', async () => {
    const { log, lines } = captureLog();
    const reader = fakeChain(linkedBlocks(3));

    const report = await checkBlockLinkage({ reader, numBlocks: 3, log });

    expect(report).toEqual({ name: 'block-linkage', checked: 3, failures: [] });
    expect(lines).toEqual(['Testing block #0...', 'Testing block #1...', 'Testing block #2...']);
  });

  test('reports a broken parent link from both views', async () => {
    const blocks = linkedBlocks(3);
    blocks[2].parentHash = blockHash(7);

    const report = await checkBlockLinkage({ reader: fakeChain(blocks), numBlocks: 3, log: captureLog().log });

    expect(report.failures).toEqual([
      `block 2: RPC parentHash ${blockHash(7)} does not match previous block hash ${blockHash(1)}`,
      `block 2: client parentHash ${blockHash(7)} does not match previous block hash ${blockHash(1)}`,
    ]);
  });

  test('expects the zero hash as the genesis parent', async () => {
    const blocks = linkedBlocks(1);
    blocks[0].parentHash = blockHash(5);

    const report = await checkBlockLinkage({ reader: fakeChain(blocks), numBlocks: 1, log: captureLog().log });

    expect(report.failures).toEqual([
      `block 0: RPC parentHash ${blockHash(5)} does not match previous block hash ${zeroHash}`,
      `block 0: client parentHash ${blockHash(5)} does not match previous block hash ${zeroHash}`,
    ]);
  });

  test('reports a block hash that differs between RPC and client', async () => {
    const blocks = linkedBlocks(3);
    blocks[1].rpcHash = blockHash(9);

    const report = await checkBlockLinkage({ reader: fakeChain(blocks), numBlocks: 3, log: captureLog().log });

    expect(report.failures).toEqual([
      `block 1: RPC hash ${blockHash(9)} differs from client hash ${blockHash(1)}`,
    ]);
  });

  test('only reads the requested number of blocks', async () => {
    const reader = fakeChain(linkedBlocks(5));

    await checkBlockLinkage({ reader, numBlocks: 2, log: captureLog().log });

    expect(reader.getBlock).toHaveBeenCalledTimes(2);
    expect(reader.getRpcBlock).toHaveBeenCalledTimes(2);
  });
});
