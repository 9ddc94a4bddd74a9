/**
 * CLI Argument Parsing
 *
 * Parses command line arguments for the edgeprobe harness.
 */

import type { Hex } from 'viem';
import { Hash32Schema } from '@edgeprobe/tx-hash';

export const COMMANDS = ['linkage', 'block', 'scan', 'send', 'hash'] as const;

export type Command = (typeof COMMANDS)[number];

export type CliCommand =
  | { command: 'linkage' }
  | { command: 'scan' }
  | { command: 'send' }
  | { command: 'block'; block: bigint }
  | { command: 'hash'; txHash: Hex };

export interface CliOptions {
  rpcUrl?: string;
  blocks?: number;
  pollMs?: number;
  timeoutMs?: number;
  verbose: boolean;
}

export type CliArgs = CliCommand & CliOptions;

export const USAGE = [
  'Usage: edgeprobe <command> [options]',
  '',
  'Commands:',
  '  linkage         Check parent-hash linkage of the first blocks',
  '  block           Check transaction hashes of one block (requires --block)',
  '  scan            Check transaction hashes of every block below the head',
  '  send            Send a 1 wei legacy transfer and check its block (needs PRIVATE_KEY, TO_ADDRESS)',
  '  hash            Recompute one transaction hash (requires --tx)',
  '',
  'Options:',
  '  --rpc           Node RPC URL (default: EDGE_URL)',
  '  --blocks        Number of blocks for linkage (default: NUM_BLOCKS or 10)',
  '  --block         Block number',
  '  --tx            Transaction hash',
  '  --pollMs        Confirmation poll interval (default: POLL_MS or 1000)',
  '  --timeoutMs     Confirmation timeout (default: TIMEOUT_MS or 120000)',
  '  --verbose       Log every transaction hash',
].join('\n');

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const raw = requireValue(flag, value);
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new Error(`${flag} must be a positive integer, got ${raw}`);
  }
  return Number(raw);
}

function parseBlockNumber(flag: string, value: string | undefined): bigint {
  const raw = requireValue(flag, value);
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${flag} must be a block number, got ${raw}`);
  }
  return BigInt(raw);
}

/**
 * Parse command line arguments (process.argv layout: node, script, ...args)
 */
export function parseArgs(argv: string[]): CliArgs {
  const [command, ...args] = argv.slice(2);

  if (!isCommand(command)) {
    throw new Error(`Command must be one of: ${COMMANDS.join(', ')}`);
  }

  const options: CliOptions = { verbose: false };
  let block: bigint | undefined;
  let txHash: Hex | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--rpc':
        options.rpcUrl = requireValue(arg, next);
        i++;
        break;
      case '--blocks':
        options.blocks = parsePositiveInt(arg, next);
        i++;
        break;
      case '--block':
        block = parseBlockNumber(arg, next);
        i++;
        break;
      case '--tx': {
        const parsed = Hash32Schema.safeParse(requireValue(arg, next));
        if (!parsed.success) {
          throw new Error(`--tx must be a 32-byte hash, got ${next}`);
        }
        txHash = parsed.data;
        i++;
        break;
      }
      case '--pollMs':
        options.pollMs = parsePositiveInt(arg, next);
        i++;
        break;
      case '--timeoutMs':
        options.timeoutMs = parsePositiveInt(arg, next);
        i++;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  switch (command) {
    case 'block':
      if (block === undefined) throw new Error('block requires --block <number>');
      return { ...options, command, block };
    case 'hash':
      if (txHash === undefined) throw new Error('hash requires --tx <hash>');
      return { ...options, command, txHash };
    default:
      return { ...options, command };
  }
}
