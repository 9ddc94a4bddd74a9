/**
 * edgeprobe harness
 *
 * Entry point: loads .env, parses the command, runs the check against the
 * node and exits non-zero on any failure.
 */

import 'dotenv/config';
import { http } from 'viem';
import { createClients } from './chain.js';
import { parseArgs, USAGE, type CliArgs } from './cli.js';
import { loadConfig } from './config.js';
import { createLogger } from './log.js';
import { formatReport, isOk } from './report.js';
import { runCommand } from './run.js';

async function main(): Promise<number> {
  const log = createLogger();

  let args: CliArgs;
  try {
    args = parseArgs(process.argv);
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err);
    console.error('');
    console.error(USAGE);
    return 1;
  }

  try {
    const config = loadConfig(process.env, {
      rpcUrl: args.rpcUrl,
      numBlocks: args.blocks,
      pollMs: args.pollMs,
      timeoutMs: args.timeoutMs,
    });
    log(`RPC: ${config.rpcUrl}`);

    const clients = createClients(http(config.rpcUrl), config.privateKey);
    const report = await runCommand(args, config, clients, log);

    for (const failure of report.failures) {
      log(`FAIL ${failure}`);
    }
    log(formatReport(report));
    return isOk(report) ? 0 : 1;
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err);
    return 1;
  }
}

void main().then((code) => {
  process.exitCode = code;
});
