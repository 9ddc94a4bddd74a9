/**
 * Harness Configuration
 *
 * Environment (usually loaded from .env by dotenv) validated with zod.
 * CLI flags override environment values.
 */

import { z } from 'zod';
import type { Address, Hex } from 'viem';
import { AddressSchema } from '@edgeprobe/tx-hash';

const PrivateKeySchema = z
  .string()
  .regex(/^(0x)?[0-9a-fA-F]{64}$/, 'PRIVATE_KEY must be 32 bytes of hex')
  .transform((key): Hex => `0x${key.replace(/^0x/, '').toLowerCase()}`);

export const EnvSchema = z.object({
  /** Node JSON-RPC endpoint */
  EDGE_URL: z.string().url('EDGE_URL must be a URL'),
  /** Sender key for the send check */
  PRIVATE_KEY: PrivateKeySchema.optional(),
  /** Recipient for the send check */
  TO_ADDRESS: AddressSchema.optional(),
  NUM_BLOCKS: z.coerce.number().int().positive().default(10),
  POLL_MS: z.coerce.number().int().positive().default(1000),
  TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
});

export interface HarnessConfig {
  rpcUrl: string;
  privateKey?: Hex;
  toAddress?: Address;
  numBlocks: number;
  pollMs: number;
  timeoutMs: number;
}

export type ConfigOverrides = Partial<Pick<HarnessConfig, 'rpcUrl' | 'numBlocks' | 'pollMs' | 'timeoutMs'>>;

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined && v !== ''));
}

/**
 * Build the harness config from environment variables and CLI overrides.
 * Empty variables count as unset.
 *
 * @throws ZodError if EDGE_URL is missing or any value is malformed
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {},
): HarnessConfig {
  const parsed = EnvSchema.parse({
    ...definedEntries(env),
    ...definedEntries({
      EDGE_URL: overrides.rpcUrl,
      NUM_BLOCKS: overrides.numBlocks,
      POLL_MS: overrides.pollMs,
      TIMEOUT_MS: overrides.timeoutMs,
    }),
  });

  return {
    rpcUrl: parsed.EDGE_URL,
    privateKey: parsed.PRIVATE_KEY,
    toAddress: parsed.TO_ADDRESS,
    numBlocks: parsed.NUM_BLOCKS,
    pollMs: parsed.POLL_MS,
    timeoutMs: parsed.TIMEOUT_MS,
  };
}
