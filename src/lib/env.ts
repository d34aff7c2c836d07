import { z } from 'zod';

import { ConfigurationError } from './errors';

export const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// SUI_NETWORK is an open string: anything other than "mainnet"
// selects the testnet tables.
export const envSchema = z.object({
  SUI_NETWORK: z.string().trim().min(1).default('testnet'),
  SUI_RPC_URL: z.string().url().optional(),
  SUI_ADDRESS: z.string().trim().optional(),
  LOG_LEVEL: z.enum(logLevels).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * @throws ConfigurationError when a variable is set to an invalid value
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}
