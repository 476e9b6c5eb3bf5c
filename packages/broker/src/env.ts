import { z } from 'zod';
import { BrokerConfigSchema, type BrokerConfig } from '@a2a/shared/config-schema';
import { BrokerError } from './errors.js';

/** Empty strings count as unset so `A2A_REDIS_URL=` disables pub/sub. */
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

const brokerEnvSchema = z.object({
  A2A_VAULT_PATH: z.string().min(1, 'A2A_VAULT_PATH is required'),
  A2A_REDIS_URL: optionalString,
  A2A_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
  A2A_LOG_DIR: optionalString,
  A2A_DEDUP_MAX_SIZE: z.coerce.number().int().min(1).optional(),
  A2A_DEDUP_TTL_SECONDS: z.coerce.number().int().min(1).optional(),
});

export type BrokerEnv = z.infer<typeof brokerEnvSchema>;

/**
 * Build a {@link BrokerConfig} from environment variables.
 *
 * @throws {BrokerError} `CONFIGURATION_ERROR` listing every invalid or missing variable.
 */
export function loadBrokerConfig(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  const parsed = brokerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new BrokerError(
      `Missing or invalid environment variables:\n${formatIssues(parsed.error)}`,
      'CONFIGURATION_ERROR',
    );
  }
  const vars = parsed.data;

  const config = BrokerConfigSchema.safeParse({
    vaultPath: vars.A2A_VAULT_PATH,
    dedup: {
      maxSize: vars.A2A_DEDUP_MAX_SIZE,
      ttlSeconds: vars.A2A_DEDUP_TTL_SECONDS,
    },
    pubsub: { url: vars.A2A_REDIS_URL ?? null },
    logging: {
      level: vars.A2A_LOG_LEVEL,
      logDir: vars.A2A_LOG_DIR ?? null,
    },
  });
  if (!config.success) {
    throw new BrokerError(`Invalid broker configuration:\n${formatIssues(config.error)}`, 'CONFIGURATION_ERROR');
  }
  return config.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
}
