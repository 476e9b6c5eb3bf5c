import { z } from 'zod';

const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  logDir: z.string().nullable().default(null),
});

export const BrokerConfigSchema = z.object({
  vaultPath: z.string().min(1),
  dedup: z
    .object({
      maxSize: z.number().int().min(1).default(10_000),
      ttlSeconds: z.number().int().min(1).default(7200),
    })
    .default(() => ({ maxSize: 10_000, ttlSeconds: 7200 })),
  pubsub: z
    .object({
      url: z.string().url().nullable().default(null),
      channelPrefix: z.string().min(1).default('a2a'),
      connectTimeoutMs: z.number().int().min(100).max(60_000).default(5000),
    })
    .default(() => ({ url: null, channelPrefix: 'a2a', connectTimeoutMs: 5000 })),
  messages: z
    .object({
      defaultTtlSeconds: z.number().int().min(0).default(3600),
      defaultMaxRetries: z.number().int().min(0).default(3),
    })
    .default(() => ({ defaultTtlSeconds: 3600, defaultMaxRetries: 3 })),
  logging: LoggingConfigSchema.default(() => ({ level: 'info' as const, logDir: null })),
});

export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;
export type BrokerConfigInput = z.input<typeof BrokerConfigSchema>;

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<string, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};
