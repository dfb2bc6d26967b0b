import { z } from 'zod';

const protocolSchema = z.object({
  name: z.string().min(1),
  defillamaSlug: z.string().min(1),
  type: z.enum(['lending', 'dex', 'yield', 'other']).default('other'),
  chain: z.string().min(1).default('ethereum'),
  // Placeholder values until APY and utilization are read on-chain
  metrics: z
    .object({
      apy7d: z.number().optional(),
      utilization: z.number().min(0).max(1).optional(),
    })
    .optional(),
});

const DEFAULT_PROTOCOLS = {
  'aave-v3': {
    name: 'Aave V3',
    defillamaSlug: 'aave-v3',
    type: 'lending' as const,
    chain: 'ethereum',
    metrics: { apy7d: 3.45, utilization: 0.725 },
  },
  'compound-v3': {
    name: 'Compound V3',
    defillamaSlug: 'compound-v3',
    type: 'lending' as const,
    chain: 'ethereum',
    metrics: { apy7d: 4.25, utilization: 0.685 },
  },
};

// Main configuration schema
export const configSchema = z.object({
  app: z
    .object({
      name: z.string().default('Protocol Monitor'),
      environment: z.enum(['development', 'production', 'test']).default('development'),
      logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),

  protocols: z
    .record(z.string().min(1), protocolSchema)
    .refine((protocols) => Object.keys(protocols).length > 0, {
      message: 'At least one protocol must be configured',
    })
    .default(DEFAULT_PROTOCOLS),

  thresholds: z
    .object({
      tvlDrop24hPercent: z.number().positive().default(20),
      apyMinPercent: z.number().min(0).default(2),
      utilizationMaxPercent: z.number().min(0).max(100).default(95),
    })
    .default({}),

  alerts: z
    .object({
      deduplicationWindowMs: z.number().int().min(0).default(3600000),
      statusWindowMs: z.number().int().min(0).default(86400000),
      resolvedListLimit: z.number().int().min(1).default(100),
    })
    .default({}),

  notifications: z
    .object({
      channel: z.enum(['none', 'slack', 'telegram']).default('none'),
      slackWebhookUrl: z.string().url().optional(),
      telegramBotToken: z.string().optional(),
      telegramChatId: z.string().optional(),
      timeoutMs: z.number().int().positive().default(10000),
    })
    .default({})
    .superRefine((value, ctx) => {
      if (value.channel === 'slack' && !value.slackWebhookUrl) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['slackWebhookUrl'],
          message: 'Slack webhook URL is required when channel is slack',
        });
      }
      if (value.channel === 'telegram' && (!value.telegramBotToken || !value.telegramChatId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['telegramBotToken'],
          message: 'Telegram bot token and chat id are required when channel is telegram',
        });
      }
    }),

  collectors: z
    .object({
      defillama: z
        .object({
          baseUrl: z.string().url().default('https://api.llama.fi'),
          timeoutMs: z.number().int().positive().default(30000),
          maxRetries: z.number().int().min(0).default(3),
          retryDelayMs: z.number().int().min(0).default(2000),
          requestsPerMinute: z.number().int().min(1).default(25),
        })
        .default({}),
    })
    .default({}),

  pipeline: z
    .object({
      intervalMs: z.number().int().min(60000).default(900000),
    })
    .default({}),

  api: z
    .object({
      enabled: z.boolean().default(true),
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(8000),
    })
    .default({}),

  storage: z
    .object({
      databasePath: z.string().default('./data/protocol_monitor.db'),
      busyTimeoutMs: z.number().int().min(0).default(5000),
    })
    .default({}),
});

// Infer types from schemas
export type AppConfig = z.infer<typeof configSchema>;
export type NotificationsConfig = AppConfig['notifications'];
