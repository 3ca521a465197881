import { z } from 'zod';

const chatId = z.union([z.number().int(), z.string().regex(/^-?\d+$/).transform(Number)]);

export const instanceSchema = z.object({
  base_url: z.string().url(),
  user: z.string().min(1),
  pass: z.string().min(1)
});

export const telegramSchema = z.object({
  token: z.string().min(1),
  chat_id: chatId,
  topic_id: chatId.nullish().transform((value) => value ?? undefined),
  admins: z.array(chatId).min(1),
  require_arm: z.boolean().default(true),
  arm_ttl_minutes: z.number().positive().default(15),
  arm_mode: z.enum(['single_shot', 'window']).default('single_shot'),
  poll_timeout_sec: z.number().int().min(0).max(50).default(25)
});

export const defaultsSchema = z.object({
  stake: z.number().positive(),
  delay_ms: z.number().int().min(0).default(500),
  poll_timeout_sec: z.number().positive().default(60),
  poll_interval_sec: z.number().positive().default(2),
  request_timeout_ms: z.number().int().positive().default(10_000)
});

export const externalStatusSchema = z.object({
  enabled: z.boolean().default(false),
  url: z.string().default(''),
  user: z.string().optional(),
  pass: z.string().optional(),
  interval_sec: z.number().int().positive().default(30),
  threshold: z.number().positive().default(400),
  reversal: z.number().positive().default(500)
});

export const configSchema = z.object({
  telegram: telegramSchema,
  freqtrade: z.object({
    long: instanceSchema,
    short: instanceSchema
  }),
  defaults: defaultsSchema,
  external_status: externalStatusSchema.default({}),
  logging: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
    })
    .default({ level: 'info' }),
  server: z
    .object({
      enabled: z.boolean().default(true),
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(1).max(65535).default(4090)
    })
    .default({}),
  persistence: z
    .object({
      sqlitePath: z.string().default('./data/venuepilot.db')
    })
    .default({})
});

export const watchlistSchema = z.object({
  basket: z.array(z.string()).default([])
});

export type OrchestratorConfig = z.infer<typeof configSchema>;
export type TelegramConfig = OrchestratorConfig['telegram'];
export type DefaultsConfig = OrchestratorConfig['defaults'];
export type ExternalStatusConfig = OrchestratorConfig['external_status'];
export type InstanceConfig = z.infer<typeof instanceSchema>;
export type Watchlist = z.infer<typeof watchlistSchema>;
