import { z } from 'zod';
import { toError } from '../ts';
import { resolveDatabasePath } from './database';

/**
 * Configuration schema for ratbot, validated once at startup
 */

// Features the bot knows how to build; `enable` may only name these
export const FEATURE_NAMES = ['rat-board', 'help'] as const;
export type FeatureName = typeof FEATURE_NAMES[number];

// Accept both `"help,rat-board"` and `["help", "rat-board"]`
const featureListSchema = z.preprocess(
  (value) => typeof value === 'string'
    ? value.split(',').map((name) => name.trim()).filter((name) => name.length > 0)
    : value,
  z.array(z.enum(FEATURE_NAMES)),
);

// Rescue board configuration
const ratboardSchema = z.object({
  signal: z.string().min(1).default('ratsignal'),
  caseSensitive: z.boolean().default(false),
  duplicatePolicy: z.enum(['merge', 'reject']).default('merge'),
  admins: z.array(z.string()).default([]),
  persistTimeout: z.number().int().positive().default(5000),
  recentLines: z.number().int().positive().default(500),
}).default({});

// Command rate limiting configuration
const rateLimitingSchema = z.object({
  enabled: z.boolean().default(true),
  burstLimit: z.number().int().positive().default(5),
  burstWindow: z.number().int().positive().default(10000),
  duplicateThreshold: z.number().int().positive().default(3),
  duplicateWindow: z.number().int().positive().default(30000),
  cooldownSeconds: z.number().int().positive().default(30),
}).default({});

// Recovery manager configuration
const recoverySchema = z.object({
  maxRetries: z.number().int().positive().default(5),
  baseDelay: z.number().int().positive().default(1000),
  maxDelay: z.number().int().positive().default(60000),
  jitterRange: z.number().min(0).max(1).default(0.2),
  circuitBreakerThreshold: z.number().int().positive().default(3),
  circuitBreakerTimeout: z.number().int().positive().default(300000),
  attemptTimeout: z.number().int().positive().default(30000),
}).default({});

// Main configuration schema
export const configSchema = z.object({
  // Required IRC settings
  nickname: z.string().min(1),
  server: z.string().min(1),
  port: z.number().int().positive().optional(),
  secure: z.boolean().optional(),
  password: z.string().optional(),

  // SASL authentication
  sasl: z.object({
    username: z.string().min(1),
    password: z.string().min(1)
  }).optional(),

  // IRC client options (passed to irc-upd)
  ircOptions: z.object({
    encoding: z.string().optional(),
  }).passthrough().optional(),

  channels: z.array(z.string().min(1)).min(1),

  // Raw commands sent after registration, e.g. [["MODE", "ratbot", "+B"]]
  autoSendCommands: z.array(z.array(z.string()).min(1)).default([]),

  // Command prefixes; lines starting with either are never signals
  prefix: z.string().min(1).default('!'),
  help_prefix: z.string().min(1).optional(),

  enable: featureListSchema.default(['rat-board', 'help']),

  // Persistence
  database: z.string().min(1)
    .superRefine((database, ctx) => {
      try {
        resolveDatabasePath(database);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: toError(error).message });
      }
    })
    .default('sqlite:ratbot.db'),
  workdir: z.string().min(1).default('.'),

  // Read by the external system-data refresher that shares this file
  edsm_maxage: z.number().int().nonnegative().optional(),
  edsm_autorefresh: z.union([z.boolean(), z.number().int().nonnegative()]).optional(),

  ratboard: ratboardSchema,
  rateLimiting: rateLimitingSchema,
  recovery: recoverySchema,

  // Logging
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional()
});

// Export the inferred TypeScript type
export type BotConfig = z.infer<typeof configSchema>;

/**
 * Validate and parse a raw configuration object
 * @returns Validated configuration with all defaults applied
 * @throws ZodError if validation fails
 */
export function validateConfig(rawConfig: unknown): BotConfig {
  return configSchema.parse(rawConfig);
}
