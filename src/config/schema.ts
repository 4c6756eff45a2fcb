import { z } from 'zod';

/**
 * Storage configuration Zod schema.
 *
 * SECURITY: `redis.password` is sensitive. It must be provided explicitly in
 * config and must never appear in logs.
 */
export const StorageConfigSchema = z
  .object({
    /** Storage backend type */
    backend: z.enum(['memory', 'fs', 'redis']).default('fs'),
    /** Verify payload hashes on every read */
    hashOnRead: z.boolean().default(false),
    /** Filesystem backend options */
    fs: z
      .object({
        /** Directory for stored blocks (default: ./data/blocks) */
        dataDir: z.string().min(1).default('./data/blocks'),
      })
      .default(() => ({ dataDir: './data/blocks' })),
    /** Redis backend options */
    redis: z
      .object({
        host: z.string().default('127.0.0.1'),
        port: z.number().int().min(1).max(65535).default(6379),
        /** Redis password (sensitive - never log). Optional for local dev. */
        password: z.string().optional(),
        /** Redis username (Redis 6+ ACL). Optional. */
        username: z.string().optional(),
        /** Redis database number (0-15). Default 0. */
        db: z.number().int().min(0).max(15).default(0),
        /** Prefix for block keys */
        keyPrefix: z.string().default('block:'),
      })
      .default(() => ({ host: '127.0.0.1', port: 6379, db: 0, keyPrefix: 'block:' })),
  })
  .default(() => ({
    backend: 'fs' as const,
    hashOnRead: false,
    fs: { dataDir: './data/blocks' },
    redis: { host: '127.0.0.1', port: 6379, db: 0, keyPrefix: 'block:' },
  }));

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000 })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      /** Limit for write and delete routes */
      sensitive: z.number().int().min(1).default(20),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 100, sensitive: 20, windowMs: 60000 })),

  storage: StorageConfigSchema,

  metrics: z
    .object({
      /** Name prefix for blockstore metrics; must be unique per blockstore in a process */
      prefix: z
        .string()
        .regex(/^[a-zA-Z_][a-zA-Z0-9_.]*$/, 'Metric prefix must be a dotted identifier')
        .default('blockstore'),
      /** Also export Node.js process metrics */
      defaultMetrics: z.boolean().default(false),
    })
    .default(() => ({ prefix: 'blockstore', defaultMetrics: false })),
});

export type Config = z.infer<typeof ConfigSchema>;
