import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('memory'),
    DATABASE_URL: z.string().min(1).optional(),
    BUS_DRIVER: z.enum(['kafka', 'memory']).default('memory'),
    KAFKA_BROKERS: z
      .string()
      .default('localhost:9092')
      .transform((value) =>
        value
          .split(',')
          .map((broker) => broker.trim())
          .filter((broker) => broker.length > 0)
      ),
    KAFKA_CLIENT_ID: z.string().min(1).default('post-service'),
    POST_EVENTS_TOPIC: z.string().min(1).default('post-events'),
    PROJECTION_GROUP_ID: z.string().min(1).default('post-projection'),
    FETCH_TIMEOUT_MS: positiveInt(1000),
    PROJECTION_RETRY_ATTEMPTS: positiveInt(5),
    PROJECTION_RETRY_BASE_DELAY_MS: positiveInt(100),
    PROJECTION_RETRY_MAX_DELAY_MS: positiveInt(5000),
    COMMAND_MAX_ATTEMPTS: positiveInt(3),
    MEMORY_BUS_PARTITIONS: positiveInt(3),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'required when STORAGE_DRIVER is postgres',
      });
    }
    if (env.BUS_DRIVER === 'kafka' && env.KAFKA_BROKERS.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['KAFKA_BROKERS'],
        message: 'at least one broker is required when BUS_DRIVER is kafka',
      });
    }
    if (
      env.PROJECTION_RETRY_MAX_DELAY_MS < env.PROJECTION_RETRY_BASE_DELAY_MS
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PROJECTION_RETRY_MAX_DELAY_MS'],
        message: 'must not be lower than PROJECTION_RETRY_BASE_DELAY_MS',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * `ConfigModule` validator. Throws with every issue listed so a bad
 * deployment fails on startup instead of on first use.
 */
export const validateEnv = (raw: Record<string, unknown>): Env => {
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${issues}`);
  }
  return parsed.data;
};
