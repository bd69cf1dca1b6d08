import { z } from 'zod';

const numericString = (name: string) =>
  z
    .string()
    .optional()
    .refine((v) => (v ? !Number.isNaN(Number(v)) : true), `${name} must be a number`);

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: numericString('PORT'),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    REDIS_URL: z.string().optional(),
    // Comma-separated list of allowed web origins for CORS (must be explicit when using cookies).
    ALLOWED_ORIGINS: z.string().optional().default('http://localhost:3000'),

    // Required in production
    SESSION_HMAC_SECRET: z.string().optional(),

    // S3-compatible object storage for attachments. Uploads return 503 until configured.
    S3_BUCKET: z.string().optional(),
    S3_REGION: z.string().optional(),
    S3_ENDPOINT: z.string().url().optional(),
    S3_ACCESS_KEY_ID: z.string().optional(),
    S3_SECRET_ACCESS_KEY: z.string().optional(),
    ASSETS_PUBLIC_BASE_URL: z.string().url().optional(),

    UPLOAD_MAX_BYTES: numericString('UPLOAD_MAX_BYTES'),
    UPLOAD_MAX_FILES: numericString('UPLOAD_MAX_FILES'),
    CACHE_POSTS_TTL_SECONDS: numericString('CACHE_POSTS_TTL_SECONDS'),
    DB_POOL_MAX: numericString('DB_POOL_MAX'),
    DB_LOG_QUERIES: z.string().optional(),
    DB_CONNECT_RETRIES: numericString('DB_CONNECT_RETRIES'),
    DB_CONNECT_RETRY_DELAY_MS: numericString('DB_CONNECT_RETRY_DELAY_MS'),
    LOG_REQUESTS: z.string().optional(),
    TRUST_PROXY: z.string().optional(),

    RATE_LIMIT_TTL_SECONDS: numericString('RATE_LIMIT_TTL_SECONDS'),
    RATE_LIMIT_LIMIT: numericString('RATE_LIMIT_LIMIT'),
    RATE_LIMIT_POST_WRITE_LIMIT: numericString('RATE_LIMIT_POST_WRITE_LIMIT'),
    RATE_LIMIT_POST_WRITE_TTL_SECONDS: numericString('RATE_LIMIT_POST_WRITE_TTL_SECONDS'),
    RATE_LIMIT_INTERACT_LIMIT: numericString('RATE_LIMIT_INTERACT_LIMIT'),
    RATE_LIMIT_INTERACT_TTL_SECONDS: numericString('RATE_LIMIT_INTERACT_TTL_SECONDS'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'production') return;

    if (!env.SESSION_HMAC_SECRET || env.SESSION_HMAC_SECRET.length < 16) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SESSION_HMAC_SECRET'],
        message: 'SESSION_HMAC_SECRET is required in production (min 16 chars)',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function validateEnv<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return (config: Record<string, unknown>): z.infer<TSchema> => {
    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      // Nest expects thrown errors to abort bootstrap.
      throw new Error(
        `Invalid environment variables:\n${parsed.error.issues
          .map((i) => `- ${i.path.join('.')}: ${i.message}`)
          .join('\n')}`,
      );
    }
    return parsed.data;
  };
}
