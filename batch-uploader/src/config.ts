import { z } from 'zod';

const hostSchema = z
  .string()
  .min(1)
  .refine((host) => !/^[a-z]+:\/\//i.test(host), 'host must not include a scheme');

export const UploaderConfigSchema = z.object({
  apiHost: hostSchema,
  cdnHost: hostSchema,
  flushIntervalMs: z.number().int().positive().default(30000), // 30 seconds
  maxFilesPerFlush: z.number().int().positive().default(10),
  maxBatchBytes: z.number().int().positive().optional(),
  requestTimeoutMs: z.number().int().positive().default(60000),
  userAgent: z.string().min(1).optional(),
  retry: z
    .object({
      backoffMs: z.number().int().nonnegative().default(1000),
      maxBackoffMs: z.number().int().positive().default(30000),
      multiplier: z.number().min(1).default(2),
    })
    .default({}),
});

export type UploaderConfig = z.infer<typeof UploaderConfigSchema>;

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : parseInt(value, 10);
}

export function loadUploaderConfig(env: NodeJS.ProcessEnv = process.env): UploaderConfig {
  return UploaderConfigSchema.parse({
    apiHost: env.BATCHLINE_API_HOST || '',
    cdnHost: env.BATCHLINE_CDN_HOST || '',
    flushIntervalMs: optionalInt(env.BATCHLINE_FLUSH_INTERVAL_MS),
    maxFilesPerFlush: optionalInt(env.BATCHLINE_FLUSH_AT),
    maxBatchBytes: optionalInt(env.BATCHLINE_MAX_BATCH_BYTES),
    requestTimeoutMs: optionalInt(env.BATCHLINE_REQUEST_TIMEOUT_MS),
    userAgent: env.BATCHLINE_USER_AGENT || undefined,
    retry: {
      backoffMs: optionalInt(env.BATCHLINE_RETRY_BACKOFF_MS),
      maxBackoffMs: optionalInt(env.BATCHLINE_RETRY_MAX_BACKOFF_MS),
    },
  });
}
