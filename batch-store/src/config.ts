import { z } from 'zod';

export const StoreConfigurationSchema = z.object({
  writeKey: z.string().min(1),
  storageLocation: z.string().min(1),
  baseFilename: z
    .string()
    .min(1)
    .refine((name) => !/[\\/]/.test(name), 'baseFilename must not contain path separators'),
  maxFileSize: z.number().int().positive().default(475 * 1024), // 475KB, below the 500KB ingest limit
  indexKey: z.string().min(1).default('batchline.index'),
});

export type StoreConfiguration = Readonly<z.infer<typeof StoreConfigurationSchema>>;
export type StoreConfigurationInput = z.input<typeof StoreConfigurationSchema>;

export function createStoreConfiguration(input: StoreConfigurationInput): StoreConfiguration {
  return Object.freeze(StoreConfigurationSchema.parse(input));
}

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : parseInt(value, 10);
}

/**
 * Store configuration from BATCHLINE_* variables. Only the write key is
 * required.
 */
export function loadStoreConfig(env: NodeJS.ProcessEnv = process.env): StoreConfiguration {
  return createStoreConfiguration({
    writeKey: env.BATCHLINE_WRITE_KEY || '',
    storageLocation: env.BATCHLINE_STORAGE_DIR || './data/batches',
    baseFilename: env.BATCHLINE_BASE_FILENAME || 'events',
    maxFileSize: optionalInt(env.BATCHLINE_MAX_FILE_SIZE),
    indexKey: env.BATCHLINE_INDEX_KEY || undefined,
  });
}
