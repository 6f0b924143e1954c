import { z } from 'zod';

const JsonObject = z.record(z.string(), z.unknown());

// Only `integrations` is required; unknown top-level keys are kept.
export const SettingsSchema = z
  .object({
    integrations: JsonObject,
    plan: JsonObject.optional(),
    edgeFunction: JsonObject.optional(),
    middlewareSettings: JsonObject.optional(),
    metrics: JsonObject.optional(),
    consentSettings: JsonObject.optional(),
  })
  .passthrough();

export type Settings = z.infer<typeof SettingsSchema>;

export type SettingsResult =
  | { kind: 'success'; settings: Settings }
  | { kind: 'network_failure'; statusCode?: number; error: Error }
  | { kind: 'decode_failure'; error: Error };

export type DecodeResult = { ok: true; settings: Settings } | { ok: false; error: Error };

export function decodeSettings(data: Buffer | string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(typeof data === 'string' ? data : data.toString('utf8'));
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }

  const result = SettingsSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: result.error };
  }
  return { ok: true, settings: result.data };
}
