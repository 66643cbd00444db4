/**
 * Engine settings: defaults, environment overrides and validation.
 *
 * Precedence, lowest first: DEFAULT_ENGINE_SETTINGS, persisted settings
 * (settingsStore), environment, explicit options.
 */

import { z } from 'zod';
import type { Diagnostic } from '../types';
import { TaggingError, diagnostic } from './diagnostics';

export const engineSettingsSchema = z.object({
  /** document language used when the sidecar does not name one */
  language: z.string().min(1),
  /** wrap correlated text operators in BDC/EMC; off = references only */
  markContentStreams: z.boolean(),
  producer: z.string().min(1),
  creator: z.string().min(1),
  /** element text longer than this is truncated for /ActualText */
  actualTextLimit: z.number().int().positive(),
  reportFormat: z.enum(['json', 'html']),
});

export type EngineSettings = z.infer<typeof engineSettingsSchema>;

export const partialEngineSettingsSchema = engineSettingsSchema.partial();

export const TOOL_NAME = 'tagged-pdf-engine';

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  language: 'en-US',
  markContentStreams: true,
  producer: TOOL_NAME,
  creator: TOOL_NAME,
  actualTextLimit: 100,
  reportFormat: 'json',
};

// ─── Environment ─────────────────────────────────────────────

const ENV = {
  language: 'TAGGER_LANGUAGE',
  markContentStreams: 'TAGGER_MARK_CONTENT',
  producer: 'TAGGER_PRODUCER',
  actualTextLimit: 'TAGGER_ACTUAL_TEXT_LIMIT',
} as const;

const booleanFromEnv = z.enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform(value => ['1', 'true', 'yes', 'on'].includes(value));

export interface EnvSettings {
  settings: Partial<EngineSettings>;
  diagnostics: Diagnostic[];
}

/**
 * Read overrides from the environment. Unparseable values are ignored with
 * a warning rather than failing the run.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const settings: Partial<EngineSettings> = {};
  const diagnostics: Diagnostic[] = [];
  const invalid = (name: string, value: string) => {
    diagnostics.push(diagnostic('warning', 'invalid-setting', `Ignoring ${name}=${JSON.stringify(value)}`));
  };

  const language = env[ENV.language]?.trim();
  if (language) settings.language = language;

  const producer = env[ENV.producer]?.trim();
  if (producer) settings.producer = producer;

  const mark = env[ENV.markContentStreams]?.trim().toLowerCase();
  if (mark) {
    const parsed = booleanFromEnv.safeParse(mark);
    if (parsed.success) settings.markContentStreams = parsed.data;
    else invalid(ENV.markContentStreams, mark);
  }

  const limit = env[ENV.actualTextLimit]?.trim();
  if (limit) {
    const parsed = z.coerce.number().int().positive().safeParse(limit);
    if (parsed.success) settings.actualTextLimit = parsed.data;
    else invalid(ENV.actualTextLimit, limit);
  }

  return { settings, diagnostics };
}

/**
 * Validate a partial settings object and drop its undefined entries.
 * Throws a ZodError when a present value is invalid.
 */
export function compactSettings(settings: Partial<EngineSettings>): Partial<EngineSettings> {
  const defined = Object.entries(settings).filter(([, value]) => value !== undefined);
  return partialEngineSettingsSchema.parse(Object.fromEntries(defined));
}

/** Merge layers over the defaults; undefined values never override. */
export function resolveEngineSettings(...layers: Array<Partial<EngineSettings> | undefined>): EngineSettings {
  const merged: Record<string, unknown> = { ...DEFAULT_ENGINE_SETTINGS };
  for (const layer of layers) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  const parsed = engineSettingsSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new TaggingError('invalid-setting', `Invalid engine settings (${issues})`);
  }
  return parsed.data;
}
