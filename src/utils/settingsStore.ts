/**
 * Persisted user settings, one key per engine setting.
 *
 * Backed by conf (a JSON file in the user's config directory, or in `cwd`
 * when given). The file can be edited by hand, so values are validated on
 * every read.
 */

import Conf from 'conf';
import type { Diagnostic } from '../types';
import { diagnostic } from './diagnostics';
import { TOOL_NAME, compactSettings, partialEngineSettingsSchema, type EngineSettings } from './config';

export type StoredSettings = Partial<EngineSettings>;

export interface SettingsStoreOptions {
  /** directory holding the settings file; defaults to the OS config dir */
  cwd?: string;
  configName?: string;
}

export interface LoadedSettings {
  settings: StoredSettings;
  diagnostics: Diagnostic[];
}

export class SettingsStore {
  private readonly store: Conf<StoredSettings>;

  constructor(options: SettingsStoreOptions = {}) {
    this.store = new Conf<StoredSettings>({
      projectName: TOOL_NAME,
      ...(options.cwd ? { cwd: options.cwd } : {}),
      ...(options.configName ? { configName: options.configName } : {}),
    });
  }

  get path(): string {
    return this.store.path;
  }

  /**
   * Every stored setting that passes validation. Invalid keys are reported
   * and left out, so the defaults apply for them.
   */
  load(): LoadedSettings {
    const raw: unknown = this.store.store;
    const parsed = partialEngineSettingsSchema.safeParse(raw);
    if (parsed.success) return { settings: parsed.data, diagnostics: [] };

    const invalidKeys = new Set(parsed.error.issues.map(i => String(i.path[0])));
    const diagnostics = [...invalidKeys].map(key =>
      diagnostic('warning', 'invalid-setting', `Ignoring stored setting "${key}" in ${this.store.path}`));
    console.warn(`[settingsStore] Invalid settings in ${this.store.path}: ${[...invalidKeys].join(', ')}`);

    const settings: StoredSettings = {};
    for (const [key, value] of Object.entries(this.store.store)) {
      if (invalidKeys.has(key)) continue;
      const single = partialEngineSettingsSchema.safeParse({ [key]: value });
      if (single.success) Object.assign(settings, single.data);
    }
    return { settings, diagnostics };
  }

  get<K extends keyof EngineSettings>(key: K): EngineSettings[K] | undefined {
    return this.load().settings[key];
  }

  set<K extends keyof EngineSettings>(key: K, value: EngineSettings[K]): void {
    const parsed = partialEngineSettingsSchema.safeParse({ [key]: value });
    if (!parsed.success) {
      throw new Error(`[settingsStore] Invalid value for ${key}: ${parsed.error.issues[0]?.message ?? 'rejected'}`);
    }
    this.store.set(key, value);
  }

  update(patch: StoredSettings): void {
    this.store.set(compactSettings(patch));
  }

  delete(key: keyof EngineSettings): void {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }
}
