/**
 * Unit Tests: engine settings and persisted settings
 */
import { describe, test, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_ENGINE_SETTINGS, compactSettings, resolveEngineSettings, settingsFromEnv } from '../config';
import { TaggingError } from '../diagnostics';
import { SettingsStore } from '../settingsStore';

describe('settingsFromEnv', () => {
  test('reads every supported variable', () => {
    const { settings, diagnostics } = settingsFromEnv({
      TAGGER_LANGUAGE: ' de-DE ',
      TAGGER_MARK_CONTENT: 'off',
      TAGGER_PRODUCER: 'Remediation Desk',
      TAGGER_ACTUAL_TEXT_LIMIT: '40',
    });

    expect(settings).toEqual({
      language: 'de-DE',
      markContentStreams: false,
      producer: 'Remediation Desk',
      actualTextLimit: 40,
    });
    expect(diagnostics).toEqual([]);
  });

  test('invalid values are ignored with a warning', () => {
    const { settings, diagnostics } = settingsFromEnv({
      TAGGER_MARK_CONTENT: 'maybe',
      TAGGER_ACTUAL_TEXT_LIMIT: '-5',
    });

    expect(settings).toEqual({});
    expect(diagnostics.map(d => d.message)).toEqual([
      'Ignoring TAGGER_MARK_CONTENT="maybe"',
      'Ignoring TAGGER_ACTUAL_TEXT_LIMIT="-5"',
    ]);
  });

  test('an empty environment changes nothing', () => {
    expect(settingsFromEnv({}).settings).toEqual({});
  });
});

describe('resolveEngineSettings', () => {
  test('later layers win and undefined never overrides', () => {
    const settings = resolveEngineSettings(
      { language: 'fr-FR', actualTextLimit: 50 },
      undefined,
      { language: 'nl-NL', actualTextLimit: undefined },
    );

    expect(settings).toEqual({ ...DEFAULT_ENGINE_SETTINGS, language: 'nl-NL', actualTextLimit: 50 });
  });

  test('invalid values raise a TaggingError', () => {
    expect(() => resolveEngineSettings({ actualTextLimit: 0 })).toThrow(TaggingError);
  });
});

describe('compactSettings', () => {
  test('drops undefined entries', () => {
    expect(compactSettings({ language: 'en-GB', producer: undefined })).toEqual({ language: 'en-GB' });
  });
});

describe('SettingsStore', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  async function freshStore(): Promise<SettingsStore> {
    dir = await mkdtemp(join(tmpdir(), 'settings-'));
    return new SettingsStore({ cwd: dir });
  }

  test('set and get round trip through the settings file', async () => {
    const store = await freshStore();

    store.set('language', 'es-ES');
    store.update({ markContentStreams: false });

    expect(store.get('language')).toBe('es-ES');
    expect(store.load()).toEqual({ settings: { language: 'es-ES', markContentStreams: false }, diagnostics: [] });
    const onDisk: unknown = JSON.parse(await readFile(store.path, 'utf-8'));
    expect(onDisk).toEqual({ language: 'es-ES', markContentStreams: false });
  });

  test('rejects invalid values', async () => {
    const store = await freshStore();
    expect(() => store.set('actualTextLimit', -1)).toThrow();
    expect(store.get('actualTextLimit')).toBeUndefined();
  });

  test('hand-edited invalid keys are skipped with a warning', async () => {
    const store = await freshStore();
    await writeFile(store.path, JSON.stringify({ language: 'it-IT', actualTextLimit: 'lots' }), 'utf-8');

    const loaded = new SettingsStore({ cwd: dir }).load();

    expect(loaded.settings).toEqual({ language: 'it-IT' });
    expect(loaded.diagnostics).toHaveLength(1);
    expect(loaded.diagnostics[0].code).toBe('invalid-setting');
  });

  test('clear removes every setting', async () => {
    const store = await freshStore();
    store.set('producer', 'Remediation Desk');
    store.clear();
    expect(store.load().settings).toEqual({});
  });
});
