import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { AppSettings } from '@pzws/shared-types';
import { AppSettingsService } from './app-settings.service';
import { ValidationError } from '../utils/errors';

describe('AppSettingsService', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pzws-settings-'));
    file = path.join(dir, 'Settings.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts from defaults without a settings file', () => {
    const service = new AppSettingsService(file, {});

    expect(service.getSettings()).toEqual({
      ui: { darkMode: false, defaultView: 'mods', defaultSort: 'added' },
      workshop: { autoAddRequirements: true, cachePages: true },
    });
    expect(fs.existsSync(file)).toBe(false);
  });

  it('persists a partial update and reloads it', () => {
    const service = new AppSettingsService(file, {});

    const updated = service.updateSettings({ ui: { darkMode: true }, workshop: { cachePages: false } });

    expect(updated.ui).toEqual({ darkMode: true, defaultView: 'mods', defaultSort: 'added' });
    expect(updated.workshop).toEqual({ autoAddRequirements: true, cachePages: false });
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(updated);
    expect(new AppSettingsService(file, {}).getSettings()).toEqual(updated);
  });

  it('rejects wrongly typed values and unknown keys', () => {
    const service = new AppSettingsService(file, {});

    expect(() => service.updateSettings({ ui: { darkMode: 'yes' } })).toThrow(ValidationError);
    expect(() => service.updateSettings({ ui: { darkMode: 'yes' } })).toThrow(/^Invalid settings: ui\.darkMode /);
    expect(() => service.updateSettings({ theme: 'dark' })).toThrow(/^Invalid settings: body /);
    expect(service.getSettings().ui.darkMode).toBe(false);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('falls back to defaults for a malformed or invalid file', () => {
    fs.writeFileSync(file, '{not json');
    expect(new AppSettingsService(file, {}).getUiSettings().defaultView).toBe('mods');

    fs.writeFileSync(file, JSON.stringify({ ui: { defaultView: 'everything' } }));
    expect(new AppSettingsService(file, {}).getUiSettings().defaultView).toBe('mods');
  });

  it('lets environment variables override the file', () => {
    fs.writeFileSync(file, JSON.stringify({ workshop: { autoAddRequirements: false, cachePages: true } }));

    const service = new AppSettingsService(file, { PZWS_AUTO_ADD_REQUIREMENTS: '1', PZWS_CACHE_PAGES: 'false' });

    expect(service.getWorkshopSettings()).toEqual({ autoAddRequirements: true, cachePages: false });
  });

  it('notifies listeners until they unsubscribe', () => {
    const service = new AppSettingsService(file, {});
    const listener = vi.fn<(settings: AppSettings) => void>();
    const unsubscribe = service.onChange(listener);

    service.updateSettings({ ui: { defaultSort: 'name' } });
    unsubscribe();
    service.resetToDefaults();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0].ui.defaultSort).toBe('name');
    expect(service.getUiSettings().defaultSort).toBe('added');
  });
});
