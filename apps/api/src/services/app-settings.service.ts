/**
 * Application Settings Service
 *
 * Preferences the admin changes at runtime, kept in Settings.json in the data
 * directory. Environment variables override what the file says.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { AppSettings, UiSettings, WorkshopSettings } from '@pzws/shared-types';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export const settingsUpdateSchema = z
  .object({
    ui: z
      .object({
        darkMode: z.boolean(),
        defaultView: z.enum(['mods', 'maps', 'all']),
        defaultSort: z.enum(['name', 'build', 'tags', 'link', 'added']),
      })
      .partial()
      .strict()
      .optional(),
    workshop: z
      .object({
        autoAddRequirements: z.boolean(),
        cachePages: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export type SettingsUpdate = z.infer<typeof settingsUpdateSchema>;

function defaultSettings(): AppSettings {
  return {
    ui: {
      darkMode: false,
      defaultView: 'mods',
      defaultSort: 'added',
    },
    workshop: {
      autoAddRequirements: true,
      cachePages: true,
    },
  };
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

export class AppSettingsService {
  private settings: AppSettings;
  private listeners: Set<(settings: AppSettings) => void> = new Set();

  constructor(private settingsFilePath: string, private env: NodeJS.ProcessEnv = process.env) {
    this.settings = this.loadSettings();

    // Apply environment variable overrides
    this.applyEnvironmentOverrides();
  }

  private loadSettings(): AppSettings {
    try {
      if (fs.existsSync(this.settingsFilePath)) {
        const data = fs.readFileSync(this.settingsFilePath, 'utf-8');
        const parsed = settingsUpdateSchema.safeParse(JSON.parse(data));
        if (parsed.success) {
          return this.mergeWithDefaults(parsed.data);
        }
        logger.warn(`[AppSettings] Ignoring invalid settings file: ${parsed.error.issues[0]?.message}`);
      }
    } catch (error) {
      logger.warn(`[AppSettings] Failed to load settings: ${error}`);
    }

    return defaultSettings();
  }

  private mergeWithDefaults(parsed: SettingsUpdate): AppSettings {
    const defaults = defaultSettings();
    return {
      ui: { ...defaults.ui, ...parsed.ui },
      workshop: { ...defaults.workshop, ...parsed.workshop },
    };
  }

  private applyEnvironmentOverrides(): void {
    const autoAdd = envFlag(this.env.PZWS_AUTO_ADD_REQUIREMENTS);
    if (autoAdd !== undefined) {
      this.settings.workshop.autoAddRequirements = autoAdd;
    }
    const cachePages = envFlag(this.env.PZWS_CACHE_PAGES);
    if (cachePages !== undefined) {
      this.settings.workshop.cachePages = cachePages;
    }
  }

  private saveSettings(): void {
    try {
      fs.mkdirSync(path.dirname(this.settingsFilePath), { recursive: true });
      fs.writeFileSync(this.settingsFilePath, JSON.stringify(this.settings, null, 2) + '\n', 'utf-8');
      logger.info(`[AppSettings] Saved settings to ${this.settingsFilePath}`);
    } catch (error) {
      logger.error(`[AppSettings] Failed to save settings: ${error}`);
      throw error;
    }
  }

  private notifyListeners(): void {
    const snapshot = this.getSettings();
    this.listeners.forEach((listener) => {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error('[AppSettings] Listener error:', error);
      }
    });
  }

  getSettings(): AppSettings {
    return {
      ui: { ...this.settings.ui },
      workshop: { ...this.settings.workshop },
    };
  }

  getUiSettings(): UiSettings {
    return { ...this.settings.ui };
  }

  getWorkshopSettings(): WorkshopSettings {
    return { ...this.settings.workshop };
  }

  /**
   * Applies a partial update. Unknown keys or wrongly typed values are rejected.
   */
  updateSettings(update: unknown): AppSettings {
    const parsed = settingsUpdateSchema.safeParse(update);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(`Invalid settings: ${issue.path.join('.') || 'body'} ${issue.message}`);
    }

    this.settings = {
      ui: { ...this.settings.ui, ...parsed.data.ui },
      workshop: { ...this.settings.workshop, ...parsed.data.workshop },
    };
    this.saveSettings();
    this.notifyListeners();
    return this.getSettings();
  }

  onChange(listener: (settings: AppSettings) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  resetToDefaults(): AppSettings {
    this.settings = defaultSettings();
    this.saveSettings();
    this.notifyListeners();
    return this.getSettings();
  }

  getDefaults(): AppSettings {
    return defaultSettings();
  }
}
