import dotenv from 'dotenv';
import * as path from 'path';

// Load environment variables
dotenv.config();

export interface SteamConfig {
  baseUrl: string;
  timeout: number;
  userAgent: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  dataDir: string;
  steam: SteamConfig;
  cache: {
    pageTTL: number;
  };
  logStore: {
    maxEntries: number;
  };
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

function parseInt(value: string | undefined, defaultValue: number): number {
  const parsed = Number(value);
  return value === undefined || value === '' || isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInt(env.PORT, 3000),
    nodeEnv: env.NODE_ENV || 'development',
    dataDir: path.resolve(env.PZWS_DATA_DIR || './data'),

    steam: {
      baseUrl: env.STEAM_BASE_URL || 'https://steamcommunity.com',
      timeout: parseInt(env.STEAM_TIMEOUT, 20000),
      userAgent: env.STEAM_USER_AGENT || DEFAULT_USER_AGENT,
    },

    cache: {
      pageTTL: parseInt(env.CACHE_TTL_PAGES, 300),
    },

    logStore: {
      maxEntries: parseInt(env.LOG_STORE_MAX, 1000),
    },
  };
}

export function validateConfig(config: AppConfig): void {
  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    throw new Error(`PORT must be between 1 and 65535 (got ${config.port})`);
  }
  if (!config.steam.baseUrl) {
    throw new Error('STEAM_BASE_URL must not be empty');
  }
  if (config.steam.timeout <= 0) {
    throw new Error('STEAM_TIMEOUT must be a positive number of milliseconds');
  }
  if (config.cache.pageTTL < 0) {
    throw new Error('CACHE_TTL_PAGES must not be negative');
  }
}

export const config = loadConfig();
