/**
 * Application configuration with validation and centralized constants
 * @module Config
 */

import { assert, validateType } from './utils/errorHandler.js';

interface ApiConfig {
  DATA_URL: string;
  TIMEOUT_MS: number;
  RETRY_ATTEMPTS: number;
  RETRY_DELAY_MS: number;
}

interface UiConfig {
  DEBOUNCE_MS: number;
  BATCH_SIZE: number;
  COUNTDOWN_INTERVAL_MS: number;
}

interface DatesConfig {
  LOCALE: string;
}

interface ChartConfig {
  TITLE: string;
  HEIGHT: number;
  BAR_COLOR: string;
  BAR_BORDER_COLOR: string;
}

interface Config {
  API: ApiConfig;
  UI: UiConfig;
  DATES: DatesConfig;
  CHART: ChartConfig;
}

/**
 * Application configuration with validation
 */
export const CONFIG: Config = Object.freeze({
  API: {
    DATA_URL: 'data/games.json',
    TIMEOUT_MS: 10000,
    RETRY_ATTEMPTS: 2,
    RETRY_DELAY_MS: 1000
  },

  UI: {
    // Trailing-edge delay for search typing
    DEBOUNCE_MS: 300,
    // Games per "load more" step; whole years are appended so a step may overshoot
    BATCH_SIZE: 50,
    COUNTDOWN_INTERVAL_MS: 60 * 1000
  },

  DATES: {
    LOCALE: 'en-US'
  },

  CHART: {
    TITLE: 'Free Games by Year',
    HEIGHT: 280,
    BAR_COLOR: 'rgba(0, 120, 242, 0.6)',
    BAR_BORDER_COLOR: 'rgba(0, 120, 242, 1)'
  }
});

/**
 * Validate configuration object structure
 * @param config
 * @throws {AppError} If configuration is invalid
 */
function validateConfig(config: Config): void {
  validateType(config, 'object', 'CONFIG');

  assert(config.API, 'CONFIG.API is required');
  assert(typeof config.API.DATA_URL === 'string' && config.API.DATA_URL.length > 0, 'DATA_URL must be string');
  assert(typeof config.API.TIMEOUT_MS === 'number' && config.API.TIMEOUT_MS > 0, 'TIMEOUT_MS must be positive number');
  assert(
    Number.isInteger(config.API.RETRY_ATTEMPTS) && config.API.RETRY_ATTEMPTS >= 0,
    'RETRY_ATTEMPTS must be a non-negative integer'
  );

  assert(config.UI, 'CONFIG.UI is required');
  assert(config.UI.DEBOUNCE_MS >= 0, 'DEBOUNCE_MS must not be negative');
  assert(Number.isInteger(config.UI.BATCH_SIZE) && config.UI.BATCH_SIZE > 0, 'BATCH_SIZE must be a positive integer');
  assert(config.UI.COUNTDOWN_INTERVAL_MS > 0, 'COUNTDOWN_INTERVAL_MS must be positive number');

  assert(typeof config.DATES.LOCALE === 'string', 'LOCALE must be string');
  assert(config.CHART.HEIGHT > 0, 'CHART.HEIGHT must be positive number');
}

validateConfig(CONFIG);
