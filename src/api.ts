/**
 * Loading and validation of the games dataset artifact
 * @module API
 */

import { CONFIG } from './config.js';
import type { Dataset, GameRecord, StatisticsSummary, UpcomingGameRecord } from './types/index.js';
import { AppError, ErrorTypes, isRecord, safeFetch, validators } from './utils/errorHandler.js';
import { logger } from './utils/logger.js';

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

function optionalNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Typed record from one raw `allGames` entry, or null when the entry has no usable
 * name. Optional fields are filled with null rather than rejected.
 * @param entry
 * @param index - Position in the source array, used as an id fallback
 */
export function normalizeGameRecord(entry: unknown, index: number): GameRecord | null {
  if (!isRecord(entry)) {
    return null;
  }

  const name = optionalString(entry.name);
  if (!name) {
    return null;
  }

  const rawId = entry.id;
  let id: number | string = `game-${index}`;
  if (typeof rawId === 'number' && Number.isFinite(rawId)) {
    id = rawId;
  } else if (typeof rawId === 'string' && rawId.trim()) {
    id = rawId;
  }

  return Object.freeze({
    id,
    name,
    link: optionalString(entry.link) ?? '#',
    image: optionalString(entry.image),
    platform: optionalString(entry.platform) ?? 'UNKNOWN',
    rating: optionalNumber(entry.rating),
    firstFreeDate: optionalString(entry.firstFreeDate),
    epicId: optionalString(entry.epicId),
    lastFreeDate: optionalString(entry.lastFreeDate),
    startDate: optionalString(entry.startDate),
    endDate: optionalString(entry.endDate),
    status: optionalString(entry.status)
  });
}

function normalizeUpcomingRecord(entry: unknown, index: number): UpcomingGameRecord | null {
  const base = normalizeGameRecord(entry, index);
  if (!base) {
    return null;
  }
  return Object.freeze({ ...base, startDate: base.startDate ?? null, endDate: base.endDate ?? null });
}

function normalizeList<T>(value: unknown, field: string, normalize: (entry: unknown, index: number) => T | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  const entries = validators.array(value, field);
  const records: T[] = [];
  entries.forEach((entry, index) => {
    const record = normalize(entry, index);
    if (record) {
      records.push(record);
    } else {
      logger.warn(`Dropping malformed ${field} entry`, { index });
    }
  });
  return records;
}

function normalizeStatistics(value: unknown): StatisticsSummary {
  const statistics = validators.record(value, 'statistics');
  const rawByYear = validators.record(statistics.gamesByYear, 'statistics.gamesByYear');

  const gamesByYear: Record<string, number> = {};
  for (const [year, count] of Object.entries(rawByYear)) {
    if (typeof count === 'number' && Number.isFinite(count)) {
      gamesByYear[year] = count;
    }
  }

  return Object.freeze({
    gamesByYear: Object.freeze(gamesByYear),
    totalGames: optionalNumber(statistics.totalGames) ?? undefined,
    totalPromotions: optionalNumber(statistics.totalPromotions) ?? undefined,
    firstGameDate: optionalString(statistics.firstGameDate),
    avgGamesPerWeek: optionalNumber(statistics.avgGamesPerWeek) ?? undefined
  });
}

/**
 * Validate a parsed artifact and return an immutable snapshot.
 * @param raw - Parsed JSON
 * @throws {AppError} DATA_FORMAT when the artifact is unusable as a whole
 */
export function validateDataset(raw: unknown): Dataset {
  try {
    const root = validators.record(raw, 'dataset');
    validators.array(root.allGames, 'allGames');

    return Object.freeze({
      allGames: Object.freeze(normalizeList(root.allGames, 'allGames', normalizeGameRecord)),
      upcomingGames: Object.freeze(normalizeList(root.upcomingGames, 'upcomingGames', normalizeUpcomingRecord)),
      currentGames: Object.freeze(normalizeList(root.currentGames, 'currentGames', normalizeGameRecord)),
      statistics: normalizeStatistics(root.statistics),
      lastUpdated: optionalString(root.lastUpdated)
    });
  } catch (error) {
    if (error instanceof AppError && error.type === ErrorTypes.DATA_FORMAT) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new AppError(ErrorTypes.DATA_FORMAT, `Invalid games dataset: ${message}`, null, { cause: error });
  }
}

/**
 * Fetch, parse and validate the dataset artifact once.
 * @param url
 */
export async function fetchDataset(url: string = CONFIG.API.DATA_URL): Promise<Dataset> {
  const response = await safeFetch(url, {
    timeout: CONFIG.API.TIMEOUT_MS,
    retries: CONFIG.API.RETRY_ATTEMPTS,
    retryDelay: CONFIG.API.RETRY_DELAY_MS
  });

  let parsed: unknown;
  try {
    parsed = await response.json();
  } catch (error) {
    throw new AppError(ErrorTypes.PARSE, 'Games dataset is not valid JSON', null, { url, cause: error });
  }

  const dataset = validateDataset(parsed);
  logger.info(`Loaded ${dataset.allGames.length} games from database`);
  return dataset;
}
