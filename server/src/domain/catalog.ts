import { existsSync, readFileSync } from 'fs';
import type { CardField, CardRecord } from '../../../lib/contracts/game.js';
import type { Telemetry } from '../observability/telemetry.js';
import { parseTsvRecords } from './tsv.js';

export type CatalogPaths = {
  cardsJsonPath: string;
  cardsTsvPath: string;
};

export type CatalogSource = 'json' | 'tsv' | 'none';

export type LoadedCatalog = {
  cards: CardRecord[];
  source: CatalogSource;
};

const readField = (entry: unknown, field: CardField): string => {
  if (!entry || typeof entry !== 'object') {
    return '';
  }
  const value: unknown = Reflect.get(entry, field);
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
};

/**
 * Coerces one catalog entry into a card record. Anything that is not an object becomes a
 * blank card so catalog indexes stay aligned with the source file.
 */
export const toCardRecord = (value: unknown): CardRecord => ({
  Category1: readField(value, 'Category1'),
  Category2: readField(value, 'Category2'),
  Name: readField(value, 'Name'),
  Text: readField(value, 'Text'),
  ShortText: readField(value, 'ShortText'),
  URL: readField(value, 'URL'),
});

export const parseCatalogJson = (raw: string): CardRecord[] => {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.map((entry) => toCardRecord(entry));
};

export const parseCatalogTsv = (raw: string): CardRecord[] => parseTsvRecords(raw).map((row) => toCardRecord(row));

export const readCatalogTsv = (path: string): CardRecord[] => parseCatalogTsv(readFileSync(path, 'utf-8'));

/**
 * Loads the card catalog. `cards.json` is authoritative when it exists; `cards.tsv` is the
 * fallback. A missing or unreadable source yields an empty catalog rather than an error.
 */
export const loadCatalog = (paths: CatalogPaths, telemetry?: Telemetry): LoadedCatalog => {
  try {
    if (existsSync(paths.cardsJsonPath)) {
      return { cards: parseCatalogJson(readFileSync(paths.cardsJsonPath, 'utf-8')), source: 'json' };
    }
    if (existsSync(paths.cardsTsvPath)) {
      return { cards: readCatalogTsv(paths.cardsTsvPath), source: 'tsv' };
    }
    telemetry?.recordAction('CATALOG_MISSING', {
      cardsJsonPath: paths.cardsJsonPath,
      cardsTsvPath: paths.cardsTsvPath,
    });
  } catch (error) {
    telemetry?.recordFailure('CATALOG_LOAD', error, { ...paths });
  }
  return { cards: [], source: 'none' };
};
