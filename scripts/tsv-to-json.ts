import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { pathToFileURL } from 'url';
import { readSessionRuntimeConfig } from '../server/src/config/session-runtime.js';
import { readCatalogTsv } from '../server/src/domain/catalog.js';

/** Rewrites the tab-delimited catalog as `cards.json`; returns the number of cards written. */
export const convertTsvToJson = (tsvPath: string, jsonPath: string): number => {
  if (!existsSync(tsvPath)) {
    throw new Error(`TSV not found: ${tsvPath}`);
  }
  const cards = readCatalogTsv(tsvPath);
  mkdirSync(dirname(jsonPath), { recursive: true });
  writeFileSync(jsonPath, `${JSON.stringify(cards, null, 2)}\n`, 'utf-8');
  return cards.length;
};

const isEntryPoint = () => Boolean(process.argv[1]) && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isEntryPoint()) {
  const { cardsTsvPath, cardsJsonPath } = readSessionRuntimeConfig();
  try {
    const count = convertTsvToJson(cardsTsvPath, cardsJsonPath);
    console.log(`Wrote ${count} cards to ${cardsJsonPath}`);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}
