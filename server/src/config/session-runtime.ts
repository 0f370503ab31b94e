import { isAbsolute, resolve } from 'path';
import { findProjectRoot } from './project-root.js';

const CARDS_JSON_FILE = 'cards.json';
const CARDS_TSV_FILE = 'cards.tsv';
const SESSION_FILE = 'session.json';
const INSTRUCTIONS_FILE = 'instructions.docx';

const parseFlag = (value: string | undefined, fallback: boolean, label: string): boolean => {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return fallback;
  }
  if (normalized === '1' || normalized === 'true') {
    return true;
  }
  if (normalized === '0' || normalized === 'false') {
    return false;
  }
  throw new Error(`Invalid ${label} value "${value}". Expected one of 1, 0, true, false.`);
};

const resolveDir = (value: string | undefined, fallback: () => string): string => {
  const configured = value?.trim();
  if (!configured) {
    return fallback();
  }
  return isAbsolute(configured) ? configured : resolve(process.cwd(), configured);
};

export type SessionRuntimeConfig = {
  materialsDir: string;
  publicDir: string;
  cardsJsonPath: string;
  cardsTsvPath: string;
  sessionPath: string;
  instructionsPath: string;
  redrawEnabled: boolean;
  persistenceEnabled: boolean;
};

export const readSessionRuntimeConfig = (): SessionRuntimeConfig => {
  const materialsDir = resolveDir(process.env.SUIT_DRAW_MATERIALS_DIR, () =>
    resolve(findProjectRoot(), 'materials')
  );
  const publicDir = resolveDir(process.env.SUIT_DRAW_PUBLIC_DIR, () => resolve(findProjectRoot(), 'public'));

  return {
    materialsDir,
    publicDir,
    cardsJsonPath: resolve(materialsDir, CARDS_JSON_FILE),
    cardsTsvPath: resolve(materialsDir, CARDS_TSV_FILE),
    sessionPath: resolve(materialsDir, SESSION_FILE),
    instructionsPath: resolve(materialsDir, INSTRUCTIONS_FILE),
    redrawEnabled: parseFlag(process.env.SUIT_DRAW_REDRAW, true, 'SUIT_DRAW_REDRAW'),
    persistenceEnabled: parseFlag(process.env.SUIT_DRAW_PERSIST, true, 'SUIT_DRAW_PERSIST'),
  };
};
