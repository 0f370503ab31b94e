import { existsSync, readFileSync } from 'fs';
import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  REDRAW_ELIGIBLE_SUITS,
  SUIT_ORDER,
  type CardRecord,
  type RedrawFlags,
  type Suit,
} from '../../../lib/contracts/game.js';
import type { Telemetry } from '../observability/telemetry.js';
import type { DrawSessionFields } from './draw-session.js';
import { emptySuitPools, resolveSuit, toSuit } from './suits.js';

/** On-disk shape of `session.json`. */
export type SessionSnapshotRecord = {
  drawn_indexes: number[];
  suit_to_indexes: Record<string, number[]>;
  suit_drawn_pos: Record<string, number>;
  redraw_used: Record<string, boolean>;
  current_step: number;
  cards_len: number;
};

export type SnapshotStore = {
  read: (cards: ReadonlyArray<CardRecord>) => DrawSessionFields | null;
  write: (fields: DrawSessionFields, catalogSize: number) => void;
  flush: () => Promise<void>;
};

export const toSnapshotRecord = (fields: DrawSessionFields, catalogSize: number): SessionSnapshotRecord => {
  const suitDrawnPos: Record<string, number> = {};
  for (const suit of SUIT_ORDER) {
    const position = fields.drawnPositions[suit];
    if (position !== undefined) {
      suitDrawnPos[suit] = position;
    }
  }
  return {
    drawn_indexes: [...fields.drawnIndexes],
    suit_to_indexes: Object.fromEntries(SUIT_ORDER.map((suit) => [suit, [...fields.pools[suit]]])),
    suit_drawn_pos: suitDrawnPos,
    redraw_used: { ...fields.redrawUsed },
    current_step: fields.currentStep,
    cards_len: catalogSize,
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const isIndexWithin = (value: unknown, size: number): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < size;

const readIndexList = (value: unknown, size: number): number[] | null => {
  if (!Array.isArray(value)) {
    return null;
  }
  const indexes: number[] = [];
  for (const entry of value) {
    if (!isIndexWithin(entry, size)) {
      return null;
    }
    indexes.push(entry);
  }
  return indexes;
};

const belongsTo = (cards: ReadonlyArray<CardRecord>, index: number, suit: Suit) => resolveSuit(cards[index]) === suit;

// Every card sits in at most one place, in the pool of its own suit, and each drawn suit
// owns a distinct position that the pointer has already passed.
const isConsistent = (fields: DrawSessionFields, cards: ReadonlyArray<CardRecord>): boolean => {
  const placed = new Set<number>();
  const place = (index: number) => {
    if (placed.has(index)) {
      return false;
    }
    placed.add(index);
    return true;
  };

  if (!fields.drawnIndexes.every(place)) {
    return false;
  }
  for (const suit of SUIT_ORDER) {
    if (!fields.pools[suit].every((index) => place(index) && belongsTo(cards, index, suit))) {
      return false;
    }
  }

  const positions = new Set<number>();
  for (const suit of SUIT_ORDER) {
    const position = fields.drawnPositions[suit];
    if (position === undefined) {
      continue;
    }
    if (positions.has(position) || !belongsTo(cards, fields.drawnIndexes[position], suit)) {
      return false;
    }
    if (fields.currentStep <= SUIT_ORDER.indexOf(suit)) {
      return false;
    }
    positions.add(position);
  }
  return true;
};

/**
 * Validates a parsed snapshot against the live catalog. Any mismatch rejects the whole
 * record; there is no partial restore. Unknown suit keys are dropped.
 */
export const parseSnapshotRecord = (
  value: unknown,
  cards: ReadonlyArray<CardRecord>
): DrawSessionFields | null => {
  const catalogSize = cards.length;
  if (!isRecord(value) || value.cards_len !== catalogSize) {
    return null;
  }

  const drawnIndexes = readIndexList(value.drawn_indexes ?? [], catalogSize);
  if (!drawnIndexes) {
    return null;
  }

  const rawPools = value.suit_to_indexes ?? {};
  const rawPositions = value.suit_drawn_pos ?? {};
  const rawRedrawUsed = value.redraw_used ?? {};
  if (!isRecord(rawPools) || !isRecord(rawPositions) || !isRecord(rawRedrawUsed)) {
    return null;
  }

  const pools = emptySuitPools();
  for (const [key, entry] of Object.entries(rawPools)) {
    const suit = toSuit(key);
    if (!suit) {
      continue;
    }
    const indexes = readIndexList(entry, catalogSize);
    if (!indexes) {
      return null;
    }
    pools[suit] = indexes;
  }

  const drawnPositions: Partial<Record<Suit, number>> = {};
  for (const [key, entry] of Object.entries(rawPositions)) {
    const suit = toSuit(key);
    if (!suit) {
      continue;
    }
    if (!isIndexWithin(entry, drawnIndexes.length)) {
      return null;
    }
    drawnPositions[suit] = entry;
  }

  const redrawUsed: RedrawFlags = { WORKSHOP: false, TOOL: false, PROTOCOL: false };
  for (const suit of REDRAW_ELIGIBLE_SUITS) {
    const entry = rawRedrawUsed[suit];
    if (entry === undefined) {
      continue;
    }
    if (typeof entry !== 'boolean') {
      return null;
    }
    redrawUsed[suit] = entry;
  }

  const currentStep = value.current_step ?? 0;
  if (typeof currentStep !== 'number' || !Number.isInteger(currentStep) || currentStep < 0 || currentStep > SUIT_ORDER.length) {
    return null;
  }

  const fields: DrawSessionFields = {
    drawnIndexes,
    pools,
    drawnPositions,
    redrawUsed,
    currentStep,
  };
  return isConsistent(fields, cards) ? fields : null;
};

const writeAtomically = async (path: string, contents: string) => {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.tmp`;
  await writeFile(tempPath, contents, 'utf-8');
  await rename(tempPath, path);
};

export const createSnapshotStore = (path: string, telemetry?: Telemetry): SnapshotStore => {
  let pending: Promise<void> = Promise.resolve();

  const read: SnapshotStore['read'] = (cards) => {
    if (!existsSync(path)) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      const fields = parseSnapshotRecord(parsed, cards);
      if (!fields) {
        telemetry?.recordAction('SNAPSHOT_DISCARDED', { path, catalogSize: cards.length });
      }
      return fields;
    } catch (error) {
      telemetry?.recordFailure('SNAPSHOT_READ', error, { path });
      return null;
    }
  };

  // Serialized now, written later: writes land in call order and never reject.
  const write: SnapshotStore['write'] = (fields, catalogSize) => {
    const contents = JSON.stringify(toSnapshotRecord(fields, catalogSize));
    pending = pending
      .then(() => writeAtomically(path, contents))
      .catch((error: unknown) => {
        telemetry?.recordFailure('SNAPSHOT_WRITE', error, { path });
      });
  };

  const flush: SnapshotStore['flush'] = () => pending;

  return {
    read,
    write,
    flush,
  };
};
