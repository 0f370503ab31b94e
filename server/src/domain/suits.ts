import { randomInt } from 'crypto';
import {
  REDRAW_ELIGIBLE_SUITS,
  SUIT_ORDER,
  type CardRecord,
  type RedrawSuit,
  type Suit,
} from '../../../lib/contracts/game.js';

export const UNASSIGNED = 'UNASSIGNED';

export type SuitAssignment = Suit | typeof UNASSIGNED;

export type SuitPools = Record<Suit, number[]>;

/** Returns an integer in `[0, bound)`. */
export type RandomIndex = (bound: number) => number;

export const cryptoRandomIndex: RandomIndex = (bound) => randomInt(bound);

const SUIT_LOOKUP: ReadonlyMap<string, Suit> = new Map(SUIT_ORDER.map((suit) => [suit, suit]));
const REDRAW_LOOKUP: ReadonlyMap<string, RedrawSuit> = new Map(REDRAW_ELIGIBLE_SUITS.map((suit) => [suit, suit]));

export const normalizeLabel = (label: string | undefined): string => (label ?? '').trim().toUpperCase();

export const toSuit = (label: string | undefined): Suit | null => SUIT_LOOKUP.get(normalizeLabel(label)) ?? null;

export const toRedrawSuit = (label: string | undefined): RedrawSuit | null =>
  REDRAW_LOOKUP.get(normalizeLabel(label)) ?? null;

export const resolveSuit = (card: Pick<CardRecord, 'Category1' | 'Category2'>): SuitAssignment =>
  toSuit(card.Category1) ?? toSuit(card.Category2) ?? UNASSIGNED;

export const emptySuitPools = (): SuitPools => ({
  TOUCHSTONE: [],
  WORKSHOP: [],
  TOOL: [],
  PROTOCOL: [],
  PLATFORM: [],
});

export const shuffleInPlace = <T>(items: T[], randomIndex: RandomIndex = cryptoRandomIndex): T[] => {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = randomIndex(i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
};

/**
 * Buckets catalog indexes by resolved suit and shuffles every bucket independently.
 * Cards whose labels resolve to no suit are left out of every pool.
 */
export const buildSuitPools = (
  catalog: ReadonlyArray<CardRecord>,
  randomIndex: RandomIndex = cryptoRandomIndex
): SuitPools => {
  const pools = emptySuitPools();
  catalog.forEach((card, index) => {
    const suit = resolveSuit(card);
    if (suit !== UNASSIGNED) {
      pools[suit].push(index);
    }
  });
  for (const suit of SUIT_ORDER) {
    shuffleInPlace(pools[suit], randomIndex);
  }
  return pools;
};

export const countBySuit = (pools: SuitPools): Record<Suit, number> => ({
  TOUCHSTONE: pools.TOUCHSTONE.length,
  WORKSHOP: pools.WORKSHOP.length,
  TOOL: pools.TOOL.length,
  PROTOCOL: pools.PROTOCOL.length,
  PLATFORM: pools.PLATFORM.length,
});
