import {
  REDRAW_ELIGIBLE_SUITS,
  SUIT_ORDER,
  type CardRecord,
  type RedrawFlags,
  type RedrawSuit,
  type SessionState,
  type Suit,
} from '../../../lib/contracts/game.js';
import {
  buildSuitPools,
  cryptoRandomIndex,
  emptySuitPools,
  toRedrawSuit,
  type RandomIndex,
  type SuitPools,
} from './suits.js';

/** The mutable fields of a session; also the unit that is snapshotted and restored. */
export type DrawSessionFields = {
  drawnIndexes: number[];
  pools: SuitPools;
  drawnPositions: Partial<Record<Suit, number>>;
  redrawUsed: RedrawFlags;
  currentStep: number;
};

export type DrawOutcome =
  | { kind: 'drawn'; suit: Suit; index: number; position: number }
  | { kind: 'exhausted' };

export type RedrawRejection = 'DISABLED' | 'NOT_ELIGIBLE' | 'ALREADY_USED' | 'NOT_DRAWN' | 'POOL_EXHAUSTED';

export type RedrawOutcome =
  | { kind: 'redrawn'; suit: RedrawSuit; position: number; replacedIndex: number; index: number }
  | { kind: 'ignored'; reason: RedrawRejection };

export type DrawSession = {
  readonly cards: ReadonlyArray<CardRecord>;
  readonly redrawEnabled: boolean;
  build: () => void;
  draw: () => DrawOutcome;
  redraw: (category: string) => RedrawOutcome;
  reset: () => void;
  project: () => SessionState;
  remaining: () => number;
  total: () => number;
  canRedraw: (suit: RedrawSuit) => boolean;
  drawnCount: () => number;
  currentStep: () => number;
  currentSuit: () => Suit | null;
  exportFields: () => DrawSessionFields;
  restore: (fields: DrawSessionFields) => void;
};

export type DrawSessionOptions = {
  redrawEnabled?: boolean;
  randomIndex?: RandomIndex;
};

const unusedRedraws = (): RedrawFlags => ({ WORKSHOP: false, TOOL: false, PROTOCOL: false });

const copyPools = (pools: SuitPools): SuitPools => {
  const copy = emptySuitPools();
  for (const suit of SUIT_ORDER) {
    copy[suit] = [...pools[suit]];
  }
  return copy;
};

const copyFields = (fields: DrawSessionFields): DrawSessionFields => ({
  drawnIndexes: [...fields.drawnIndexes],
  pools: copyPools(fields.pools),
  drawnPositions: { ...fields.drawnPositions },
  redrawUsed: { ...fields.redrawUsed },
  currentStep: fields.currentStep,
});

/**
 * Single shared draw session over a fixed catalog.
 *
 * Every operation is synchronous and runs to completion before the caller regains control,
 * so on the Node.js event loop no two draws, redraws or resets can interleave.
 * Pools are drained from the end: the last element of a shuffled pool is drawn first.
 */
export const createDrawSession = (
  cards: ReadonlyArray<CardRecord>,
  options: DrawSessionOptions = {}
): DrawSession => {
  const redrawEnabled = options.redrawEnabled ?? true;
  const randomIndex = options.randomIndex ?? cryptoRandomIndex;

  let state: DrawSessionFields = {
    drawnIndexes: [],
    pools: emptySuitPools(),
    drawnPositions: {},
    redrawUsed: unusedRedraws(),
    currentStep: 0,
  };

  const build = () => {
    state = {
      drawnIndexes: [],
      pools: buildSuitPools(cards, randomIndex),
      drawnPositions: {},
      redrawUsed: unusedRedraws(),
      currentStep: 0,
    };
  };

  const nextDrawableStep = (): number | null => {
    for (let step = state.currentStep; step < SUIT_ORDER.length; step += 1) {
      if (state.pools[SUIT_ORDER[step]].length > 0) {
        return step;
      }
    }
    return null;
  };

  const currentSuit = (): Suit | null => {
    const step = nextDrawableStep();
    return step === null ? null : SUIT_ORDER[step];
  };

  // Exhaustion leaves the pointer where it is, so a no-op draw changes nothing at all.
  const draw = (): DrawOutcome => {
    const step = nextDrawableStep();
    if (step === null) {
      return { kind: 'exhausted' };
    }

    const suit = SUIT_ORDER[step];
    const index = state.pools[suit].pop();
    if (index === undefined) {
      return { kind: 'exhausted' };
    }
    state.drawnIndexes.push(index);
    const position = state.drawnIndexes.length - 1;
    state.drawnPositions[suit] = position;
    state.currentStep = step + 1;
    return { kind: 'drawn', suit, index, position };
  };

  const rejectRedraw = (suit: RedrawSuit | null): RedrawRejection | null => {
    if (!redrawEnabled) {
      return 'DISABLED';
    }
    if (!suit) {
      return 'NOT_ELIGIBLE';
    }
    if (state.redrawUsed[suit]) {
      return 'ALREADY_USED';
    }
    if (state.drawnPositions[suit] === undefined) {
      return 'NOT_DRAWN';
    }
    if (state.pools[suit].length === 0) {
      return 'POOL_EXHAUSTED';
    }
    return null;
  };

  const canRedraw = (suit: RedrawSuit): boolean => rejectRedraw(suit) === null;

  const redraw = (category: string): RedrawOutcome => {
    const suit = toRedrawSuit(category);
    const rejection = rejectRedraw(suit);
    if (rejection || !suit) {
      return { kind: 'ignored', reason: rejection ?? 'NOT_ELIGIBLE' };
    }

    const position = state.drawnPositions[suit];
    if (position === undefined) {
      return { kind: 'ignored', reason: 'NOT_DRAWN' };
    }
    const index = state.pools[suit].pop();
    if (index === undefined) {
      return { kind: 'ignored', reason: 'POOL_EXHAUSTED' };
    }
    const replacedIndex = state.drawnIndexes[position];
    state.drawnIndexes[position] = index;
    state.redrawUsed[suit] = true;
    return { kind: 'redrawn', suit, position, replacedIndex, index };
  };

  const remaining = (): number =>
    SUIT_ORDER.slice(state.currentStep).filter((suit) => state.pools[suit].length > 0).length;

  // A suit that has been drawn still counts once its pool runs dry.
  const total = (): number =>
    SUIT_ORDER.filter((suit) => state.pools[suit].length > 0 || state.drawnPositions[suit] !== undefined).length;

  const buildRedrawFlags = (predicate: (suit: RedrawSuit) => boolean): RedrawFlags => {
    const flags = unusedRedraws();
    for (const suit of REDRAW_ELIGIBLE_SUITS) {
      flags[suit] = predicate(suit);
    }
    return flags;
  };

  const project = (): SessionState => {
    const base: SessionState = {
      drawn: state.drawnIndexes.map((index) => cards[index]),
      remaining: remaining(),
      total: total(),
    };
    if (!redrawEnabled) {
      return base;
    }
    return {
      ...base,
      canRedraw: buildRedrawFlags(canRedraw),
      redrawUsed: buildRedrawFlags((suit) => state.redrawUsed[suit]),
    };
  };

  build();

  return {
    cards,
    redrawEnabled,
    build,
    draw,
    redraw,
    reset: build,
    project,
    remaining,
    total,
    canRedraw,
    drawnCount: () => state.drawnIndexes.length,
    currentStep: () => state.currentStep,
    currentSuit,
    exportFields: () => copyFields(state),
    restore: (fields) => {
      state = copyFields(fields);
    },
  };
};
