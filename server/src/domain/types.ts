import type { SessionState } from '../../../lib/contracts/game.js';
import type { SessionRuntimeConfig } from '../config/session-runtime.js';
import type { Telemetry } from '../observability/telemetry.js';
import type { LoadedCatalog } from './catalog.js';
import type { DrawSession } from './draw-session.js';
import type { SnapshotStore } from './snapshot-store.js';
import type { RandomIndex } from './suits.js';

export type StateBroadcaster = {
  broadcast: (state: SessionState) => void;
};

export type SessionEngineOptions = {
  config: Pick<
    SessionRuntimeConfig,
    'cardsJsonPath' | 'cardsTsvPath' | 'sessionPath' | 'redrawEnabled' | 'persistenceEnabled'
  >;
  broadcaster: StateBroadcaster;
  telemetry?: Telemetry;
  randomIndex?: RandomIndex;
  loadCatalog?: () => LoadedCatalog;
  store?: SnapshotStore | null;
};

export type BootstrapSummary = {
  cardCount: number;
  source: LoadedCatalog['source'];
  restored: boolean;
  available: Record<string, number>;
};

export type SessionEngine = {
  bootstrap: () => BootstrapSummary;
  /** Retries an empty catalog and broadcasts when that brings cards in. */
  refresh: () => void;
  commandConnect: (viewerId: string) => SessionState;
  commandDraw: () => void;
  commandRedraw: (payload: unknown) => void;
  commandReset: () => void;
  getState: () => SessionState;
  getSession: () => DrawSession;
  drawnCount: () => number;
  flush: () => Promise<void>;
};
