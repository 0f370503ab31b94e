import type { RedrawRequest } from '../../../lib/contracts/socket.js';
import type { SessionTelemetryState } from '../observability/telemetry.js';
import { loadCatalog } from './catalog.js';
import { createDrawSession, type DrawSession } from './draw-session.js';
import { createSnapshotStore } from './snapshot-store.js';
import { countBySuit } from './suits.js';
import type { BootstrapSummary, SessionEngine, SessionEngineOptions } from './types.js';

const readString = (payload: object, key: keyof RedrawRequest): string | undefined => {
  const value: unknown = Reflect.get(payload, key);
  return typeof value === 'string' ? value : undefined;
};

/**
 * Reads the requested suit out of a `redraw` payload. Returns `null` for payloads that are
 * not plain objects; those are dropped without a broadcast.
 */
export const parseRedrawCategory = (payload: unknown): string | null => {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) {
    return null;
  }
  const request: RedrawRequest = {
    category: readString(payload, 'category'),
    suit: readString(payload, 'suit'),
  };
  return request.category ?? request.suit ?? '';
};

export const createSessionEngine = (options: SessionEngineOptions): SessionEngine => {
  const { config, broadcaster, telemetry } = options;
  const store =
    options.store !== undefined
      ? options.store
      : config.persistenceEnabled
        ? createSnapshotStore(config.sessionPath, telemetry)
        : null;
  const readCatalog = options.loadCatalog ?? (() => loadCatalog(config, telemetry));
  const sessionOptions = { redrawEnabled: config.redrawEnabled, randomIndex: options.randomIndex };

  let session: DrawSession = createDrawSession([], sessionOptions);
  let initialized = false;

  const summarize = (): SessionTelemetryState => ({
    drawnCount: session.drawnCount(),
    currentStep: session.currentStep(),
    remaining: session.remaining(),
    total: session.total(),
  });

  const bootstrap = (): BootstrapSummary => {
    const catalog = readCatalog();
    const next = createDrawSession(catalog.cards, sessionOptions);
    const restoredFields = store?.read(catalog.cards) ?? null;
    if (restoredFields) {
      next.restore(restoredFields);
    }
    session = next;
    initialized = true;

    const summary: BootstrapSummary = {
      cardCount: catalog.cards.length,
      source: catalog.source,
      restored: restoredFields !== null,
      available: countBySuit(session.exportFields().pools),
    };
    telemetry?.recordAction('BOOTSTRAP', summary);
    return summary;
  };

  // An empty catalog is retried on every event so cards added later are picked up.
  const ensureBootstrap = (): boolean => {
    if (initialized && session.cards.length > 0) {
      return false;
    }
    bootstrap();
    return true;
  };

  const persist = () => {
    store?.write(session.exportFields(), session.cards.length);
  };

  const broadcast = () => {
    broadcaster.broadcast(session.project());
  };

  const refresh: SessionEngine['refresh'] = () => {
    const previousCount = session.cards.length;
    if (ensureBootstrap() && session.cards.length !== previousCount) {
      broadcast();
    }
  };

  // Everyone already connected hears about the newcomer's state too; the caller sends it to
  // the newcomer directly.
  const commandConnect: SessionEngine['commandConnect'] = (viewerId) => {
    ensureBootstrap();
    telemetry?.recordAction('VIEWER_CONNECT', { viewerId });
    broadcast();
    return session.project();
  };

  const commandDraw: SessionEngine['commandDraw'] = () => {
    ensureBootstrap();
    const outcome = session.draw();
    telemetry?.recordTransition('DRAW', summarize(), { ...outcome });
    broadcast();
    if (outcome.kind === 'drawn') {
      persist();
    }
  };

  const commandRedraw: SessionEngine['commandRedraw'] = (payload) => {
    ensureBootstrap();
    const category = parseRedrawCategory(payload);
    if (category === null) {
      telemetry?.recordAction('REDRAW_REJECTED', { reason: 'INVALID_PAYLOAD' });
      return;
    }
    const outcome = session.redraw(category);
    telemetry?.recordTransition('REDRAW', summarize(), { category, ...outcome });
    broadcast();
    if (outcome.kind === 'redrawn') {
      persist();
    }
  };

  const commandReset: SessionEngine['commandReset'] = () => {
    ensureBootstrap();
    session.reset();
    telemetry?.recordTransition('RESET', summarize());
    broadcast();
    persist();
  };

  return {
    bootstrap,
    refresh,
    commandConnect,
    commandDraw,
    commandRedraw,
    commandReset,
    getState: () => session.project(),
    getSession: () => session,
    drawnCount: () => session.drawnCount(),
    flush: () => store?.flush() ?? Promise.resolve(),
  };
};
