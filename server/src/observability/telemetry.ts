export type SessionTelemetryState = {
  drawnCount: number;
  currentStep: number;
  remaining: number;
  total: number;
};

export type Telemetry = {
  recordAction: (action: string, details?: Record<string, unknown>) => void;
  recordTransition: (
    action: string,
    session: SessionTelemetryState,
    details?: Record<string, unknown>
  ) => void;
  recordFailure: (action: string, error: unknown, details?: Record<string, unknown>) => void;
};

const isEnabledByDefault = () => process.env.NODE_ENV !== 'test';

const isTelemetryEnabled = () => {
  const value = process.env.SUIT_DRAW_TELEMETRY?.trim();
  if (value === '0' || value === 'false') {
    return false;
  }
  if (value === '1' || value === 'true') {
    return true;
  }
  return isEnabledByDefault();
};

const nowIso = () => new Date().toISOString();

const emit = (payload: Record<string, unknown>) => {
  console.log(JSON.stringify({ timestamp: nowIso(), ...payload }));
};

const emitError = (payload: Record<string, unknown>) => {
  console.error(JSON.stringify({ timestamp: nowIso(), ...payload }));
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createTelemetry = (): Telemetry => {
  const enabled = isTelemetryEnabled();

  const recordAction: Telemetry['recordAction'] = (action, details) => {
    if (!enabled) {
      return;
    }
    emit({
      type: 'action',
      action,
      ...(details ? { details } : {}),
    });
  };

  const recordTransition: Telemetry['recordTransition'] = (action, session, details) => {
    if (!enabled) {
      return;
    }
    emit({
      type: 'state_transition',
      action,
      drawn: session.drawnCount,
      step: session.currentStep,
      remaining: session.remaining,
      total: session.total,
      ...(details ? { details } : {}),
    });
  };

  const recordFailure: Telemetry['recordFailure'] = (action, error, details) => {
    if (!enabled) {
      return;
    }
    emitError({
      type: 'failure',
      action,
      error: describeError(error),
      ...(details ? { details } : {}),
    });
  };

  return {
    recordAction,
    recordTransition,
    recordFailure,
  };
};
