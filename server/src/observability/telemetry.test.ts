import { afterEach, describe, expect, it, vi } from 'vitest';
import { createTelemetry } from './telemetry.js';

const ORIGINAL_ENV = { ...process.env };

afterEach(() => {
  process.env = { ...ORIGINAL_ENV };
  vi.restoreAllMocks();
});

describe('telemetry', () => {
  it('emits state transition logs with session counters', () => {
    process.env.SUIT_DRAW_TELEMETRY = '1';
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const telemetry = createTelemetry();

    telemetry.recordTransition(
      'DRAW',
      { drawnCount: 2, currentStep: 3, remaining: 2, total: 4 },
      { suit: 'TOOL', outcome: 'drawn' }
    );

    expect(spy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
      timestamp: expect.any(String),
      type: 'state_transition',
      action: 'DRAW',
      drawn: 2,
      step: 3,
      remaining: 2,
      total: 4,
      details: { suit: 'TOOL', outcome: 'drawn' },
    });
  });

  it('routes failures to stderr with the error message', () => {
    process.env.SUIT_DRAW_TELEMETRY = 'true';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const telemetry = createTelemetry();

    telemetry.recordFailure('SNAPSHOT_WRITE', new Error('disk full'), { path: '/tmp/session.json' });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
      timestamp: expect.any(String),
      type: 'failure',
      action: 'SNAPSHOT_WRITE',
      error: 'disk full',
      details: { path: '/tmp/session.json' },
    });
  });

  it('does not emit logs when telemetry is disabled', () => {
    process.env.SUIT_DRAW_TELEMETRY = '0';
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const telemetry = createTelemetry();

    telemetry.recordAction('VIEWER_CONNECT', { socketId: 'abc' });
    telemetry.recordFailure('CATALOG_LOAD', 'missing');
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('is off under NODE_ENV=test unless forced on', () => {
    delete process.env.SUIT_DRAW_TELEMETRY;
    process.env.NODE_ENV = 'test';
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    createTelemetry().recordAction('RESET');
    expect(spy).not.toHaveBeenCalled();
  });
});
