import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DEFAULT_SIMULATION_OPTIONS, normalizeSimulationOptions } from '@/lib/sim/options';
import { DEFAULT_KEY_MAP } from '@/lib/mediator/symbols';

describe('normalizeSimulationOptions', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the defaults for missing or non-object input', () => {
    expect(normalizeSimulationOptions(undefined)).toEqual(DEFAULT_SIMULATION_OPTIONS);
    expect(normalizeSimulationOptions('fast')).toEqual(DEFAULT_SIMULATION_OPTIONS);
    expect(normalizeSimulationOptions([1, 2])).toEqual(DEFAULT_SIMULATION_OPTIONS);
  });

  it('keeps valid values', () => {
    const opts = normalizeSimulationOptions({
      speedFactor: 2,
      mode: 'single-step',
      stepTimeoutMs: 250,
      maxSteps: 10,
      maxTime: 4.5,
      maxRecords: null,
      keyMap: { k: { dRow: 1, dCol: 0 } },
    });

    expect(opts).toEqual({
      speedFactor: 2,
      mode: 'single-step',
      stepTimeoutMs: 250,
      maxSteps: 10,
      maxTime: 4.5,
      maxRecords: null,
      keyMap: { k: { dRow: 1, dCol: 0 } },
    });
  });

  it('falls back field by field and warns', () => {
    const opts = normalizeSimulationOptions({
      speedFactor: -1,
      mode: 'turbo',
      maxSteps: 2.5,
      stepTimeoutMs: 'soon',
      keyMap: { bad: { dRow: 0.5, dCol: 0 } },
    });

    expect(opts.speedFactor).toBe('unthrottled');
    expect(opts.mode).toBe('continuous');
    expect(opts.maxSteps).toBeNull();
    expect(opts.stepTimeoutMs).toBeNull();
    expect(opts.keyMap).toBe(DEFAULT_KEY_MAP);
    expect(console.warn).toHaveBeenCalledWith('[config]', 'ignoring speedFactor=-1; using unthrottled');
  });
});
