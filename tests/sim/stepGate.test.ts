import { describe, expect, it } from 'vitest';

import { StepGate } from '@/lib/sim/stepGate';

const settled = async (p: Promise<void>) => {
  let done = false;
  void p.then(() => {
    done = true;
  });
  await new Promise((r) => setTimeout(r, 0));
  return done;
};

describe('StepGate', () => {
  it('holds until advance()', async () => {
    const gate = new StepGate();
    const p = gate.wait({ firedProduction: null });

    expect(gate.waiting).toBe(true);
    expect(await settled(p)).toBe(false);
    gate.advance();
    expect(await settled(p)).toBe(true);
    expect(gate.waiting).toBe(false);
  });

  it('keeps an advance() that arrives before the wait', async () => {
    const gate = new StepGate();
    gate.advance();
    expect(await settled(gate.wait({ firedProduction: null }))).toBe(true);
    expect(await settled(gate.wait({ firedProduction: null }))).toBe(false);
  });

  it('jumps over steps without a production and stops after the next one', async () => {
    const gate = new StepGate();
    gate.jumpToNextProduction();

    expect(await settled(gate.wait({ firedProduction: null }))).toBe(true);
    expect(await settled(gate.wait({ firedProduction: 'retrieve' }))).toBe(false);
  });

  it('lets everything through once released', async () => {
    const gate = new StepGate();
    const p = gate.wait({ firedProduction: null });
    gate.release();

    expect(await settled(p)).toBe(true);
    expect(await settled(gate.wait({ firedProduction: 'x' }))).toBe(true);
    gate.reopen();
    expect(await settled(gate.wait({ firedProduction: 'x' }))).toBe(false);
  });
});
