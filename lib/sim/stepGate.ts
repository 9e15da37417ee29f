// lib/sim/stepGate.ts
// Single-step controller. The loop calls wait() after every agent step; the
// debugger front end releases it with advance() or jumpToNextProduction().

export class StepGate {
  private waiter: (() => void) | null = null;
  // advance() calls received while nobody was waiting
  private credits = 0;
  private jumping = false;
  private released = false;

  get waiting(): boolean {
    return this.waiter !== null;
  }

  advance(): void {
    if (!this.wake()) this.credits += 1;
  }

  /** Run on until a step fires a production, then pause after that step. */
  jumpToNextProduction(): void {
    this.jumping = true;
    this.wake();
  }

  /** Lets every current and future wait() through (used when stopping). */
  release(): void {
    this.released = true;
    this.wake();
  }

  reopen(): void {
    this.released = false;
    this.credits = 0;
    this.jumping = false;
  }

  async wait(step: { firedProduction: string | null }): Promise<void> {
    if (this.released) return;
    if (this.jumping) {
      if (step.firedProduction === null) return;
      this.jumping = false;
    }
    if (this.credits > 0) {
      this.credits -= 1;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiter = resolve;
    });
  }

  private wake(): boolean {
    const w = this.waiter;
    if (!w) return false;
    this.waiter = null;
    w();
    return true;
  }
}
