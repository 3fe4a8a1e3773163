/**
 * Domain Throttle
 * Spaces request starts to one domain by a jittered minimum delay
 */

import { sleep } from './retry';

export class DomainThrottle {
  private nextSlotAt = 0;

  constructor(
    private readonly delayMs: number,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * Resolve when the caller may start its request.
   * The gap after each slot is 0.5x - 1.5x the base delay.
   */
  async acquire(): Promise<void> {
    if (this.delayMs <= 0) {
      return;
    }

    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.delayMs * (0.5 + this.random());

    if (slot > now) {
      await sleep(slot - now);
    }
  }
}
