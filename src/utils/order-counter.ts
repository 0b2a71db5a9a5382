/**
 * Order Counter
 * Monotonic sequence used to break priority ties between transforms
 */

export class OrderCounter {
  private last: number;

  constructor(start: number = 0) {
    this.last = start;
  }

  /**
   * Next sequence number. Never returns the same value twice.
   */
  next(): number {
    this.last += 1;
    return this.last;
  }

  get current(): number {
    return this.last;
  }
}

/**
 * Counter shared by every run in this process, unless a caller passes its own
 */
export const processCounter = new OrderCounter();
