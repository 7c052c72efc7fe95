/**
 * Process-wide sequence numbers for recorded calls.
 *
 * Shared by every mock so that ordering across independent mocks is
 * well defined. InvocationCounter is a singleton. Use
 * InvocationCounter.getInstance() or nextSequenceNumber().
 */

export class InvocationCounter {
  private static instance: InvocationCounter | null = null;

  private current = 0;

  private constructor() {}

  static getInstance(): InvocationCounter {
    if (!InvocationCounter.instance) {
      InvocationCounter.instance = new InvocationCounter();
    }
    return InvocationCounter.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    InvocationCounter.instance = null;
  }

  next(): number {
    this.current += 1;
    return this.current;
  }
}

export function nextSequenceNumber(): number {
  return InvocationCounter.getInstance().next();
}
