/**
 * Shared cursor for in-order verification.
 *
 * Pass the same context to several verifyWasCalledInOrder() calls, on
 * one mock or many; each successful verification moves the cursor to
 * the last call it matched.
 */

export class InOrderContext {
  private cursor = 0;
  private lastMethodName: string | undefined;
  private lastParamsDescription: string | undefined;

  /** Sequence number of the last call verified in order, 0 before the first */
  get position(): number {
    return this.cursor;
  }

  /** Description of the call the cursor points at, for ordering failures */
  describeLastVerified(): string | undefined {
    if (this.lastMethodName === undefined) {
      return undefined;
    }
    return `function call "${this.lastMethodName}" with params ${this.lastParamsDescription ?? '[]'}`;
  }

  advance(sequence: number, methodName: string, paramsDescription: string): void {
    this.cursor = sequence;
    this.lastMethodName = methodName;
    this.lastParamsDescription = paramsDescription;
  }
}
