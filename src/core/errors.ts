/**
 * Error classes raised by the mocking engine.
 *
 * Every fatal condition is first handed to the active fail handler
 * (see core/mock/fail-handler.ts). These classes are what the default
 * handler throws, so tests can tell misuse apart from failed assertions.
 */

export class MockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MockError';
  }
}

/** Programmer misuse detected while arranging or verifying (mixed matchers, bad trigger, ...) */
export class MockUsageError extends MockError {
  constructor(message: string) {
    super(message);
    this.name = 'MockUsageError';
  }
}

/** A stubbed return value that does not fit the declared return type */
export class ReturnTypeError extends MockError {
  constructor(message: string) {
    super(message);
    this.name = 'ReturnTypeError';
  }
}

/** Count, order or timeout expectation not met */
export class VerificationError extends MockError {
  constructor(message: string) {
    super(message);
    this.name = 'VerificationError';
  }
}
