/**
 * Pluggable failure reporting.
 *
 * The engine decides what a failure says, never how it is shown. A
 * handler registered here (or per mock) receives the message and the
 * number of engine stack frames above the caller. Without a handler the
 * typed error is thrown.
 */

export type FailHandler = (message: string, callerSkip?: number) => void;

let globalFailHandler: FailHandler | null = null;

/**
 * Register a process-wide fail handler, e.g. `(message) => expect.fail(message)`.
 * Pass null to restore the default.
 */
export function registerMockFailHandler(handler: FailHandler | null): void {
  globalFailHandler = handler;
}

export function getGlobalFailHandler(): FailHandler | null {
  return globalFailHandler;
}

/**
 * Report a usage error that is not tied to one mock, e.g. a when()
 * without a preceding mock call. Throws after the handler returns.
 */
export function failWithoutMock(error: Error): never {
  globalFailHandler?.(error.message, 2);
  throw error;
}
