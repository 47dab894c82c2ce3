import type { SignalBundle } from '../pipeline/types.js';

/**
 * Narrow contract with the browser automation endpoint. Implementations own
 * exactly one session at a time and are driven by a single caller.
 */
abstract class RenderClient {
  /** Ordered signal names every successful render reports. */
  abstract readonly signalNames: readonly string[];

  /**
   * Loads `url` and extracts its signals. Rejects with `RenderFailure`.
   */
  abstract render(url: string, timeoutSeconds: number): Promise<SignalBundle>;

  /**
   * Tears down the current session, if any, and establishes a new one.
   * Rejects with a `session-error` RenderFailure when no session can start.
   */
  abstract refreshSession(): Promise<void>;

  abstract close(): Promise<void>;
}

export { RenderClient };
