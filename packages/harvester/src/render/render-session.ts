type RenderSessionState = 'active' | 'retired';

type RenderSessionInfo = {
  id: string;
  state: RenderSessionState;
  renderCount: number;
  consecutiveFailures: number;
};

/**
 * Bookkeeping for one remote WebDriver session. Retired sessions are never
 * used again; the client replaces them on the next render.
 */
export class RenderSession {
  readonly id: string;
  pageLoadTimeoutMs: number;
  private state: RenderSessionState;
  private renderCount: number;
  private consecutiveFailures: number;
  /** 0 keeps the session regardless of page failures. */
  private readonly maxConsecutiveFailures: number;

  constructor(id: string, pageLoadTimeoutMs: number, maxConsecutiveFailures = 0) {
    this.id = id;
    this.pageLoadTimeoutMs = pageLoadTimeoutMs;
    this.state = 'active';
    this.renderCount = 0;
    this.consecutiveFailures = 0;
    this.maxConsecutiveFailures = maxConsecutiveFailures;
  }

  markGood(): void {
    this.renderCount += 1;
    this.consecutiveFailures = 0;
  }

  /**
   * Records a page that failed on a working session. Returns true when this
   * failure retired the session.
   */
  markBad(): boolean {
    this.renderCount += 1;
    this.consecutiveFailures += 1;

    if (
      this.state === 'active' &&
      this.maxConsecutiveFailures > 0 &&
      this.consecutiveFailures >= this.maxConsecutiveFailures
    ) {
      this.retire();
      return true;
    }

    return false;
  }

  retire(): void {
    this.state = 'retired';
  }

  isUsable(): boolean {
    return this.state === 'active';
  }

  get info(): RenderSessionInfo {
    return {
      id: this.id,
      state: this.state,
      renderCount: this.renderCount,
      consecutiveFailures: this.consecutiveFailures,
    };
  }
}

export type { RenderSessionState, RenderSessionInfo };
