/**
 * An abort signal that fires when no progress was reported for `timeoutMs`,
 * or when the parent signal aborts. Call `refresh()` on progress and
 * `clear()` once the guarded work is finished.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timeoutMs: number;
  private readonly parent: AbortSignal | undefined;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private _timedOut = false;

  private readonly onParentAbort = (): void => {
    this.stopTimer();
    this.controller.abort(this.parent?.reason);
  };

  constructor(timeoutMs: number, parent?: AbortSignal) {
    this.timeoutMs = timeoutMs;
    this.parent = parent;

    if (parent?.aborted) {
      this.controller.abort(parent.reason);
      return;
    }
    parent?.addEventListener('abort', this.onParentAbort, { once: true });
    this.startTimer();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this._timedOut;
  }

  refresh(): void {
    if (this.controller.signal.aborted) return;
    this.stopTimer();
    this.startTimer();
  }

  clear(): void {
    this.stopTimer();
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private startTimer(): void {
    this.timer = setTimeout(() => {
      this._timedOut = true;
      this.controller.abort(new Error(`No response within ${this.timeoutMs} ms`));
    }, this.timeoutMs);
  }

  private stopTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
