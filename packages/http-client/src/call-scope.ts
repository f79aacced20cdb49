import type { CancellationReason } from '@switchyard/errors';

import type { CallOptions } from './types.js';

/**
 * Merges the caller's signal and deadline into a single signal for one call.
 * Must be disposed when the call ends.
 */
export class CallScope {
  private readonly controller = new AbortController();
  private readonly parent: AbortSignal | undefined;
  private timer: NodeJS.Timeout | undefined;
  private deadlineExceeded = false;

  private readonly onParentAbort = (): void => {
    this.controller.abort(this.parent?.reason);
  };

  constructor(options: CallOptions = {}) {
    this.parent = options.signal;

    if (this.parent?.aborted) {
      this.controller.abort(this.parent.reason);
    } else {
      this.parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }

    if (options.timeoutMs !== undefined && !this.controller.signal.aborted) {
      const timeoutMs = options.timeoutMs;
      this.timer = setTimeout(() => {
        this.deadlineExceeded = true;
        this.controller.abort(new Error(`deadline of ${timeoutMs}ms exceeded`));
      }, timeoutMs);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Why the call was aborted. A caller signal built with AbortSignal.timeout
   * counts as a deadline.
   */
  get reason(): CancellationReason {
    if (this.deadlineExceeded) {
      return 'deadline';
    }
    const parentReason: unknown = this.parent?.reason;
    return isTimeoutReason(parentReason) ? 'deadline' : 'cancelled';
  }

  dispose(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}

function isTimeoutReason(reason: unknown): boolean {
  return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
}
