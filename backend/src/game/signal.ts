/**
 * One-shot wake-up trigger. Any number of parties may wait on it; `fire`
 * releases all of them exactly once. A fired signal is never reset, the owner
 * installs a fresh one instead.
 */
export class Signal {
  private fired = false;
  private resolveWaiters: () => void = () => undefined;
  private readonly done: Promise<void>;

  constructor() {
    this.done = new Promise<void>((resolve) => {
      this.resolveWaiters = resolve;
    });
  }

  get isFired(): boolean {
    return this.fired;
  }

  fire(): void {
    if (this.fired) {
      return;
    }
    this.fired = true;
    this.resolveWaiters();
  }

  wait(): Promise<void> {
    return this.done;
  }
}

export type WakeReason = 'signaled' | 'timeout' | 'aborted';

export interface WaitOptions {
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

/** Waits for `signal`, giving up after `timeoutMs` or when `abortSignal` aborts. */
export const waitForSignal = async (signal: Signal, options: WaitOptions): Promise<WakeReason> => {
  const { timeoutMs, abortSignal } = options;
  if (signal.isFired) {
    return 'signaled';
  }
  if (abortSignal?.aborted) {
    return 'aborted';
  }

  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const timedOut = new Promise<WakeReason>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
  });
  const aborted = new Promise<WakeReason>((resolve) => {
    if (!abortSignal) {
      return;
    }
    onAbort = () => resolve('aborted');
    abortSignal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([signal.wait().then((): WakeReason => 'signaled'), timedOut, aborted]);
  } finally {
    clearTimeout(timer);
    if (abortSignal && onAbort) {
      abortSignal.removeEventListener('abort', onAbort);
    }
  }
};
