import { InterruptError } from '@core/errors';

/**
 * Anything that emits SIGINT. `process` in production, an EventEmitter in tests.
 */
export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * Observes operator interrupts while a step is running.
 *
 * While armed, SIGINT no longer terminates the process; it is recorded and
 * forwarded to the registered listeners so the running executor can decide
 * what the interrupt means.
 */
export class InterruptGuard {
  private interrupted = false;
  private readonly listeners = new Set<() => void>();
  private readonly handleSignal = (): void => {
    this.interrupted = true;
    for (const listener of this.listeners) {
      listener();
    }
  };

  constructor(private readonly source: SignalSource = process) {}

  get wasInterrupted(): boolean {
    return this.interrupted;
  }

  onInterrupt(listener: () => void): void {
    this.listeners.add(listener);
  }

  arm(): void {
    this.interrupted = false;
    this.source.on('SIGINT', this.handleSignal);
  }

  disarm(): void {
    this.source.off('SIGINT', this.handleSignal);
    this.listeners.clear();
  }
}

/**
 * Run `work` and reject with an {@link InterruptError} as soon as SIGINT
 * arrives, without waiting for `work` to settle.
 */
export async function raceInterrupt<T>(
  what: string,
  work: () => Promise<T>,
  source: SignalSource = process
): Promise<T> {
  const guard = new InterruptGuard(source);
  guard.arm();
  try {
    return await new Promise<T>((resolve, reject) => {
      guard.onInterrupt(() => reject(new InterruptError(what)));
      work().then(resolve, reject);
    });
  } finally {
    guard.disarm();
  }
}
