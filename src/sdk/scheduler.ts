/**
 * Host scheduler: the periodic timer primitive the dispatch loop runs on.
 */

export interface HostScheduler {
  /**
   * Call `callback` every `intervalSeconds`. A timer with the same name is
   * replaced.
   */
  createPeriodicTimer(name: string, intervalSeconds: number, callback: () => void): void;

  /** Stop and forget the named timer. Unknown names are ignored. */
  removeTimer(name: string): void;
}

/** Scheduler over the Node.js event loop. */
export class NodeScheduler implements HostScheduler {
  readonly #timers = new Map<string, ReturnType<typeof setInterval>>();

  createPeriodicTimer(name: string, intervalSeconds: number, callback: () => void): void {
    this.removeTimer(name);
    this.#timers.set(name, setInterval(callback, Math.max(1, intervalSeconds * 1000)));
  }

  removeTimer(name: string): void {
    const timer = this.#timers.get(name);
    if (timer === undefined) return;
    clearInterval(timer);
    this.#timers.delete(name);
  }

  /** Names of the timers currently running. */
  get names(): string[] {
    return [...this.#timers.keys()];
  }
}

/**
 * Scheduler that only fires when told to. For tests and for hosts that
 * already own a frame loop and call {@link ManualScheduler.fire} from it.
 */
export class ManualScheduler implements HostScheduler {
  readonly #timers = new Map<string, { intervalSeconds: number; callback: () => void }>();
  /** Every registration, including replacements. */
  readonly registrations: { name: string; intervalSeconds: number }[] = [];

  createPeriodicTimer(name: string, intervalSeconds: number, callback: () => void): void {
    this.#timers.set(name, { intervalSeconds, callback });
    this.registrations.push({ name, intervalSeconds });
  }

  removeTimer(name: string): void {
    this.#timers.delete(name);
  }

  has(name: string): boolean {
    return this.#timers.has(name);
  }

  /** Run the named timer's callback `times` times. Returns false if unknown. */
  fire(name: string, times = 1): boolean {
    const timer = this.#timers.get(name);
    if (!timer) return false;
    for (let i = 0; i < times; i++) timer.callback();
    return true;
  }
}
