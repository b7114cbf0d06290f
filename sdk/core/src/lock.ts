import { ReentrancyError } from "./errors";

/**
 * Non-blocking mutual exclusion for a whole operation. A second acquisition
 * while held (necessarily a re-entrant call, execution being synchronous)
 * fails immediately.
 */
export class ReentrancyLock {
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  run<T>(work: () => T): T {
    if (this.held) throw new ReentrancyError();
    this.held = true;
    try {
      return work();
    } finally {
      this.held = false;
    }
  }
}
