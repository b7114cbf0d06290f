type Undo = () => void;
type Hook = () => void;

/**
 * Undo log shared by every piece of state that takes part in an operation.
 *
 * `run` opens a unit of work. Writers call `record` with a closure restoring
 * the previous value; if the unit throws, the closures recorded since it
 * opened are replayed newest-first and the error is rethrown. Hooks queued
 * with `afterCommit` only fire once the outermost unit has returned.
 */
export class Journal {
  private undos: Undo[] = [];
  private hooks: Hook[] = [];
  private depth = 0;

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  run<T>(work: () => T): T {
    const undoMark = this.undos.length;
    const hookMark = this.hooks.length;
    this.depth += 1;

    let result: T;
    try {
      result = work();
    } catch (err) {
      this.revertTo(undoMark);
      this.hooks.length = hookMark;
      throw err;
    } finally {
      this.depth -= 1;
    }

    if (this.depth === 0) {
      this.undos = [];
      const hooks = this.hooks;
      this.hooks = [];
      for (const hook of hooks) hook();
    }
    return result;
  }

  /** Outside a unit of work writes are final and nothing is recorded. */
  record(undo: Undo): void {
    if (this.depth > 0) this.undos.push(undo);
  }

  afterCommit(hook: Hook): void {
    if (this.depth > 0) {
      this.hooks.push(hook);
    } else {
      hook();
    }
  }

  private revertTo(mark: number): void {
    while (this.undos.length > mark) {
      const undo = this.undos.pop();
      if (undo) undo();
    }
  }
}

/** Journaled `Map.set`: restores the previous entry (or its absence) on rollback. */
export function journaledSet<K, V>(journal: Journal, map: Map<K, V>, key: K, value: V): void {
  const had = map.has(key);
  const previous = map.get(key);
  journal.record(() => {
    if (had && previous !== undefined) {
      map.set(key, previous);
    } else {
      map.delete(key);
    }
  });
  map.set(key, value);
}
