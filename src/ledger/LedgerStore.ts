import { LedgerEvent, LedgerEventListener } from '../model/LedgerEvents';
import { Err } from '../utils/Logger';

const DELETED = Symbol('deleted');

interface Staged {
  commit(): void;
  rollback(): void;
}

/**
 * Single writer state of the whole ledger.
 *
 * Every mutation runs inside `transact`: tables and cells stage their writes in
 * an overlay, which is merged when the outermost call returns and dropped when
 * it throws. Events emitted during the call are delivered to subscribers only
 * after the merge. Nested `transact` calls join the running transaction.
 */
export class LedgerStore {
  private depth = 0;
  private readonly touched = new Set<Staged>();
  private pendingEvents: LedgerEvent[] = [];
  private readonly listeners: LedgerEventListener[] = [];

  table<K, V>(name: string): StagedTable<K, V> {
    return new StagedTable<K, V>(this, name);
  }

  cell<V>(name: string, initial: V): StagedCell<V> {
    return new StagedCell<V>(this, name, initial);
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  transact<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth++;
      try {
        return fn();
      } finally {
        this.depth--;
      }
    }

    const result = this.runStaged(fn);
    this.dispatch(this.commit());
    return result;
  }

  emit(event: LedgerEvent) {
    this.assertWritable('emit');
    this.pendingEvents.push(event);
  }

  subscribe(listener: LedgerEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /** @internal called by tables and cells on their first write of a transaction */
  touch(staged: Staged, name: string) {
    this.assertWritable(name);
    this.touched.add(staged);
  }

  private assertWritable(name: string) {
    if (this.depth == 0) {
      throw new Error(`LedgerStore: write to ${name} outside of a transaction`);
    }
  }

  private runStaged<T>(fn: () => T): T {
    this.depth = 1;
    try {
      return fn();
    } catch (e) {
      this.rollback();
      throw e;
    } finally {
      this.depth = 0;
    }
  }

  private commit(): LedgerEvent[] {
    for (const staged of this.touched) {
      staged.commit();
    }
    this.touched.clear();
    const events = this.pendingEvents;
    this.pendingEvents = [];
    return events;
  }

  private rollback() {
    for (const staged of this.touched) {
      staged.rollback();
    }
    this.touched.clear();
    this.pendingEvents = [];
  }

  private dispatch(events: LedgerEvent[]) {
    if (events.length == 0) {
      return;
    }
    for (const listener of [...this.listeners]) {
      try {
        listener(events);
      } catch (e) {
        // the state is already committed, a failing subscriber cannot undo it
        Err('LedgerStore: event listener failed', e);
      }
    }
  }
}

export class StagedTable<K, V> implements Staged {
  private readonly committed = new Map<K, V>();
  private staged: Map<K, V | typeof DELETED> | undefined;

  constructor(
    private readonly store: LedgerStore,
    readonly name: string
  ) {}

  get(key: K): V | undefined {
    if (this.staged && this.staged.has(key)) {
      const value = this.staged.get(key);
      return value === DELETED ? undefined : value;
    }
    return this.committed.get(key);
  }

  getOr(key: K, fallback: V): V {
    const value = this.get(key);
    return value === undefined ? fallback : value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V) {
    this.stage().set(key, value);
  }

  delete(key: K) {
    this.stage().set(key, DELETED);
  }

  keys(): K[] {
    const keys: K[] = [];
    for (const key of this.committed.keys()) {
      if (this.has(key)) {
        keys.push(key);
      }
    }
    if (this.staged) {
      for (const [key, value] of this.staged) {
        if (value !== DELETED && !this.committed.has(key)) {
          keys.push(key);
        }
      }
    }
    return keys;
  }

  commit() {
    if (!this.staged) {
      return;
    }
    for (const [key, value] of this.staged) {
      if (value === DELETED) {
        this.committed.delete(key);
      } else {
        this.committed.set(key, value);
      }
    }
    this.staged = undefined;
  }

  rollback() {
    this.staged = undefined;
  }

  private stage(): Map<K, V | typeof DELETED> {
    this.store.touch(this, this.name);
    if (!this.staged) {
      this.staged = new Map();
    }
    return this.staged;
  }
}

export class StagedCell<V> implements Staged {
  private committed: V;
  private staged: { value: V } | undefined;

  constructor(
    private readonly store: LedgerStore,
    readonly name: string,
    initial: V
  ) {
    this.committed = initial;
  }

  get(): V {
    return this.staged ? this.staged.value : this.committed;
  }

  set(value: V) {
    this.store.touch(this, this.name);
    this.staged = { value };
  }

  commit() {
    if (this.staged) {
      this.committed = this.staged.value;
      this.staged = undefined;
    }
  }

  rollback() {
    this.staged = undefined;
  }
}
