/**
 * Persistence contract for the store: the whole state is loaded once at start
 * and flushed after every committed mutation.
 */
import type { PersistedState } from '../types.js';

export interface GraphPersistence {
  readonly name: string;
  load(): Promise<PersistedState | null>;
  save(state: PersistedState): Promise<void>;
  close?(): Promise<void>;
}

/** Keeps a structured copy in memory; used by tests and one-shot runs. */
export class MemoryPersistence implements GraphPersistence {
  readonly name = 'memory';
  private state: PersistedState | null = null;
  saves = 0;

  async load(): Promise<PersistedState | null> {
    return this.state ? structuredClone(this.state) : null;
  }

  async save(state: PersistedState): Promise<void> {
    this.state = structuredClone(state);
    this.saves++;
  }
}
