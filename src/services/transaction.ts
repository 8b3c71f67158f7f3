import type { Checkpointable, EngineEvent, Restore } from '../domain/types';
import { ReentrantCall } from '../domain/errors';

export function isCheckpointable(value: object): value is Checkpointable {
  return 'checkpoint' in value && typeof value.checkpoint === 'function';
}

// Engine-wide mutual exclusion. Any guarded entry point called while another
// one is still on the stack (e.g. from a token callback) is rejected.
export class ReentrancyGuard {
  private active: string | undefined;

  run<T>(operation: string, fn: () => T): T {
    if (this.active !== undefined) throw new ReentrantCall(operation, this.active);
    this.active = operation;
    try {
      return fn();
    } finally {
      this.active = undefined;
    }
  }

  get entered(): boolean {
    return this.active !== undefined;
  }
}

export interface TxContext {
  record(event: EngineEvent): void;
}

export interface Committed<T> {
  result: T;
  events: EngineEvent[];
}

// All-or-nothing execution on a non-transactional host: every participant is
// checkpointed before the call and restored (newest first) if it throws.
// Recorded events are handed back only when the call returns.
export class TransactionScope {
  private readonly participants: Checkpointable[];

  constructor(participants: Checkpointable[]) {
    this.participants = participants;
  }

  run<T>(fn: (tx: TxContext) => T): Committed<T> {
    const restores: Restore[] = this.participants.map((p) => p.checkpoint());
    const events: EngineEvent[] = [];
    let result: T;
    try {
      result = fn({ record: (event) => events.push(event) });
    } catch (err) {
      for (let i = restores.length - 1; i >= 0; i--) restores[i]();
      throw err;
    }
    return { result, events };
  }
}
