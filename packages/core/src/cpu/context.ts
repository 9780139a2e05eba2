import { InvariantViolation } from './exceptions.js';

export type ContextStatus = 'saved' | 'restored';

export type SavedContext = Readonly<{
  programCounter: number;
  savedAt: number;
  status: ContextStatus;
}>;

// Single-slot store for the interrupted main process, like EPC on exception entry.
export class ContextStore {
  private slot: SavedContext | null = null;

  isOccupied(): boolean {
    return this.slot !== null;
  }

  peek(): SavedContext | null {
    return this.slot;
  }

  save(tick: number, programCounter: number): void {
    if (!Number.isInteger(programCounter) || programCounter < 0) {
      throw new RangeError(`program counter must be a non-negative integer, got ${programCounter}`);
    }
    if (this.slot !== null) {
      throw new InvariantViolation('DoubleSave', `context saved at tick ${this.slot.savedAt} is still outstanding (save attempted at tick ${tick})`);
    }
    this.slot = { programCounter, savedAt: tick, status: 'saved' };
  }

  // The caller resumes the main process at programCounter + 1.
  restore(): SavedContext {
    const ctx = this.slot;
    if (ctx === null) throw new InvariantViolation('EmptyRestore', 'no saved context to restore');
    this.slot = null;
    return { ...ctx, status: 'restored' };
  }
}
