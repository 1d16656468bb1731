import { TransactionStateError } from '../errors.js';

export type FrameKind = 'root' | 'nested';

interface TransactionFrame {
  kind: FrameKind;
  /** Savepoint name for nested frames, null for the root frame. */
  savepoint: string | null;
}

/** pg's QueryResult satisfies this; `command` is the backend's completion tag. */
export interface StatementResult {
  command?: string;
}

export type StatementRunner = (sql: string) => Promise<StatementResult | undefined>;

/**
 * LIFO stack of transaction frames for one session: at most one root frame
 * at the bottom, savepoints above it. commit/rollback act on the top frame only.
 */
export class TransactionStack {
  private readonly frames: TransactionFrame[] = [];

  constructor(private readonly run: StatementRunner) {}

  get depth(): number {
    return this.frames.length;
  }

  get isOpen(): boolean {
    return this.frames.length > 0;
  }

  async begin(): Promise<void> {
    if (this.frames.length === 0) {
      await this.run('BEGIN');
      this.frames.push({ kind: 'root', savepoint: null });
      return;
    }
    const savepoint = `sp_${this.frames.length}`;
    await this.run(`SAVEPOINT ${savepoint}`);
    this.frames.push({ kind: 'nested', savepoint });
  }

  async commit(): Promise<void> {
    const frame = this.frames.pop();
    if (frame === undefined) {
      throw new TransactionStateError('commit');
    }
    if (frame.savepoint === null) {
      // An aborted transaction answers COMMIT with a ROLLBACK tag and no error
      const result = await this.run('COMMIT');
      if (result?.command === 'ROLLBACK') {
        throw new TransactionStateError(
          'commit',
          'Transaction was aborted by an earlier error and rolled back instead of committing',
        );
      }
    } else {
      await this.run(`RELEASE SAVEPOINT ${frame.savepoint}`);
    }
  }

  async rollback(): Promise<void> {
    const frame = this.frames.pop();
    if (frame === undefined) {
      throw new TransactionStateError('rollback');
    }
    if (frame.savepoint === null) {
      await this.run('ROLLBACK');
    } else {
      await this.run(`ROLLBACK TO SAVEPOINT ${frame.savepoint}`);
      await this.run(`RELEASE SAVEPOINT ${frame.savepoint}`);
    }
  }

  /**
   * Rolls back every open frame. Rolling back the root discards the savepoints
   * above it, so only one ROLLBACK is sent.
   */
  async rollbackAll(): Promise<void> {
    if (this.frames.length === 0) return;
    this.frames.length = 0;
    await this.run('ROLLBACK');
  }
}
