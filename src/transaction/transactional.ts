import { TransactionStateError } from '../errors.js';
import type { TransactionControl } from '../types.js';

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export interface TransactionalOptions {
  /**
   * Cancels the unit of work. The work receives the signal and should stop
   * early; whatever it returns, an aborted unit is rolled back, never committed.
   */
  signal?: AbortSignal;
}

export type UnitOfWork<T> = (signal?: AbortSignal) => T | Promise<T>;

async function settle<T>(work: UnitOfWork<T>, signal: AbortSignal | undefined): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await work(signal) };
  } catch (error) {
    return { ok: false, error };
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new TransactionStateError('commit', 'Unit of work was cancelled');
}

/**
 * Runs a unit of work inside one transaction frame: a real transaction when
 * none is open, a savepoint otherwise. Commits on success; on failure rolls
 * back and rethrows the original error unchanged.
 */
export async function transactional<T>(
  tx: TransactionControl,
  work: UnitOfWork<T>,
  options: TransactionalOptions = {},
): Promise<T> {
  const { signal } = options;
  const cancelled = (): boolean => signal?.aborted === true;
  if (cancelled()) {
    throw new TransactionStateError('begin', 'Unit of work was cancelled before it started');
  }

  await tx.beginTransaction();
  const depth = tx.depth;
  const outcome = await settle(work, signal);

  if (outcome.ok && !cancelled() && tx.depth === depth) {
    await tx.commit();
    return outcome.value;
  }

  let failure: unknown;
  if (!outcome.ok) {
    failure = outcome.error;
  } else if (signal !== undefined && cancelled()) {
    failure = abortReason(signal);
  } else {
    failure = new TransactionStateError(
      'commit',
      `Unit of work left the frame stack at depth ${tx.depth}, expected ${depth}`,
    );
  }

  // Unwind this unit's frame together with anything it left open above it.
  // rollback() discards its frame even when the statement fails.
  while (tx.depth >= depth) {
    const before = tx.depth;
    try {
      await tx.rollback();
    } catch (rollbackError) {
      tx.reportError('rollback after failed unit of work', rollbackError);
      if (tx.depth >= before) break;
    }
  }
  throw failure;
}

/**
 * Wraps a function so every call runs inside `transactional`. The gateway is
 * resolved per call, so one wrapper can serve many sessions.
 */
export function makeTransactional<A extends unknown[], R>(
  resolveGateway: () => TransactionControl,
  fn: (...args: A) => R | Promise<R>,
  options: TransactionalOptions = {},
): (...args: A) => Promise<R> {
  return (...args: A) => transactional(resolveGateway(), () => fn(...args), options);
}
