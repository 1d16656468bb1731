import { describe, it, expect, vi } from 'vitest';
import { TransactionStack } from '../../src/gateway/transaction-stack.js';
import { TransactionStateError } from '../../src/errors.js';

function makeStack() {
  const run = vi.fn(async (_sql: string) => undefined);
  const stack = new TransactionStack(run);
  const sent = () => run.mock.calls.map((call) => call[0]);
  return { stack, run, sent };
}

describe('TransactionStack', () => {
  it('starts empty', () => {
    const { stack } = makeStack();
    expect(stack.depth).toBe(0);
    expect(stack.isOpen).toBe(false);
  });

  it('opens a real transaction for the root frame and savepoints above it', async () => {
    const { stack, sent } = makeStack();
    await stack.begin();
    await stack.begin();
    await stack.begin();
    expect(stack.depth).toBe(3);
    expect(sent()).toEqual(['BEGIN', 'SAVEPOINT sp_1', 'SAVEPOINT sp_2']);
  });

  it('commits the top frame only', async () => {
    const { stack, sent } = makeStack();
    await stack.begin();
    await stack.begin();
    await stack.commit();
    expect(stack.depth).toBe(1);
    await stack.commit();
    expect(stack.depth).toBe(0);
    expect(sent()).toEqual(['BEGIN', 'SAVEPOINT sp_1', 'RELEASE SAVEPOINT sp_1', 'COMMIT']);
  });

  it('rolls a nested frame back to its savepoint and releases it', async () => {
    const { stack, sent } = makeStack();
    await stack.begin();
    await stack.begin();
    await stack.rollback();
    expect(stack.depth).toBe(1);
    await stack.rollback();
    expect(sent()).toEqual([
      'BEGIN',
      'SAVEPOINT sp_1',
      'ROLLBACK TO SAVEPOINT sp_1',
      'RELEASE SAVEPOINT sp_1',
      'ROLLBACK',
    ]);
  });

  it('reuses savepoint names once a level is freed', async () => {
    const { stack, sent } = makeStack();
    await stack.begin();
    await stack.begin();
    await stack.commit();
    await stack.begin();
    expect(sent()).toEqual(['BEGIN', 'SAVEPOINT sp_1', 'RELEASE SAVEPOINT sp_1', 'SAVEPOINT sp_1']);
  });

  it('rejects commit on an empty stack without touching the backend', async () => {
    const { stack, run } = makeStack();
    await expect(stack.commit()).rejects.toBeInstanceOf(TransactionStateError);
    await expect(stack.commit()).rejects.toThrow('Cannot commit: no transaction is open');
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects rollback on an empty stack', async () => {
    const { stack } = makeStack();
    await expect(stack.rollback()).rejects.toThrow('Cannot rollback: no transaction is open');
  });

  it('does not push a frame when BEGIN fails', async () => {
    const run = vi.fn().mockRejectedValueOnce(new Error('connection lost'));
    const stack = new TransactionStack(run);
    await expect(stack.begin()).rejects.toThrow('connection lost');
    expect(stack.depth).toBe(0);
  });

  it('rejects a root COMMIT that the backend answered with ROLLBACK', async () => {
    const run = vi.fn(async (sql: string) => ({ command: sql === 'COMMIT' ? 'ROLLBACK' : sql }));
    const stack = new TransactionStack(run);
    await stack.begin();

    await expect(stack.commit()).rejects.toBeInstanceOf(TransactionStateError);
    expect(stack.depth).toBe(0);
  });

  it('discards the frame even when its rollback statement fails', async () => {
    const run = vi.fn(async (sql: string) => {
      if (sql.startsWith('ROLLBACK TO')) throw new Error('savepoint lost');
      return undefined;
    });
    const stack = new TransactionStack(run);
    await stack.begin();
    await stack.begin();

    await expect(stack.rollback()).rejects.toThrow('savepoint lost');
    expect(stack.depth).toBe(1);
  });

  it('rollbackAll discards every frame with one ROLLBACK', async () => {
    const { stack, sent } = makeStack();
    await stack.begin();
    await stack.begin();
    await stack.begin();
    await stack.rollbackAll();
    expect(stack.depth).toBe(0);
    expect(sent()).toEqual(['BEGIN', 'SAVEPOINT sp_1', 'SAVEPOINT sp_2', 'ROLLBACK']);
  });

  it('rollbackAll on an empty stack is a no-op', async () => {
    const { stack, run } = makeStack();
    await stack.rollbackAll();
    expect(run).not.toHaveBeenCalled();
  });
});
