import { describe, it, expect, vi } from 'vitest';
import { createDataContext } from '../../src/context.js';
import { PostgresGateway } from '../../src/gateway/postgres-gateway.js';
import { makeMockPool, statements, userDescriptor } from './helpers.js';

describe('createDataContext', () => {
  it('opens independent sessions over a shared pool', () => {
    const { pool } = makeMockPool();
    const context = createDataContext({ pool });

    const first = context.openSession();
    const second = context.openSession();
    expect(first).toBeInstanceOf(PostgresGateway);
    expect(first).not.toBe(second);
    expect(context.pool).toBe(pool);
  });

  it('withSession closes the session and rolls back frames left open', async () => {
    const { pool, client } = makeMockPool();
    const context = createDataContext({ pool });
    const failure = new Error('handler failed');

    await expect(
      context.withSession(async (session) => {
        await session.beginTransaction();
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(statements(client)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('withSession returns the callback result', async () => {
    const { pool } = makeMockPool(() => ({ rows: [{ count: '7' }] }));
    const context = createDataContext({ pool });

    await expect(context.withSession((session) => session.count(userDescriptor))).resolves.toBe(7);
  });

  it('does not end a pool it was given', async () => {
    const { pool } = makeMockPool();
    const end = vi.fn();
    Object.assign(pool, { end });
    const context = createDataContext({ pool });

    await context.close();
    expect(end).not.toHaveBeenCalled();
  });

  it('passes hooks to every session', async () => {
    const { pool } = makeMockPool(() => ({ rows: [] }));
    const onQuery = vi.fn();
    const context = createDataContext({ pool, hooks: { onQuery } });

    await context.openSession().findAll(userDescriptor);
    expect(onQuery).toHaveBeenCalledWith('SELECT * FROM users', []);
  });

  it('echoes statements through console.debug when configured', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const { pool } = makeMockPool(() => ({ rows: [] }));
    const context = createDataContext({
      pool,
      config: { connectionString: 'postgres://app:test-secret@db/app', poolSize: 1, idleTimeoutMs: 0, echo: true },
    });

    await context.openSession().findAll(userDescriptor);

    expect(debug).toHaveBeenCalledWith('[derived-repo] using postgres://app:***@db/app');
    expect(debug).toHaveBeenCalledWith('[derived-repo]', 'SELECT * FROM users', []);
    debug.mockRestore();
  });
});
