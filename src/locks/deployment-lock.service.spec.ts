import { ConfigService } from '@nestjs/config';
import { DeploymentLockService } from './deployment-lock.service';
import type { Env } from '../config/env.validation';

const mockQuery = jest.fn();
const mockRelease = jest.fn();
const mockConnect = jest.fn(async () => ({ query: mockQuery, release: mockRelease }));
const mockEnd = jest.fn(async () => undefined);

jest.mock('pg', () => ({
  Pool: jest.fn().mockImplementation(() => ({ connect: mockConnect, end: mockEnd })),
}));

describe('DeploymentLockService', () => {
  let locks: DeploymentLockService;

  beforeEach(() => {
    jest.clearAllMocks();
    mockQuery.mockResolvedValue({ rows: [] });
    locks = new DeploymentLockService(
      new ConfigService<Env, true>({ DATABASE_URL: 'postgres://test', DEPLOY_LOCK_POLL_MS: 1 }),
    );
  });

  afterEach(async () => {
    await locks.onModuleDestroy();
  });

  it('takes the advisory lock keyed on the environment and releases it', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ acquired: true }] });

    const lock = await locks.tryAcquire('production', 'pipeline-1/deploy');

    expect(lock.acquired).toBe(true);
    expect(mockQuery).toHaveBeenNthCalledWith(
      1,
      `SELECT pg_try_advisory_lock(hashtext($1)) AS "acquired"`,
      ['deploy:production'],
    );
    expect(locks.listHeld()).toEqual([
      expect.objectContaining({ environment: 'production', holder: 'pipeline-1/deploy' }),
    ]);

    await lock.release();
    await lock.release();

    expect(mockQuery).toHaveBeenNthCalledWith(2, `SELECT pg_advisory_unlock(hashtext($1))`, [
      'deploy:production',
    ]);
    expect(mockQuery).toHaveBeenCalledTimes(2);
    expect(mockRelease).toHaveBeenCalledTimes(1);
    expect(locks.listHeld()).toEqual([]);
  });

  it('returns the connection at once when the lock is taken elsewhere', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ acquired: false }] });

    const lock = await locks.tryAcquire('staging', 'pipeline-2/deploy');

    expect(lock.acquired).toBe(false);
    expect(mockRelease).toHaveBeenCalledTimes(1);
    expect(locks.listHeld()).toEqual([]);
  });

  it('polls until the lock frees up', async () => {
    mockQuery
      .mockResolvedValueOnce({ rows: [{ acquired: false }] })
      .mockResolvedValueOnce({ rows: [{ acquired: true }] });

    const lock = await locks.acquire('staging', 'pipeline-3/deploy');

    expect(lock.acquired).toBe(true);
    expect(mockConnect).toHaveBeenCalledTimes(2);
    await lock.release();
  });

  it('gives up when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const lock = await locks.acquire('production', 'pipeline-4/deploy', {
      signal: controller.signal,
    });

    expect(lock.acquired).toBe(false);
    expect(mockConnect).not.toHaveBeenCalled();
  });

  it('stops waiting as soon as the signal aborts mid-poll', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ acquired: false }] });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const started = Date.now();
    const lock = await locks.acquire('production', 'pipeline-5/deploy', {
      signal: controller.signal,
      pollMs: 60_000,
    });

    expect(lock.acquired).toBe(false);
    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});
