import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient } from 'pg';
import type { Env } from '../config/env.validation';

const LOCK_PREFIX = 'deploy:';

/**
 * Raw pg client rather than TypeORM: the advisory lock lives on one dedicated
 * connection for as long as the deploy step runs.
 */

export interface AcquireResult {
  acquired: boolean;
  release: () => Promise<void>;
}

export interface HeldLock {
  environment: string;
  holder: string;
  lockedAt: string;
}

export interface WaitOptions {
  signal?: AbortSignal;
  pollMs?: number;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * One deploy per environment across every process sharing the database,
 * through PostgreSQL advisory locks keyed on `deploy:<environment>`.
 * If the process dies, the lock goes with its connection.
 */
@Injectable()
export class DeploymentLockService implements OnModuleDestroy {
  private readonly logger = new Logger(DeploymentLockService.name);
  private readonly held = new Map<string, HeldLock>();
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService<Env, true>) {}

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.configService.get('DATABASE_URL', { infer: true }),
      });
    }
    return this.pool;
  }

  /** Non-blocking: resolves at once with acquired true/false. */
  async tryAcquire(environment: string, holder: string): Promise<AcquireResult> {
    const key = LOCK_PREFIX + environment;
    const client: PoolClient = await this.getPool().connect();

    try {
      const result = await client.query<{ acquired: boolean }>(
        `SELECT pg_try_advisory_lock(hashtext($1)) AS "acquired"`,
        [key],
      );
      if (!result.rows[0]?.acquired) {
        client.release();
        return { acquired: false, release: async () => {} };
      }
    } catch (err) {
      client.release();
      throw err;
    }

    this.held.set(environment, { environment, holder, lockedAt: new Date().toISOString() });

    let released = false;
    const release = async (): Promise<void> => {
      if (released) return;
      released = true;
      this.held.delete(environment);
      try {
        await client.query(`SELECT pg_advisory_unlock(hashtext($1))`, [key]);
      } finally {
        client.release();
      }
    };

    return { acquired: true, release };
  }

  /**
   * Poll until the lock is free. Resolves with acquired=false only when
   * `signal` aborts first.
   */
  async acquire(environment: string, holder: string, options: WaitOptions = {}): Promise<AcquireResult> {
    const pollMs: number = options.pollMs ?? this.configService.get('DEPLOY_LOCK_POLL_MS', { infer: true });
    let announced = false;

    while (!options.signal?.aborted) {
      const lock = await this.tryAcquire(environment, holder);
      if (lock.acquired) return lock;

      if (!announced) {
        this.logger.log(`Deploy lock for ${environment} is busy; ${holder} waiting`);
        announced = true;
      }
      await sleep(pollMs, options.signal);
    }

    return { acquired: false, release: async () => {} };
  }

  /** Locks held by this process. */
  listHeld(): HeldLock[] {
    return [...this.held.values()];
  }

  async onModuleDestroy(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
