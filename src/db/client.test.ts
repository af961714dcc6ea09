import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { end } = vi.hoisted(() => ({
  end: vi.fn().mockResolvedValue(undefined),
}));

vi.mock('pg', () => ({
  Pool: class {
    readonly end = end;
    readonly connectionString: string;
    constructor(config: { connectionString: string }) {
      this.connectionString = config.connectionString;
    }
  },
}));

vi.mock('drizzle-orm/node-postgres', () => ({
  drizzle: vi.fn((config: { client: unknown }) => ({ __mock: true, $client: config.client })),
}));

import { getDb, closeDb, _resetDbClient } from './client';

describe('getDb', () => {
  const originalEnv = process.env.POSTGRES_URL;

  beforeEach(() => {
    _resetDbClient();
    end.mockClear();
    delete process.env.POSTGRES_URL;
  });

  afterEach(() => {
    _resetDbClient();
    if (originalEnv !== undefined) {
      process.env.POSTGRES_URL = originalEnv;
    } else {
      delete process.env.POSTGRES_URL;
    }
  });

  it('returns null when POSTGRES_URL is unset', () => {
    expect(getDb()).toBeNull();
  });

  it('returns a client when POSTGRES_URL is configured', () => {
    process.env.POSTGRES_URL = 'postgresql://localhost:5432/test';
    const db = getDb();
    expect(db).not.toBeNull();
    expect(db).toHaveProperty('__mock', true);
  });

  it('hands drizzle a pool for the configured url', () => {
    process.env.POSTGRES_URL = 'postgresql://localhost:5432/test';
    const db = getDb();
    expect(db?.$client).toMatchObject({ connectionString: 'postgresql://localhost:5432/test' });
  });

  it('returns the same instance on repeated calls (singleton)', () => {
    process.env.POSTGRES_URL = 'postgresql://localhost:5432/test';
    expect(getDb()).toBe(getDb());
  });

  it('returns null and logs when drizzle constructor throws', async () => {
    const { drizzle } = await import('drizzle-orm/node-postgres');
    vi.mocked(drizzle).mockImplementationOnce(() => { throw new Error('connection failed'); });

    process.env.POSTGRES_URL = 'postgresql://bad-host:5432/test';
    expect(getDb()).toBeNull();
  });
});

describe('closeDb', () => {
  afterEach(() => {
    delete process.env.POSTGRES_URL;
    _resetDbClient();
  });

  it('ends the pool of an active client', async () => {
    process.env.POSTGRES_URL = 'postgresql://localhost:5432/test';
    getDb();

    await closeDb();

    expect(end).toHaveBeenCalledOnce();
  });

  it('is a no-op when the database is disabled', async () => {
    end.mockClear();
    getDb();

    await closeDb();

    expect(end).not.toHaveBeenCalled();
  });
});
