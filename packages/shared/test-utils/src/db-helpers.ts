import { vi } from 'vitest';

/**
 * Stand-in for a pg Pool answering `SELECT 1`
 */
export function createMockDatabase(rows: unknown[] = [{ '?column?': 1 }]) {
  return {
    query: vi.fn(async (_text: string) => ({ rows })),
  };
}

/**
 * Stand-in for an ioredis client answering PING
 */
export function createMockRedis(reply = 'PONG') {
  return {
    ping: vi.fn(async () => reply),
  };
}
