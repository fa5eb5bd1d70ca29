import { createServer } from 'http';
import { delay } from './probe-helpers.js';

/**
 * Local HTTP server that accepts requests and never answers them
 */
export interface StalledServer {
  url: string;
  openConnections(): Promise<number>;
  close(): Promise<void>;
}

export async function startStalledServer(): Promise<StalledServer> {
  const server = createServer(() => undefined);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('stalled server has no TCP address');
  }

  return {
    url: `http://127.0.0.1:${address.port}/health`,
    openConnections: () =>
      new Promise<number>((resolve, reject) =>
        server.getConnections((error, count) => (error ? reject(error) : resolve(count)))
      ),
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    },
  };
}

/**
 * Polls until the server holds `expected` connections or the wait runs out;
 * returns the last count seen
 */
export async function waitForConnections(server: StalledServer, expected: number, timeoutMs = 1000): Promise<number> {
  const deadline = Date.now() + timeoutMs;
  let count = await server.openConnections();
  while (count !== expected && Date.now() < deadline) {
    await delay(20);
    count = await server.openConnections();
  }
  return count;
}
