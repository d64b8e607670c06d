import type { Server } from 'node:http';
import type { Express } from 'express';

/**
 * Starts listening and settles once the socket is bound.
 *
 * @throws the listen error (EADDRINUSE, EACCES, ...) as a rejection
 */
export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
