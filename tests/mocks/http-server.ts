/**
 * In-process HTTP Server
 * Serves canned responses on 127.0.0.1 for download tests
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'http';

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => void;

export interface TestServer {
  url: string;
  close(): Promise<void>;
}

export async function startServer(handler: RequestHandler): Promise<TestServer> {
  const server = createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close((err) => (err ? reject(err) : resolve()));
    }),
  };
}

/** A port nothing listens on: bind, note the port, release it. */
export async function closedPortUrl(): Promise<string> {
  const server = await startServer(() => undefined);
  const url = server.url;
  await server.close();
  return url;
}
