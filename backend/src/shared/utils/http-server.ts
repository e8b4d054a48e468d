/**
 * HTTP server shutdown
 *
 * @module shared/utils/http-server
 */

/** The part of `http.Server` that shutdown needs. */
export interface ClosableServer {
  close(callback: (err?: Error) => void): unknown;
  closeAllConnections(): void;
}

/**
 * Stop accepting connections and drop the ones still open. An SSE response
 * sees its socket close, which aborts the agent run behind it, so the
 * returned promise settles once those runs have been told to stop.
 */
export async function closeServer(server: ClosableServer): Promise<void> {
  const closed = new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  server.closeAllConnections();
  await closed;
}
